import { readdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { JobRecord } from "../types";
import { errorMessage } from "./errors";

export function isTerminal(record: JobRecord): boolean {
  return record.completed || record.error !== null;
}

/**
 * Process-wide job table. Records are replaced whole, never merged; a record
 * that reached a terminal state refuses further writes.
 */
export class SessionStore {
  private readonly jobs = new Map<string, JobRecord>();

  create(token: string, now: number = Date.now()): JobRecord {
    if (this.jobs.has(token)) throw new Error(`Job ${token} already exists`);
    const record: JobRecord = {
      progress: 0,
      status: "Starting...",
      error: null,
      createdAt: now,
      completedAt: null,
      completed: false,
      artifactPath: null,
    };
    this.jobs.set(token, record);
    return { ...record };
  }

  get(token: string): JobRecord | undefined {
    const record = this.jobs.get(token);
    return record ? { ...record } : undefined;
  }

  /** Returns false when the token is gone (reaped). */
  put(token: string, record: JobRecord): boolean {
    const existing = this.jobs.get(token);
    if (!existing) return false;
    if (isTerminal(existing)) throw new Error(`Job ${token} is already finished`);
    this.jobs.set(token, { ...record });
    return true;
  }

  delete(token: string): boolean {
    return this.jobs.delete(token);
  }

  has(token: string): boolean {
    return this.jobs.has(token);
  }

  get size(): number {
    return this.jobs.size;
  }

  entries(): Array<[string, JobRecord]> {
    return [...this.jobs.entries()].map(([token, record]) => [token, { ...record }]);
  }
}

export interface ReaperOptions {
  uploadDir: string;
  retentionMs: number;
}

/**
 * Purges jobs older than the retention window (by creation time) together
 * with their PDF and uploaded source files.
 */
export class Reaper {
  constructor(
    private readonly store: SessionStore,
    private readonly opts: ReaperOptions
  ) {}

  async reap(now: number = Date.now()): Promise<string[]> {
    const expired = this.store
      .entries()
      .filter(([, record]) => now - record.createdAt > this.opts.retentionMs);
    if (expired.length === 0) return [];

    const uploads = await this.listUploads();
    const purged: string[] = [];

    for (const [token, record] of expired) {
      try {
        if (record.artifactPath) await rm(record.artifactPath, { force: true });
        for (const file of uploads.filter((f) => f.startsWith(`${token}_`))) {
          await rm(path.join(this.opts.uploadDir, file), { force: true });
        }
        this.store.delete(token);
        purged.push(token);
        console.log(`[reaper] Cleaned up expired session: ${token}`);
      } catch (e) {
        console.error(`[reaper] Error cleaning up session ${token}: ${errorMessage(e)}`);
      }
    }
    return purged;
  }

  private async listUploads(): Promise<string[]> {
    try {
      return await readdir(this.opts.uploadDir);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }
  }
}
