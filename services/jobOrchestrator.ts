/**
 * Runs one submission through
 *   profile → outline → illustrate ×N → compose
 * as a detached task, recording progress in the session store after each step.
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import {
  GENDERS,
  type Gender,
  type ImageClient,
  type JobRecord,
  type JobStatusView,
  type NarrativeClient,
  type PageArtifact,
  type StoryOutline,
  type StorySelection,
} from "../types";
import type { CharacterProfiler } from "./characterProfiler";
import { composeDocument } from "./documentComposer";
import { LookupError, PayloadTooLargeError, ValidationError, errorMessage } from "./errors";
import { detectImageFormat, extensionFor, type UploadFormat } from "./imageTools";
import { SynthesisNarrative, TemplateNarrative, type NarrativeProvider } from "./narrativeProvider";
import {
  DEFAULT_ILLUSTRATOR_OPTIONS,
  GenerationIllustrator,
  MaskedEditIllustrator,
  type IllustrationTask,
  type IllustratorOptions,
  type PageIllustrator,
} from "./pageIllustrator";
import { sleep } from "./retry";
import type { Reaper, SessionStore } from "./sessionStore";
import type { StoryCatalog } from "./storyCatalog";

const ALLOWED_EXTENSIONS = ["png", "jpg", "jpeg", "gif", "webp"];
const MAX_NAME_LENGTH = 40;

export interface SubmissionInput {
  image: Buffer;
  filename?: string;
  story: string;
  gender: string;
  name?: string;
}

export interface ArtifactInfo {
  path: string;
  downloadName: string;
}

export interface OrchestratorDeps {
  store: SessionStore;
  reaper: Reaper;
  catalog: StoryCatalog;
  profiler: CharacterProfiler;
  narrativeClient: NarrativeClient;
  imageClient: ImageClient;
  uploadDir: string;
  outputDir: string;
  maxUploadMb: number;
  pageDelayMs: number;
  illustrator?: IllustratorOptions;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface RunRequest {
  token: string;
  createdAt: number;
  imagePath: string;
  selection: StorySelection;
  gender: Gender;
  name?: string;
}

/** Narrative + illustrator pair for one kind of story. */
export interface StoryStrategies {
  narrative: NarrativeProvider;
  illustrator: PageIllustrator;
}

export function createStoryStrategies(
  selection: StorySelection,
  narrativeClient: NarrativeClient,
  imageClient: ImageClient,
  opts: IllustratorOptions = DEFAULT_ILLUSTRATOR_OPTIONS
): StoryStrategies {
  if (selection.kind === "template") {
    return {
      narrative: new TemplateNarrative(selection),
      illustrator: new MaskedEditIllustrator(imageClient, opts),
    };
  }
  return {
    narrative: new SynthesisNarrative(selection, narrativeClient),
    illustrator: new GenerationIllustrator(imageClient, opts),
  };
}

/** Pictures to produce, in book order: the template cover first when there is one. */
export function illustrationPlan(outline: StoryOutline): Array<IllustrationTask & { caption: string }> {
  const plan: Array<IllustrationTask & { caption: string }> = [];
  if (outline.cover) {
    plan.push({ pageNumber: 0, caption: outline.cover.caption, templateImage: outline.cover.templateImage });
  }
  for (const page of outline.pages) {
    plan.push({
      pageNumber: page.pageNumber,
      caption: page.text,
      prompt: page.imagePrompt,
      templateImage: page.templateImage,
    });
  }
  return plan;
}

export function pageProgress(index: number, total: number): number {
  return 15 + Math.floor(((index + 1) / total) * 75);
}

function isGender(value: string): value is Gender {
  return GENDERS.some((g) => g === value);
}

function sanitizeFilename(filename: string): string {
  return path
    .basename(filename.replace(/\\/g, "/"))
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[._]+/, "");
}

function yyyymmdd(ms: number): string {
  const d = new Date(ms);
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}${mm}${dd}`;
}

class JobPurgedError extends Error {
  constructor(token: string) {
    super(`Job ${token} was purged while running`);
    this.name = "JobPurgedError";
  }
}

export class JobOrchestrator {
  private readonly running = new Map<string, Promise<void>>();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validate, persist the upload, create the job and start it in the
   * background. Resolves with the job token without waiting for the book.
   */
  async submit(input: SubmissionInput): Promise<string> {
    const { format, selection, gender, name } = await this.validate(input);
    const { store, reaper, uploadDir } = this.deps;

    const token = uuidv4();
    const cleaned = input.filename ? sanitizeFilename(input.filename) : "";
    const filename = cleaned.includes(".") ? cleaned : `upload_${token.slice(0, 8)}.${extensionFor(format)}`;

    await mkdir(uploadDir, { recursive: true });
    const imagePath = path.join(uploadDir, `${token}_${filename}`);
    await writeFile(imagePath, input.image);
    console.log(`[orchestrator] File uploaded: ${filename} for session ${token}`);

    const { createdAt } = store.create(token, this.now());

    try {
      await reaper.reap(this.now());
    } catch (e) {
      console.error(`[reaper] Cleanup pass failed: ${errorMessage(e)}`);
    }

    const task = this.run({ token, createdAt, imagePath, selection, gender, name })
      .catch((e) => {
        console.error(`[orchestrator] Unhandled failure for session ${token}:`, e);
      })
      .finally(() => {
        this.running.delete(token);
      });
    this.running.set(token, task);

    return token;
  }

  getStatus(token: string): JobStatusView {
    const record = this.deps.store.get(token);
    if (!record) throw new LookupError("not_found", "Invalid session ID");
    return {
      progress: record.progress,
      status: record.status,
      error: record.error,
      completed: record.completed,
    };
  }

  getArtifact(token: string): ArtifactInfo {
    const record = this.deps.store.get(token);
    if (!record) throw new LookupError("not_found", "Invalid session ID");
    if (!record.completed) throw new LookupError("not_ready", "Book not ready yet");
    if (!record.artifactPath || !existsSync(record.artifactPath)) {
      throw new LookupError("not_found", "PDF file not found");
    }
    return {
      path: record.artifactPath,
      downloadName: `fairy_tale_book_${yyyymmdd(this.now())}.pdf`,
    };
  }

  /** Resolves once the background run for token has ended (immediately if none). */
  async settled(token: string): Promise<void> {
    await this.running.get(token);
  }

  get activeJobs(): number {
    return this.running.size;
  }

  private async validate(input: SubmissionInput): Promise<{
    format: UploadFormat;
    selection: StorySelection;
    gender: Gender;
    name?: string;
  }> {
    const { maxUploadMb, catalog } = this.deps;

    if (!input.image || input.image.length === 0) throw new ValidationError("No image file provided");
    if (input.image.length > maxUploadMb * 1024 * 1024) throw new PayloadTooLargeError(maxUploadMb);

    const allowed = `Invalid file type. Allowed types: ${ALLOWED_EXTENSIONS.join(", ")}`;
    const ext = input.filename?.includes(".") ? input.filename.split(".").pop()?.toLowerCase() : undefined;
    if (ext !== undefined && !ALLOWED_EXTENSIONS.includes(ext)) throw new ValidationError(allowed);

    let format: UploadFormat;
    try {
      ({ format } = await detectImageFormat(input.image));
    } catch (e) {
      const msg = errorMessage(e);
      console.warn(`[orchestrator] Invalid image file uploaded: ${msg}`);
      throw new ValidationError(msg.startsWith("Unsupported image format") ? allowed : "File is not a valid image");
    }

    const selection = catalog.resolve(input.story);

    const gender = input.gender.trim();
    if (!isGender(gender)) throw new ValidationError("Invalid gender selection");

    const name = input.name?.trim() || undefined;
    if (name && name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Name must be at most ${MAX_NAME_LENGTH} characters`);
    }
    if (selection.kind === "template" && !name) {
      throw new ValidationError("A name is required for this story");
    }

    return { format, selection, gender, name };
  }

  private write(token: string, record: JobRecord): void {
    if (!this.deps.store.put(token, record)) throw new JobPurgedError(token);
  }

  private step(req: RunRequest, progress: number, status: string): void {
    this.write(req.token, {
      progress,
      status,
      error: null,
      createdAt: req.createdAt,
      completedAt: null,
      completed: false,
      artifactPath: null,
    });
  }

  private async run(req: RunRequest): Promise<void> {
    const { token } = req;
    const { profiler, narrativeClient, imageClient, outputDir, pageDelayMs } = this.deps;

    try {
      console.log(`[orchestrator] Starting book generation for session ${token}`);

      this.step(req, 5, "Analyzing image...");
      const characterDescription = await profiler.describe(await readFile(req.imagePath));

      const { narrative, illustrator } = createStoryStrategies(
        req.selection,
        narrativeClient,
        imageClient,
        this.deps.illustrator
      );

      this.step(req, 10, narrative.statusText);
      const outline = await narrative.loadOutline({
        gender: req.gender,
        characterDescription,
        name: req.name,
      });
      this.step(req, 15, `Story ready: ${outline.title}`);

      const plan = illustrationPlan(outline);
      const artifacts: PageArtifact[] = [];
      for (let i = 0; i < plan.length; i++) {
        const task = plan[i];
        const status =
          task.pageNumber === 0
            ? "Creating cover..."
            : `Creating page ${task.pageNumber} of ${outline.pages.length}...`;
        this.step(req, pageProgress(i, plan.length), status);

        const image = await illustrator.illustrate(task, characterDescription);
        artifacts.push({ pageNumber: task.pageNumber, image, caption: task.caption });

        if (i < plan.length - 1 && pageDelayMs > 0) await this.sleep(pageDelayMs);
      }

      this.step(req, 95, "Creating PDF...");
      await mkdir(outputDir, { recursive: true });
      const artifactPath = path.join(outputDir, `${token}.pdf`);
      await composeDocument(artifacts, artifactPath);

      this.write(token, {
        progress: 100,
        status: "Complete!",
        error: null,
        createdAt: req.createdAt,
        completedAt: this.now(),
        completed: true,
        artifactPath,
      });
      console.log(`[orchestrator] Book generation completed for session ${token}`);
    } catch (e) {
      if (e instanceof JobPurgedError) {
        console.warn(`[orchestrator] ${e.message}`);
        return;
      }
      const message = errorMessage(e);
      console.error(`[orchestrator] Error in book generation for session ${token}:`, e);
      this.deps.store.put(token, {
        progress: 0,
        status: `Error: ${message}`,
        error: message,
        createdAt: req.createdAt,
        completedAt: null,
        completed: false,
        artifactPath: null,
      });
    }
  }
}
