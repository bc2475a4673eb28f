/**
 * Retry + pacing helpers shared by the outbound calls.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export interface RetryOptions {
  attempts: number;
  /** Delay before retry n is baseDelayMs * 2^(n-1). */
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function withRetries<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  { attempts, baseDelayMs, sleep: wait = sleep }: RetryOptions
): Promise<T> {
  let lastErr: unknown = null;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      if (attempt > 1) console.log(`[retry] ${label}: attempt ${attempt}/${attempts}...`);
      return await fn(attempt);
    } catch (e) {
      lastErr = e;
      if (attempt === attempts) break;
      await wait(baseDelayMs * Math.pow(2, attempt - 1));
    }
  }
  throw lastErr;
}

/**
 * Fetch a generated image (http(s) or data: URL) with bounded retries.
 * Each attempt is capped by timeoutMs.
 */
export async function downloadImage(
  url: string,
  opts: RetryOptions & { timeoutMs: number }
): Promise<Buffer> {
  return withRetries(
    `download ${url.startsWith("data:") ? "inline image" : url}`,
    async () => {
      const resp = await fetch(url, { signal: AbortSignal.timeout(opts.timeoutMs) });
      if (!resp.ok) {
        throw new Error(`Image download failed (HTTP ${resp.status})`);
      }
      return Buffer.from(await resp.arrayBuffer());
    },
    opts
  );
}
