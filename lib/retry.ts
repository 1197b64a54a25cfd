export type RetryBackoff = "linear" | "exponential";

export type RetryOptions = {
  /** Total attempts including the first call. */
  maxAttempts: number;
  baseDelayMs: number;
  backoff?: RetryBackoff;
  /** Used in log lines, e.g. "[Mailer] send". */
  label?: string;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// linear: 1x, 2x, 3x base. exponential: 2x, 4x, 8x base.
export function computeRetryDelayMs(attempt: number, baseDelayMs: number, backoff: RetryBackoff = "linear"): number {
  const base = Math.max(0, baseDelayMs);
  const n = Math.max(1, Math.trunc(attempt));
  return backoff === "exponential" ? Math.pow(2, n) * base : n * base;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.min(10, Math.trunc(opts.maxAttempts) || 1));
  const wait = opts.sleep ?? sleep;
  const label = opts.label ?? "[Retry]";

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const retryable = opts.isRetryable ? opts.isRetryable(error) : true;
      if (!retryable || attempt >= maxAttempts) break;

      const delayMs = computeRetryDelayMs(attempt, opts.baseDelayMs, opts.backoff);
      console.warn(`${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs / 1000}s...`, error);
      await wait(delayMs);
    }
  }

  throw lastError;
}
