export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

function statusOf(err: unknown): number | undefined {
  if (err == null || typeof err !== "object" || !("status" in err)) {
    return undefined;
  }
  return typeof err.status === "number" ? err.status : undefined;
}

/** Network-level failures from fetch, including per-request timeouts. */
export function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "TimeoutError" || err.name === "AbortError") return true;
  const msg = err.message.toLowerCase();
  return (
    msg.includes("econnreset") ||
    msg.includes("etimedout") ||
    msg.includes("enotfound") ||
    msg.includes("socket hang up") ||
    msg.includes("fetch failed")
  );
}

export function isRetryableError(err: unknown): boolean {
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  return status !== undefined && status >= 500 && status < 600;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const retryOn = opts.retryOn ?? isRetryableError;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !retryOn(err)) {
        throw err;
      }
      // Exponential backoff with jitter
      const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);
      const jittered = delay + delay * 0.1 * Math.random();
      opts.onRetry?.(err, attempt + 1, Math.round(jittered));
      await sleep(jittered);
    }
  }
  throw lastError;
}
