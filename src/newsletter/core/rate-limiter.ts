import { sleep } from "./retry.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

/**
 * Sliding-window limiter shared by every Graph call of a process. A 429 from
 * any caller pushes `backoffUntil` forward for all of them.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;

  private requestTimestamps: number[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
  }

  async acquire(): Promise<void> {
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now);
    }

    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }
    }

    if (this.maxRequests < Infinity) {
      this.pruneWindow();
      if (this.requestTimestamps.length >= this.maxRequests) {
        const oldest = this.requestTimestamps[0] ?? Date.now();
        await sleep(this.windowMs - (Date.now() - oldest) + 50);
        this.pruneWindow();
      }
      this.requestTimestamps.push(Date.now());
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  private pruneWindow(): void {
    const cutoff = Date.now() - this.windowMs;
    this.requestTimestamps = this.requestTimestamps.filter((ts) => ts > cutoff);
  }
}

/** Graph allows 10,000 requests per 10 minutes per mailbox. */
export const GRAPH_RATE_LIMIT: RateLimiterConfig = {
  maxRequests: 10_000,
  windowMs: 600_000,
};

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new SlidingWindowRateLimiter(config);
}
