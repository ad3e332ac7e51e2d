import type { RateLimiter, RateLimiterConfig } from "./types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly minDelayMs: number;

  private backoffUntil = 0;
  private lastCallAt = 0;

  // Bucket state reported by the last response
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.minDelayMs = config.minDelayMs ?? 0;
  }

  async acquire(): Promise<void> {
    // Wait for backoff (429 response)
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now);
    }

    // Bucket exhausted: wait for it to refill
    if (this.remainingRequests !== null && this.remainingRequests < 1) {
      if (this.resetAt && this.resetAt > Date.now()) {
        await sleep(this.resetAt - Date.now() + 50);
      }
      this.remainingRequests = null;
    }

    // Fixed floor between consecutive requests, regardless of headers
    if (this.minDelayMs > 0 && this.lastCallAt > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining = headers["x-ratelimit-remaining"];
    if (remaining !== undefined) {
      const parsed = parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    // Discord reports seconds until reset as a float
    const resetAfter = headers["x-ratelimit-reset-after"];
    if (resetAfter !== undefined) {
      const seconds = parseFloat(resetAfter);
      if (!Number.isNaN(seconds)) {
        this.resetAt = Date.now() + seconds * 1000;
      }
    }
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
