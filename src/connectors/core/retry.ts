import { isFetcherError } from "./errors.js";
import { sleep } from "./rate-limiter.js";

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

const TRANSIENT_MESSAGES = [
  "econnreset",
  "etimedout",
  "enotfound",
  "eai_again",
  "socket hang up",
  "fetch failed",
];

function isRetryableError(err: unknown): boolean {
  if (isFetcherError(err)) return err.retryable;
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (TRANSIENT_MESSAGES.some((needle) => msg.includes(needle))) {
      return true;
    }
  }
  return false;
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
      const jitter = delay * 0.1 * Math.random();
      opts.onRetry?.(err, attempt + 1, delay + jitter);
      await sleep(delay + jitter);
    }
  }
  throw lastError;
}
