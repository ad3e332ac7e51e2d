/**
 * Error taxonomy shared by every component.
 *
 * `AuthError` is fatal and `CancelledError` ends the current run. Every
 * other `FetcherError` (permission, rate limit, network, unexpected status
 * or payload, write failure) skips the affected channel only.
 * `ValidationError` makes the shell re-prompt.
 */

export interface FetcherErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
  readonly retryable?: boolean;
}

export class FetcherError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly retryable: boolean;

  public constructor(options: FetcherErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = "FetcherError";
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.retryable = options.retryable ?? false;

    Error.captureStackTrace?.(this, new.target);
  }
}

export class AuthError extends FetcherError {
  public constructor(message: string, metadata?: Record<string, unknown>) {
    super({ code: "AUTH_FAILED", message, metadata });
    this.name = "AuthError";
  }
}

export class NetworkError extends FetcherError {
  public readonly status: number | undefined;

  public constructor(
    message: string,
    options: { status?: number; cause?: unknown; url?: string } = {},
  ) {
    super({
      code: "NETWORK_ERROR",
      message,
      cause: options.cause,
      metadata: { status: options.status, url: options.url },
      retryable: true,
    });
    this.name = "NetworkError";
    this.status = options.status;
  }
}

export class RateLimitedError extends FetcherError {
  public constructor(resource: string, retryAfterMs: number) {
    super({
      code: "RATE_LIMITED",
      message: `Rate limited repeatedly on ${resource}`,
      metadata: { resource, retryAfterMs },
    });
    this.name = "RateLimitedError";
  }
}

export class PermissionError extends FetcherError {
  public readonly status: number;

  public constructor(resource: string, status: number) {
    super({
      code: status === 404 ? "NOT_FOUND" : "FORBIDDEN",
      message:
        status === 404
          ? `${resource} was not found`
          : `No permission to read ${resource}`,
      metadata: { resource, status },
    });
    this.name = "PermissionError";
    this.status = status;
  }
}

export class ValidationError extends FetcherError {
  public constructor(message: string, metadata?: Record<string, unknown>) {
    super({ code: "INVALID_INPUT", message, metadata });
    this.name = "ValidationError";
  }
}

export class FileSystemError extends FetcherError {
  public constructor(filePath: string, cause: unknown) {
    super({
      code: "WRITE_FAILED",
      message: `Could not write ${filePath}: ${errorMessage(cause)}`,
      cause,
      metadata: { filePath },
    });
    this.name = "FileSystemError";
  }
}

export class CancelledError extends FetcherError {
  public constructor(message = "Cancelled by user") {
    super({ code: "CANCELLED", message });
    this.name = "CancelledError";
  }
}

export const isFetcherError = (value: unknown): value is FetcherError =>
  value instanceof FetcherError;

/** Errors that skip one channel without ending the run. */
export function isSkippableError(err: unknown): err is FetcherError {
  return (
    isFetcherError(err) &&
    !(err instanceof AuthError) &&
    !(err instanceof CancelledError)
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
