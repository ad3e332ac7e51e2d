// Config
export {
  CONFIG_HOME_ENV,
  ConfigStore,
  defaultConfig,
  resolvePaths,
} from "./config.js";
// Credentials
export type {
  CredentialStore,
  CredentialStores,
  KeyringEntry,
  KeyringEntryFactory,
  LoadedCredential,
} from "./credentials.js";
export {
  CredentialManager,
  createCredentialStores,
  EnvCredentialStore,
  FileCredentialStore,
  KeyringCredentialStore,
  NoCredentialStore,
  normalizeToken,
  resolveCredential,
  TOKEN_ENV,
} from "./credentials.js";
// Errors
export {
  AuthError,
  CancelledError,
  errorMessage,
  FetcherError,
  FileSystemError,
  isFetcherError,
  isSkippableError,
  NetworkError,
  PermissionError,
  RateLimitedError,
  ValidationError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Output writer
export { createOutputWriter, FileOutputWriter } from "./output.js";
// Rate limiter
export {
  createRateLimiter,
  sleep,
  TokenBucketRateLimiter,
} from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { withRetry } from "./retry.js";
// File names
export { fileTimestamp, sanitizeFilename } from "./slugify.js";
// Types
export {
  CREDENTIAL_METHODS,
  EXPORT_FORMATS,
  isCredentialMethod,
  isExportFormat,
} from "./types.js";
export type {
  AppConfig,
  AppPaths,
  CredentialMethod,
  ExportError,
  ExportFormat,
  ExportResult,
  Logger,
  OutputWriter,
  RateLimiter,
  RateLimiterConfig,
} from "./types.js";
