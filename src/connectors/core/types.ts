/** Core type definitions for discord-chat-fetcher. */

// ─── Export Formats ───

export const EXPORT_FORMATS = ["txt", "json", "csv", "md"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Credential Storage ───

export const CREDENTIAL_METHODS = ["keyring", "file", "env", "none"] as const;

export type CredentialMethod = (typeof CREDENTIAL_METHODS)[number];

export function isCredentialMethod(value: string): value is CredentialMethod {
  return CREDENTIAL_METHODS.some((method) => method === value);
}

// ─── App Config (persisted in config.json) ───

export interface AppConfig {
  saveDir: string;
  credentialStorage: CredentialMethod;
  defaultCount: number;
  defaultFormat: ExportFormat;
  pageSize: number;
  minDelayMs: number;
  maxRetries: number;
  rateLimitRetries: number;
}

export interface AppPaths {
  configDir: string;
  configFile: string;
  credentialsFile: string;
  defaultSaveDir: string;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  /** Minimum spacing between consecutive requests. */
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  /**
   * Write a new file under `relativeDir`. Never overwrites: when
   * `fileName` is taken a `_2`, `_3`, ... suffix is added before the
   * extension. Resolves to the path written.
   */
  writeExport(
    relativeDir: string,
    fileName: string,
    content: string,
  ): Promise<string>;
}

// ─── Export Results ───

export interface ExportError {
  entity: string;
  error: string;
  code: string;
  retryable: boolean;
}

export interface ExportResult {
  channelId: string;
  channelName: string;
  format: ExportFormat;
  messagesExported: number;
  filePath: string | null;
  errors: ExportError[];
  durationMs: number;
}
