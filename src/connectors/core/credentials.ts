/**
 * Credential storage backends.
 *
 * One `CredentialStore` interface with four implementations picked by the
 * `credentialStorage` config value: OS keyring, plaintext file, the
 * `DISCORD_TOKEN` environment variable (read-only), or nothing at all.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { AuthError, ValidationError, errorMessage } from "./errors.js";
import type { AppPaths, CredentialMethod, Logger } from "./types.js";

export const TOKEN_ENV = "DISCORD_TOKEN";
export const KEYRING_SERVICE = "discord_chat_fetcher";
export const KEYRING_ACCOUNT = "discord_token";

// ─── Interface ───

export interface CredentialStore {
  readonly method: CredentialMethod;
  load(): Promise<string | null>;
  save(token: string): Promise<void>;
  clear(): Promise<void>;
}

export interface LoadedCredential {
  token: string;
  source: CredentialMethod;
}

/**
 * Trim whitespace and one pair of wrapping quotes, as pasted tokens and
 * `.env` values often carry them. Returns null for an empty result.
 */
export function normalizeToken(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  let token = raw.trim();
  const quoted = /^(["'])(.*)\1$/s.exec(token);
  if (quoted) token = (quoted[2] ?? "").trim();
  return token.length > 0 ? token : null;
}

// ─── Keyring ───

export interface KeyringEntry {
  getPassword(): string | null | undefined;
  setPassword(password: string): void;
  deletePassword(): boolean | void;
}

export type KeyringEntryFactory = (
  service: string,
  account: string,
) => Promise<KeyringEntry>;

// Loaded lazily so a missing native binding only affects the keyring backend
const defaultKeyringFactory: KeyringEntryFactory = async (service, account) => {
  const { Entry } = await import("@napi-rs/keyring");
  return new Entry(service, account);
};

export class KeyringCredentialStore implements CredentialStore {
  readonly method = "keyring" as const;
  private readonly createEntry: KeyringEntryFactory;
  private readonly logger: Logger;

  constructor(logger: Logger, createEntry = defaultKeyringFactory) {
    this.logger = logger;
    this.createEntry = createEntry;
  }

  private entry(): Promise<KeyringEntry> {
    return this.createEntry(KEYRING_SERVICE, KEYRING_ACCOUNT);
  }

  async load(): Promise<string | null> {
    try {
      const entry = await this.entry();
      return normalizeToken(entry.getPassword());
    } catch (err) {
      this.logger.warn(`Could not load from keyring: ${errorMessage(err)}`);
      return null;
    }
  }

  async save(token: string): Promise<void> {
    const entry = await this.entry();
    entry.setPassword(token);
  }

  async clear(): Promise<void> {
    const entry = await this.entry();
    entry.deletePassword();
  }
}

// ─── Plaintext file ───

export class FileCredentialStore implements CredentialStore {
  readonly method = "file" as const;
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  async load(): Promise<string | null> {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch {
      return null;
    }
    try {
      const data: unknown = JSON.parse(raw);
      if (typeof data === "object" && data !== null && "token" in data) {
        return typeof data.token === "string" ? normalizeToken(data.token) : null;
      }
    } catch {
      this.logger.warn("Credentials file is invalid", { file: this.filePath });
    }
    return null;
  }

  async save(token: string): Promise<void> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify({ token }), { mode: 0o600 });
  }

  async clear(): Promise<void> {
    fs.rmSync(this.filePath, { force: true });
  }
}

// ─── Environment variable ───

export class EnvCredentialStore implements CredentialStore {
  readonly method = "env" as const;
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async load(): Promise<string | null> {
    return normalizeToken(this.env[TOKEN_ENV]);
  }

  async save(): Promise<void> {
    throw new ValidationError(
      `${TOKEN_ENV} is read from the environment and cannot be saved; set it in your shell or .env file`,
    );
  }

  async clear(): Promise<void> {
    // Nothing persisted
  }
}

// ─── Prompt every run ───

export class NoCredentialStore implements CredentialStore {
  readonly method = "none" as const;

  async load(): Promise<string | null> {
    return null;
  }

  async save(): Promise<void> {
    // Token is held in memory only
  }

  async clear(): Promise<void> {
    // Nothing persisted
  }
}

// ─── Manager ───

export type CredentialStores = Record<CredentialMethod, CredentialStore>;

export function createCredentialStores(
  paths: AppPaths,
  logger: Logger,
  options: { env?: NodeJS.ProcessEnv; keyring?: KeyringEntryFactory } = {},
): CredentialStores {
  return {
    keyring: new KeyringCredentialStore(logger, options.keyring),
    file: new FileCredentialStore(paths.credentialsFile, logger),
    env: new EnvCredentialStore(options.env),
    none: new NoCredentialStore(),
  };
}

export class CredentialManager {
  private readonly stores: CredentialStores;
  private readonly logger: Logger;

  constructor(stores: CredentialStores, logger: Logger) {
    this.stores = stores;
    this.logger = logger;
  }

  /** The environment wins over the configured backend. */
  async load(method: CredentialMethod): Promise<LoadedCredential | null> {
    const fromEnv = await this.stores.env.load();
    if (fromEnv) return { token: fromEnv, source: "env" };

    if (method === "env") return null;
    const token = await this.stores[method].load();
    return token ? { token, source: method } : null;
  }

  async save(token: string, method: CredentialMethod): Promise<void> {
    const normalized = normalizeToken(token);
    if (!normalized) {
      throw new ValidationError("Token must not be empty");
    }
    await this.stores[method].save(normalized);
  }

  /** Remove the token from every backend that persists it. */
  async clear(): Promise<void> {
    for (const method of ["keyring", "file"] as const) {
      try {
        await this.stores[method].clear();
      } catch (err) {
        this.logger.warn(`Could not clear ${method} credential: ${errorMessage(err)}`);
      }
    }
  }
}

/**
 * Load the token, or ask for it when nothing is stored. Fails with
 * `AuthError` when neither yields a token.
 */
export async function resolveCredential(
  manager: CredentialManager,
  method: CredentialMethod,
  askSecret?: () => Promise<string | undefined>,
): Promise<LoadedCredential> {
  const loaded = await manager.load(method);
  if (loaded) return loaded;

  const entered = askSecret ? normalizeToken(await askSecret()) : null;
  if (!entered) {
    throw new AuthError(
      `No Discord token found. Set ${TOKEN_ENV} or store one with "token set".`,
    );
  }
  return { token: entered, source: "none" };
}
