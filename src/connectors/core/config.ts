import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { CREDENTIAL_METHODS, EXPORT_FORMATS } from "./types.js";
import type { AppConfig, AppPaths, Logger } from "./types.js";

export const CONFIG_HOME_ENV = "DISCORD_CHAT_FETCHER_HOME";

export function resolvePaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): AppPaths {
  const configDir =
    env[CONFIG_HOME_ENV]?.trim() || path.join(home, ".discord_chat_fetcher");
  return {
    configDir,
    configFile: path.join(configDir, "config.json"),
    credentialsFile: path.join(configDir, "credentials.json"),
    defaultSaveDir: path.join(home, "Discord_Chat_Fetcher_Messages"),
  };
}

export function defaultConfig(paths: AppPaths): AppConfig {
  return {
    saveDir: paths.defaultSaveDir,
    credentialStorage: "keyring",
    defaultCount: 1000,
    defaultFormat: "txt",
    pageSize: 100,
    minDelayMs: 250,
    maxRetries: 3,
    rateLimitRetries: 1,
  };
}

/** Each field falls back to its default on its own when missing or invalid. */
function configSchema(defaults: AppConfig) {
  const count = (fallback: number, max: number) =>
    z.number().int().min(0).max(max).default(fallback).catch(fallback);
  return z.object({
    saveDir: z.string().min(1).default(defaults.saveDir).catch(defaults.saveDir),
    credentialStorage: z
      .enum(CREDENTIAL_METHODS)
      .default(defaults.credentialStorage)
      .catch(defaults.credentialStorage),
    defaultCount: z
      .number()
      .int()
      .positive()
      .default(defaults.defaultCount)
      .catch(defaults.defaultCount),
    defaultFormat: z
      .enum(EXPORT_FORMATS)
      .default(defaults.defaultFormat)
      .catch(defaults.defaultFormat),
    pageSize: z
      .number()
      .int()
      .min(1)
      .max(100)
      .default(defaults.pageSize)
      .catch(defaults.pageSize),
    minDelayMs: count(defaults.minDelayMs, 60_000),
    maxRetries: count(defaults.maxRetries, 10),
    rateLimitRetries: count(defaults.rateLimitRetries, 10),
  });
}

export class ConfigStore {
  private readonly paths: AppPaths;
  private readonly logger: Logger;

  constructor(paths: AppPaths, logger: Logger) {
    this.paths = paths;
    this.logger = logger;
  }

  get filePath(): string {
    return this.paths.configFile;
  }

  load(): AppConfig {
    const defaults = defaultConfig(this.paths);
    let raw: string;
    try {
      raw = fs.readFileSync(this.paths.configFile, "utf-8");
    } catch {
      return defaults;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn("Config file is invalid, using defaults", {
        file: this.paths.configFile,
      });
      return defaults;
    }

    const result = configSchema(defaults).safeParse(parsed);
    if (!result.success) {
      this.logger.warn("Config file is invalid, using defaults", {
        file: this.paths.configFile,
      });
      return defaults;
    }
    return result.data;
  }

  save(config: AppConfig): void {
    fs.mkdirSync(this.paths.configDir, { recursive: true });
    const tmp = `${this.paths.configFile}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(config, null, 2));
    fs.renameSync(tmp, this.paths.configFile);
  }

  /**
   * Make sure the save directory exists. If it cannot be created, switch
   * back to the default directory and persist that choice.
   */
  ensureSaveDir(config: AppConfig): AppConfig {
    try {
      fs.mkdirSync(config.saveDir, { recursive: true });
      return config;
    } catch (err) {
      this.logger.warn(
        `Could not create save directory ${config.saveDir}: ${errorMessage(err)}`,
      );
    }
    const fallback = { ...config, saveDir: this.paths.defaultSaveDir };
    fs.mkdirSync(fallback.saveDir, { recursive: true });
    this.save(fallback);
    return fallback;
  }
}
