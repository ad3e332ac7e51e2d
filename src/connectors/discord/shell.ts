/**
 * Interactive shell: a menu state machine.
 *
 * Each screen is a tagged `ShellState`; a handler turns the current state
 * into the next one and `TRANSITIONS` lists which moves are legal.
 * Cancelling any prompt goes back to the main menu without side effects.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type {
  AppConfig,
  ConfigStore,
  CredentialManager,
  CredentialMethod,
  ExportFormat,
  ExportResult,
  Logger,
} from "../core/index.js";
import {
  AuthError,
  CancelledError,
  CREDENTIAL_METHODS,
  EXPORT_FORMATS,
  errorMessage,
  isSkippableError,
  ValidationError,
} from "../core/index.js";
import type { Selection } from "./browser.js";
import { resolveChannel, resolveServer, serverName } from "./browser.js";
import type { ExportOptions, ExportRequest } from "./engine.js";
import type { Choice, Prompter } from "./prompter.js";
import { channelLabel } from "./transform.js";
import type { DiscordChannel, ExportBatch, ServerWithChannels } from "./types.js";
import { renderTxt } from "./writer.js";

// ─── States & Transitions ───

export type ShellState =
  | { kind: "mainMenu" }
  | { kind: "chooseScope" }
  | { kind: "chooseServer"; servers: ServerWithChannels[] }
  | { kind: "chooseChannel"; title: string; channels: DiscordChannel[] }
  | { kind: "chooseCount"; channel: DiscordChannel }
  | { kind: "chooseFormat"; channel: DiscordChannel; count: number }
  | { kind: "execute"; request: ExportRequest }
  | { kind: "configureDirectory" }
  | { kind: "configureTokenStorage" }
  | { kind: "manageToken" }
  | { kind: "exit" };

export type ShellStateKind = ShellState["kind"];

export const TRANSITIONS: Readonly<Record<ShellStateKind, readonly ShellStateKind[]>> = {
  mainMenu: [
    "chooseScope",
    "configureDirectory",
    "configureTokenStorage",
    "manageToken",
    "exit",
  ],
  chooseScope: ["chooseServer", "chooseChannel", "mainMenu"],
  chooseServer: ["chooseChannel", "mainMenu"],
  chooseChannel: ["chooseCount", "mainMenu"],
  chooseCount: ["chooseFormat", "mainMenu"],
  chooseFormat: ["execute", "mainMenu"],
  execute: ["mainMenu"],
  configureDirectory: ["mainMenu"],
  configureTokenStorage: ["mainMenu"],
  manageToken: ["mainMenu"],
  exit: [],
};

const MAIN_MENU: ShellState = { kind: "mainMenu" };

export function assertTransition(from: ShellStateKind, to: ShellStateKind): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal shell transition ${from} -> ${to}`);
  }
}

// ─── Dependencies ───

export interface ShellBrowser {
  loadDirectMessages(): Promise<DiscordChannel[]>;
  loadServers(): Promise<ServerWithChannels[]>;
}

export interface ShellExporter {
  exportChannel(request: ExportRequest, options?: ExportOptions): Promise<ExportResult>;
}

export interface ShellDeps {
  prompter: Prompter;
  browser: ShellBrowser;
  /** Build an exporter for the current config (the save directory may change). */
  createExporter: (config: AppConfig) => ShellExporter;
  credentials: CredentialManager;
  configStore: Pick<ConfigStore, "save">;
  logger: Logger;
  config: AppConfig;
  /** Token in use this session, offered when switching storage. */
  token?: string;
  print?: (line: string) => void;
}

const FORMAT_TITLES: Record<ExportFormat, string> = {
  txt: "TXT - Plain text file (human readable)",
  json: "JSON - Structured data format",
  csv: "CSV - Spreadsheet compatible format",
  md: "Markdown - Frontmatter + date sections",
};

const STORAGE_TITLES: Record<CredentialMethod, string> = {
  keyring: "System keyring (secure)",
  file: "Plaintext file in the config directory",
  env: "DISCORD_TOKEN environment variable / .env",
  none: "Don't store, ask every run",
};

/** Parse a positive message count; blank input means `fallback`. */
export function parseCount(input: string, fallback: number): number {
  const trimmed = input.trim();
  if (!trimmed) return fallback;
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError("Count must be a whole number", { input });
  }
  const count = Number.parseInt(trimmed, 10);
  if (count <= 0) {
    throw new ValidationError("Count must be positive", { input });
  }
  return count;
}

export function expandHome(dir: string, home: string = os.homedir()): string {
  if (dir === "~") return home;
  if (dir.startsWith("~/") || dir.startsWith("~\\")) {
    return path.join(home, dir.slice(2));
  }
  return dir;
}

// ─── Shell ───

export class InteractiveShell {
  private readonly deps: ShellDeps;
  private readonly print: (line: string) => void;
  private currentConfig: AppConfig;

  constructor(deps: ShellDeps) {
    this.deps = deps;
    this.currentConfig = { ...deps.config };
    this.print = deps.print ?? ((line) => console.log(line));
  }

  get config(): AppConfig {
    return { ...this.currentConfig };
  }

  async run(): Promise<void> {
    let state: ShellState = MAIN_MENU;
    while (state.kind !== "exit") {
      const next = await this.step(state);
      assertTransition(state.kind, next.kind);
      state = next;
    }
  }

  async step(state: ShellState): Promise<ShellState> {
    switch (state.kind) {
      case "mainMenu":
        return this.mainMenu();
      case "chooseScope":
        return this.chooseScope();
      case "chooseServer":
        return this.chooseServer(state.servers);
      case "chooseChannel":
        return this.chooseChannel(state.title, state.channels);
      case "chooseCount":
        return this.chooseCount(state.channel);
      case "chooseFormat":
        return this.chooseFormat(state.channel, state.count);
      case "execute":
        return this.execute(state.request);
      case "configureDirectory":
        return this.configureDirectory();
      case "configureTokenStorage":
        return this.configureTokenStorage();
      case "manageToken":
        return this.manageToken();
      case "exit":
        return state;
    }
  }

  // ─── Screens ───

  private async mainMenu(): Promise<ShellState> {
    const choice = await this.deps.prompter.select("What would you like to do?", [
      { title: "Fetch messages", value: "fetch" },
      {
        title: "Set save directory",
        value: "directory",
        description: this.currentConfig.saveDir,
      },
      {
        title: "Set token storage",
        value: "storage",
        description: this.currentConfig.credentialStorage,
      },
      { title: "Manage token", value: "token" },
      { title: "Exit", value: "exit" },
    ]);

    switch (choice) {
      case "fetch":
        return { kind: "chooseScope" };
      case "directory":
        return { kind: "configureDirectory" };
      case "storage":
        return { kind: "configureTokenStorage" };
      case "token":
        return { kind: "manageToken" };
      default:
        return { kind: "exit" };
    }
  }

  private async chooseScope(): Promise<ShellState> {
    const scope = await this.deps.prompter.select("What would you like to access?", [
      { title: "Direct Messages", value: "dm" },
      { title: "Server Channels", value: "server" },
      { title: "Back to main menu", value: "back" },
    ]);

    try {
      if (scope === "dm") {
        const channels = await this.deps.browser.loadDirectMessages();
        if (channels.length === 0) {
          this.deps.logger.warn("No accessible DM channels found.");
          return MAIN_MENU;
        }
        return { kind: "chooseChannel", title: "Direct Messages", channels };
      }
      if (scope === "server") {
        const servers = await this.deps.browser.loadServers();
        if (servers.length === 0) {
          this.deps.logger.warn("No accessible servers found.");
          return MAIN_MENU;
        }
        return { kind: "chooseServer", servers };
      }
    } catch (err) {
      if (!isSkippableError(err)) throw err;
      this.deps.logger.error(`Could not load channels: ${errorMessage(err)}`);
    }
    return MAIN_MENU;
  }

  private async chooseServer(servers: ServerWithChannels[]): Promise<ShellState> {
    this.print("\nAvailable Servers");
    servers.forEach((entry, i) => {
      this.print(`${i + 1}. ${entry.server.name} (${entry.channels.length} channels)`);
    });

    const picked = await this.pick(
      servers,
      "Select a server by number or enter a name to search",
      resolveServer,
      serverName,
    );
    if (!picked) return MAIN_MENU;
    this.deps.logger.info(`Selected server: ${picked.server.name}`);
    return {
      kind: "chooseChannel",
      title: `Channels in ${picked.server.name}`,
      channels: picked.channels,
    };
  }

  private async chooseChannel(
    title: string,
    channels: DiscordChannel[],
  ): Promise<ShellState> {
    this.print(`\n${title}`);
    channels.forEach((ch, i) => {
      this.print(`${i + 1}. ${displayName(ch)}`);
    });

    const picked = await this.pick(
      channels,
      "Select a channel by number or enter a name to search",
      resolveChannel,
      displayName,
    );
    if (!picked) return MAIN_MENU;
    this.deps.logger.info(`Selected: ${channelLabel(picked)}`);
    return { kind: "chooseCount", channel: picked };
  }

  private async chooseCount(channel: DiscordChannel): Promise<ShellState> {
    const fallback = this.currentConfig.defaultCount;
    for (;;) {
      const input = await this.deps.prompter.text(
        "How many messages do you want to fetch?",
        String(fallback),
      );
      if (input === undefined) return MAIN_MENU;
      try {
        return { kind: "chooseFormat", channel, count: parseCount(input, fallback) };
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        this.deps.logger.warn(err.message);
      }
    }
  }

  private async chooseFormat(
    channel: DiscordChannel,
    count: number,
  ): Promise<ShellState> {
    const choices: Choice<ExportFormat>[] = EXPORT_FORMATS.map((format) => ({
      title: FORMAT_TITLES[format],
      value: format,
    }));
    const format = await this.deps.prompter.select(
      "Choose file format",
      choices,
      this.currentConfig.defaultFormat,
    );
    if (!format) return MAIN_MENU;
    return { kind: "execute", request: { channel, count, format } };
  }

  private async execute(request: ExportRequest): Promise<ShellState> {
    const exporter = this.deps.createExporter(this.config);
    try {
      const result = await exporter.exportChannel(request, {
        review: (batch) => this.review(batch),
      });
      for (const err of result.errors) {
        this.deps.logger.warn(`${result.channelName}: ${err.error}`);
      }
      if (result.filePath) {
        this.deps.logger.info(`Messages saved to ${result.filePath}`);
      }
    } catch (err) {
      if (err instanceof AuthError) throw err;
      if (err instanceof CancelledError) {
        this.deps.logger.warn("Fetch cancelled, nothing was saved.");
      } else {
        this.deps.logger.error(`Export failed: ${errorMessage(err)}`);
      }
    }
    return MAIN_MENU;
  }

  /** Print the fetched messages grouped by date and ask before saving. */
  private async review(batch: ExportBatch): Promise<boolean> {
    for (const line of renderTxt(batch).trimEnd().split("\n")) {
      this.print(line);
    }
    const save = await this.deps.prompter.confirm(
      "Do you want to save these messages to a file?",
      true,
    );
    return save === true;
  }

  private async configureDirectory(): Promise<ShellState> {
    const input = await this.deps.prompter.text(
      "Directory to save exports in",
      this.currentConfig.saveDir,
    );
    if (input === undefined || !input.trim()) return MAIN_MENU;

    const dir = path.resolve(expandHome(input.trim()));
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      this.deps.logger.error(`Could not create ${dir}: ${errorMessage(err)}`);
      return MAIN_MENU;
    }
    this.updateConfig({ saveDir: dir });
    this.deps.logger.info(`Exports will be saved to ${dir}`);
    return MAIN_MENU;
  }

  private async configureTokenStorage(): Promise<ShellState> {
    const choices: Choice<CredentialMethod>[] = CREDENTIAL_METHODS.map((method) => ({
      title: STORAGE_TITLES[method],
      value: method,
    }));
    const method = await this.deps.prompter.select(
      "Where should the token be stored?",
      choices,
      this.currentConfig.credentialStorage,
    );
    if (!method) return MAIN_MENU;

    const { token } = this.deps;
    if (token && (method === "keyring" || method === "file")) {
      try {
        await this.deps.credentials.save(token, method);
        this.deps.logger.info(`Token saved to ${method}.`);
      } catch (err) {
        this.deps.logger.error(`Could not save token to ${method}: ${errorMessage(err)}`);
        return MAIN_MENU;
      }
    }
    if (method === "env") {
      this.deps.logger.info("Set DISCORD_TOKEN in your environment or .env file.");
    }

    this.updateConfig({ credentialStorage: method });
    return MAIN_MENU;
  }

  private async manageToken(): Promise<ShellState> {
    const action = await this.deps.prompter.select("Manage token", [
      { title: "Replace stored token", value: "replace" },
      { title: "Clear stored token", value: "clear" },
      { title: "Back to main menu", value: "back" },
    ]);

    if (action === "replace") {
      const method = this.currentConfig.credentialStorage;
      if (method === "none" || method === "env") {
        this.deps.logger.warn(
          `Token storage is set to ${method}, so no token can be stored. Choose keyring or file storage first.`,
        );
        return MAIN_MENU;
      }
      const token = await this.deps.prompter.password("New Discord token");
      if (token === undefined) return MAIN_MENU;
      try {
        await this.deps.credentials.save(token, method);
        this.deps.logger.info(`Token saved to ${method}. It will be used from the next run.`);
      } catch (err) {
        this.deps.logger.error(`Could not save token: ${errorMessage(err)}`);
      }
    } else if (action === "clear") {
      const sure = await this.deps.prompter.confirm(
        "Remove the stored token from keyring and file storage?",
      );
      if (sure) {
        await this.deps.credentials.clear();
        this.deps.logger.info("Stored token cleared.");
      }
    }
    return MAIN_MENU;
  }

  // ─── Helpers ───

  /** Apply `patch` for this session and persist it. */
  private updateConfig(patch: Partial<AppConfig>): void {
    this.currentConfig = { ...this.currentConfig, ...patch };
    try {
      this.deps.configStore.save(this.currentConfig);
    } catch (err) {
      this.deps.logger.error(
        `Could not save settings, they apply to this session only: ${errorMessage(err)}`,
      );
    }
  }

  /**
   * Ask until the input resolves to one item. Resolves to undefined when
   * the operator cancels.
   */
  private async pick<T>(
    items: T[],
    message: string,
    resolve: (items: readonly T[], input: string) => Selection<T>,
    nameOf: (item: T) => string,
  ): Promise<T | undefined> {
    for (;;) {
      const input = await this.deps.prompter.text(message, "1");
      if (input === undefined) return undefined;

      const selection = resolve(items, input);
      switch (selection.kind) {
        case "selected":
          return selection.item;
        case "none":
          this.deps.logger.warn(`Nothing found matching "${selection.term}".`);
          continue;
        case "ambiguous": {
          const chosen = await this.pickMatch(selection.matches, nameOf);
          if (chosen !== undefined) return chosen;
          continue;
        }
        case "invalid":
          this.deps.logger.warn(selection.reason);
          continue;
      }
    }
  }

  private async pickMatch<T>(
    matches: T[],
    nameOf: (item: T) => string,
  ): Promise<T | undefined> {
    const choices = matches.map((item, i) => ({
      title: nameOf(item),
      value: String(i),
    }));
    const picked = await this.deps.prompter.select(
      `Found ${matches.length} matches`,
      choices,
    );
    return picked === undefined ? undefined : matches[Number(picked)];
  }
}

function displayName(channel: DiscordChannel): string {
  return channel.kind === "server-channel" ? `#${channel.name}` : channel.name;
}
