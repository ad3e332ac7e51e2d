import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultConfig, resolvePaths } from "../../../src/connectors/core/config.js";
import {
  CredentialManager,
  createCredentialStores,
} from "../../../src/connectors/core/credentials.js";
import type { KeyringEntryFactory } from "../../../src/connectors/core/credentials.js";
import {
  AuthError,
  CancelledError,
  FetcherError,
  NetworkError,
  ValidationError,
} from "../../../src/connectors/core/errors.js";
import type {
  AppConfig,
  AppPaths,
  ExportResult,
} from "../../../src/connectors/core/types.js";
import type { ShellExporter } from "../../../src/connectors/discord/shell.js";
import { FileOutputWriter } from "../../../src/connectors/core/output.js";
import { ExportEngine } from "../../../src/connectors/discord/engine.js";
import type {
  ExportOptions,
  ExportRequest,
} from "../../../src/connectors/discord/engine.js";
import type { Choice, Prompter } from "../../../src/connectors/discord/prompter.js";
import {
  assertTransition,
  expandHome,
  InteractiveShell,
  parseCount,
  TRANSITIONS,
} from "../../../src/connectors/discord/shell.js";
import { createTestLogger } from "../helpers.js";
import { dmWithBob, general, random, sampleMessages } from "./fixtures.js";

type Answer = string | boolean | undefined;

/** Answers prompts from a fixed script; `undefined` means the operator cancelled. */
class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly answers: Answer[];

  constructor(answers: Answer[]) {
    this.answers = [...answers];
  }

  private next(message: string): Answer {
    this.asked.push(message);
    if (this.answers.length === 0) {
      throw new Error(`No scripted answer for "${message}"`);
    }
    return this.answers.shift();
  }

  async select<T extends string>(message: string, choices: Choice<T>[]): Promise<T | undefined> {
    const answer = this.next(message);
    if (answer === undefined) return undefined;
    const choice = choices.find((c) => c.value === answer);
    if (!choice) throw new Error(`"${String(answer)}" is not a choice for "${message}"`);
    return choice.value;
  }

  async text(message: string): Promise<string | undefined> {
    const answer = this.next(message);
    return typeof answer === "string" ? answer : undefined;
  }

  async password(message: string): Promise<string | undefined> {
    const answer = this.next(message);
    return typeof answer === "string" ? answer : undefined;
  }

  async confirm(message: string): Promise<boolean | undefined> {
    const answer = this.next(message);
    return typeof answer === "boolean" ? answer : undefined;
  }
}

const MAIN_MENU = "What would you like to do?";
const SAVE_PROMPT = "Do you want to save these messages to a file?";
const KEY = "discord_chat_fetcher/discord_token";

function resultFor(request: ExportRequest): ExportResult {
  return {
    channelId: request.channel.id,
    channelName: request.channel.name,
    format: request.format,
    messagesExported: 3,
    filePath: `/exports/out.${request.format}`,
    errors: [],
    durationMs: 5,
  };
}

describe("InteractiveShell", () => {
  let tmpDir: string;
  let paths: AppPaths;
  let keyring: Map<string, string>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "discord-fetcher-shell-"));
    paths = resolvePaths({}, tmpDir);
    keyring = new Map();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createShell(
    answers: Answer[],
    overrides: {
      config?: Partial<AppConfig>;
      token?: string;
      exporter?: ShellExporter;
    } = {},
  ) {
    const prompter = new ScriptedPrompter(answers);
    const logger = createTestLogger();
    const factory: KeyringEntryFactory = async (service, account) => ({
      getPassword: () => keyring.get(`${service}/${account}`) ?? null,
      setPassword: (password: string) => {
        keyring.set(`${service}/${account}`, password);
      },
      deletePassword: () => keyring.delete(`${service}/${account}`),
    });
    const credentials = new CredentialManager(
      createCredentialStores(paths, logger, { env: {}, keyring: factory }),
      logger,
    );
    const browser = {
      loadDirectMessages: vi.fn(async () => [dmWithBob]),
      loadServers: vi.fn(async () => [
        {
          server: { id: "s1", name: "My Server", icon: null, owner: false },
          channels: [general, random],
        },
      ]),
    };
    const exporter = {
      exportChannel: vi.fn(async (request: ExportRequest, options?: ExportOptions) => {
        const batch = {
          channel: request.channel,
          messages: sampleMessages(),
          exportedAt: new Date("2024-02-01T12:00:00.000Z"),
        };
        const keep = options?.review ? await options.review(batch) : true;
        return keep
          ? resultFor(request)
          : { ...resultFor(request), filePath: null, messagesExported: 0 };
      }),
    };
    const createExporter = vi.fn(
      (_config: AppConfig): ShellExporter => overrides.exporter ?? exporter,
    );
    const configStore = { save: vi.fn((_config: AppConfig) => {}) };
    const print = vi.fn((_line: string) => {});

    const shell = new InteractiveShell({
      prompter,
      browser,
      createExporter,
      credentials,
      configStore,
      logger,
      config: { ...defaultConfig(paths), ...overrides.config },
      token: overrides.token,
      print,
    });
    return { shell, prompter, logger, browser, exporter, createExporter, configStore, print };
  }

  it("exports a DM with the default count", async () => {
    const { shell, exporter, logger, print } = createShell([
      "fetch",
      "dm",
      "1",
      "",
      "json",
      true,
      "exit",
    ]);

    await shell.run();

    expect(exporter.exportChannel).toHaveBeenCalledTimes(1);
    expect(exporter.exportChannel.mock.calls[0]?.[0]).toEqual({
      channel: dmWithBob,
      count: 1000,
      format: "json",
    });
    expect(print).toHaveBeenCalledWith("1. DM with bob");
    expect(logger.info).toHaveBeenCalledWith("Messages saved to /exports/out.json");
  });

  it("searches servers and channels and re-prompts bad counts", async () => {
    const { shell, exporter, logger } = createShell([
      "fetch",
      "server",
      "my",
      "r",
      "1",
      "abc",
      "0",
      "25",
      "csv",
      true,
      "exit",
    ]);

    await shell.run();

    expect(exporter.exportChannel.mock.calls[0]?.[0]).toEqual({
      channel: random,
      count: 25,
      format: "csv",
    });
    expect(logger.warn).toHaveBeenCalledWith("Count must be a whole number");
    expect(logger.warn).toHaveBeenCalledWith("Count must be positive");
  });

  it("re-prompts a list number out of range", async () => {
    const { shell, logger, exporter } = createShell([
      "fetch",
      "dm",
      "9",
      "1",
      "",
      undefined,
      "exit",
    ]);

    await shell.run();

    expect(logger.warn).toHaveBeenCalledWith("Choose a number between 1 and 1");
    expect(exporter.exportChannel).not.toHaveBeenCalled();
  });

  it("re-prompts blank list input with a hint", async () => {
    const { shell, logger, prompter } = createShell(["fetch", "dm", "  ", "1", undefined, "exit"]);

    await shell.run();

    expect(logger.warn).toHaveBeenCalledWith("Enter a number or a name to search");
    expect(prompter.asked.slice(2, 5)).toEqual([
      "Select a channel by number or enter a name to search",
      "Select a channel by number or enter a name to search",
      "How many messages do you want to fetch?",
    ]);
  });

  it("returns to the main menu when a step is cancelled", async () => {
    const { shell, prompter, exporter, configStore } = createShell([
      "fetch",
      "dm",
      "1",
      undefined,
      "exit",
    ]);

    await shell.run();

    expect(prompter.asked).toEqual([
      MAIN_MENU,
      "What would you like to access?",
      "Select a channel by number or enter a name to search",
      "How many messages do you want to fetch?",
      MAIN_MENU,
    ]);
    expect(exporter.exportChannel).not.toHaveBeenCalled();
    expect(configStore.save).not.toHaveBeenCalled();
  });

  it("ends the session when the main menu is cancelled", async () => {
    const { shell, prompter } = createShell([undefined]);
    await shell.run();
    expect(prompter.asked).toEqual([MAIN_MENU]);
  });

  it("reports a cancelled fetch and keeps running", async () => {
    const { shell, exporter, logger } = createShell(["fetch", "dm", "1", "10", "txt", "exit"]);
    exporter.exportChannel.mockRejectedValueOnce(new CancelledError("Fetch cancelled"));

    await shell.run();

    expect(logger.warn).toHaveBeenCalledWith("Fetch cancelled, nothing was saved.");
  });

  it("previews the messages and writes nothing when saving is declined", async () => {
    const outDir = path.join(tmpDir, "out");
    const logger = createTestLogger();
    const engine = new ExportEngine({
      api: { fetchHistory: async () => sampleMessages() },
      writer: new FileOutputWriter(outDir),
      logger,
      pageSize: 100,
    });
    const { shell, prompter, print, logger: shellLogger } = createShell(
      ["fetch", "dm", "1", "3", "txt", false, "exit"],
      { exporter: engine },
    );

    await shell.run();

    expect(print).toHaveBeenCalledWith("――――― Monday, January 15, 2024 ―――――");
    expect(print).toHaveBeenCalledWith("09:05:03 - Alice: Hello, world");
    expect(prompter.asked).toContain(SAVE_PROMPT);
    expect(fs.existsSync(outDir)).toBe(false);
    expect(shellLogger.info).not.toHaveBeenCalledWith(
      expect.stringContaining("Messages saved to"),
    );
  });

  it("writes the previewed messages when saving is confirmed", async () => {
    const outDir = path.join(tmpDir, "out");
    const engine = new ExportEngine({
      api: { fetchHistory: async () => sampleMessages() },
      writer: new FileOutputWriter(outDir),
      logger: createTestLogger(),
      pageSize: 100,
    });
    const { shell } = createShell(["fetch", "dm", "1", "3", "txt", true, "exit"], {
      exporter: engine,
    });

    await shell.run();

    expect(fs.readdirSync(path.join(outDir, "DM_with_bob"))).toHaveLength(1);
  });

  it("keeps running when a channel returns an unexpected payload", async () => {
    const engine = new ExportEngine({
      api: {
        fetchHistory: async () => {
          throw new FetcherError({
            code: "INVALID_RESPONSE",
            message: "Unexpected response from channels/d1/messages",
          });
        },
      },
      writer: new FileOutputWriter(path.join(tmpDir, "out")),
      logger: createTestLogger(),
      pageSize: 100,
    });
    const { shell, logger, prompter } = createShell(
      ["fetch", "dm", "1", "3", "txt", "exit"],
      { exporter: engine },
    );

    await shell.run();

    expect(logger.warn).toHaveBeenCalledWith(
      "DM with bob: Unexpected response from channels/d1/messages",
    );
    expect(prompter.asked.at(-1)).toBe(MAIN_MENU);
  });

  it("reports an unexpected export failure and returns to the menu", async () => {
    const { shell, exporter, logger } = createShell(["fetch", "dm", "1", "3", "txt", "exit"]);
    exporter.exportChannel.mockRejectedValueOnce(new Error("disk unplugged"));

    await shell.run();

    expect(logger.error).toHaveBeenCalledWith("Export failed: disk unplugged");
  });

  it("ends the session on an auth failure during export", async () => {
    const { shell, exporter } = createShell(["fetch", "dm", "1", "3", "txt"]);
    exporter.exportChannel.mockRejectedValueOnce(
      new AuthError("Token is invalid or expired"),
    );

    await expect(shell.run()).rejects.toBeInstanceOf(AuthError);
  });

  it("goes back to the menu when channels cannot be loaded", async () => {
    const { shell, browser, logger } = createShell(["fetch", "server", "exit"]);
    browser.loadServers.mockRejectedValueOnce(new NetworkError("HTTP 502", { status: 502 }));

    await shell.run();

    expect(logger.error).toHaveBeenCalledWith("Could not load channels: HTTP 502");
  });

  it("changes and persists the save directory", async () => {
    const target = path.join(tmpDir, "exports");
    const { shell, configStore } = createShell(["directory", target, "exit"]);

    await shell.run();

    expect(fs.statSync(target).isDirectory()).toBe(true);
    expect(shell.config.saveDir).toBe(target);
    expect(configStore.save).toHaveBeenCalledWith(expect.objectContaining({ saveDir: target }));
  });

  it("keeps the new directory for the session when settings cannot be saved", async () => {
    const target = path.join(tmpDir, "exports");
    const { shell, configStore, logger, prompter } = createShell([
      "directory",
      target,
      "exit",
    ]);
    configStore.save.mockImplementation(() => {
      throw new Error("read-only file system");
    });

    await shell.run();

    expect(shell.config.saveDir).toBe(target);
    expect(logger.error).toHaveBeenCalledWith(
      "Could not save settings, they apply to this session only: read-only file system",
    );
    expect(prompter.asked).toEqual([MAIN_MENU, "Directory to save exports in", MAIN_MENU]);
  });

  it("moves the session token to a new storage backend", async () => {
    const { shell, configStore } = createShell(["storage", "file", "exit"], {
      token: "test-token",
    });

    await shell.run();

    expect(JSON.parse(fs.readFileSync(paths.credentialsFile, "utf-8"))).toEqual({
      token: "test-token",
    });
    expect(shell.config.credentialStorage).toBe("file");
    expect(configStore.save).toHaveBeenCalledWith(
      expect.objectContaining({ credentialStorage: "file" }),
    );
  });

  it("replaces the stored token", async () => {
    const { shell } = createShell(["token", "replace", " new-secret ", "exit"]);
    await shell.run();
    expect(keyring.get(KEY)).toBe("new-secret");
  });

  it("refuses to replace the token when storage is none", async () => {
    const { shell, logger, prompter } = createShell(["token", "replace", "exit"], {
      config: { credentialStorage: "none" },
    });

    await shell.run();

    expect(logger.warn).toHaveBeenCalledWith(
      "Token storage is set to none, so no token can be stored. Choose keyring or file storage first.",
    );
    expect(prompter.asked).not.toContain("New Discord token");
    expect(keyring.size).toBe(0);
  });

  it("clears the stored token after confirmation", async () => {
    keyring.set(KEY, "test-secret");
    const { shell } = createShell(["token", "clear", true, "exit"]);

    await shell.run();

    expect(keyring.has(KEY)).toBe(false);
  });

  it("keeps the stored token when clearing is not confirmed", async () => {
    keyring.set(KEY, "test-secret");
    const { shell } = createShell(["token", "clear", false, "exit"]);

    await shell.run();

    expect(keyring.get(KEY)).toBe("test-secret");
  });
});

describe("shell transitions", () => {
  it("allows only the listed moves", () => {
    expect(() => assertTransition("chooseFormat", "execute")).not.toThrow();
    expect(() => assertTransition("chooseCount", "execute")).toThrow(
      "Illegal shell transition chooseCount -> execute",
    );
  });

  it("lets every screen except exit return to the main menu", () => {
    for (const [from, targets] of Object.entries(TRANSITIONS)) {
      if (from === "mainMenu" || from === "exit") continue;
      expect(targets).toContain("mainMenu");
    }
    expect(TRANSITIONS.exit).toEqual([]);
  });
});

describe("parseCount", () => {
  it("uses the fallback for blank input", () => {
    expect(parseCount("  ", 1000)).toBe(1000);
  });

  it("parses positive whole numbers", () => {
    expect(parseCount(" 42 ", 1000)).toBe(42);
  });

  it("rejects anything else", () => {
    for (const input of ["-1", "1.5", "ten", "0"]) {
      expect(() => parseCount(input, 1000)).toThrow(ValidationError);
    }
  });
});

describe("expandHome", () => {
  it("expands a leading tilde", () => {
    expect(expandHome("~/exports", "/home/tester")).toBe(path.join("/home/tester", "exports"));
    expect(expandHome("~", "/home/tester")).toBe("/home/tester");
    expect(expandHome("/data/exports", "/home/tester")).toBe("/data/exports");
  });
});
