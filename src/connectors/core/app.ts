import * as path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import {
  DiscordApi,
  ExportEngine,
  InteractiveShell,
  PromptsPrompter,
  ResourceBrowser,
  channelLabel,
} from "../discord/index.js";
import type {
  DiscordChannel,
  DiscordUser,
  Prompter,
  ServerWithChannels,
} from "../discord/index.js";
import { ConfigStore, resolvePaths } from "./config.js";
import {
  CredentialManager,
  createCredentialStores,
  resolveCredential,
} from "./credentials.js";
import type { KeyringEntryFactory } from "./credentials.js";
import { AuthError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createOutputWriter } from "./output.js";
import { createRateLimiter } from "./rate-limiter.js";
import {
  CREDENTIAL_METHODS,
  EXPORT_FORMATS,
  isCredentialMethod,
  isExportFormat,
} from "./types.js";
import type {
  AppConfig,
  AppPaths,
  CredentialMethod,
  ExportFormat,
  ExportResult,
  Logger,
} from "./types.js";

/** Everything the commands touch outside the process, replaceable in tests. */
export interface AppDeps {
  env?: NodeJS.ProcessEnv;
  home?: string;
  fetch?: typeof fetch;
  keyring?: KeyringEntryFactory;
  prompter?: Prompter;
  logger?: Logger;
  print?: (line: string) => void;
}

// ─── Context ───

interface AppContext {
  paths: AppPaths;
  configStore: ConfigStore;
  config: AppConfig;
  credentials: CredentialManager;
  logger: Logger;
  print: (line: string) => void;
  deps: AppDeps;
}

interface Session {
  api: DiscordApi;
  token: string;
  user: DiscordUser;
}

function createContext(deps: AppDeps, logger: Logger, print: (line: string) => void): AppContext {
  const paths = resolvePaths(deps.env, deps.home);
  const configStore = new ConfigStore(paths, logger);
  const credentials = new CredentialManager(
    createCredentialStores(paths, logger, { env: deps.env, keyring: deps.keyring }),
    logger,
  );
  return {
    paths,
    configStore,
    config: configStore.load(),
    credentials,
    logger,
    print,
    deps,
  };
}

function prompterFor(ctx: AppContext): Prompter {
  return ctx.deps.prompter ?? new PromptsPrompter();
}

/** Load the token (asking for it when a prompter is given) and verify it. */
async function connect(ctx: AppContext, prompter?: Prompter): Promise<Session> {
  const { config, credentials, logger } = ctx;
  const loaded = await resolveCredential(
    credentials,
    config.credentialStorage,
    prompter ? () => prompter.password("Enter your Discord token") : undefined,
  );

  const api = new DiscordApi({
    token: loaded.token,
    rateLimiter: createRateLimiter({ minDelayMs: config.minDelayMs }),
    logger,
    maxRetries: config.maxRetries,
    rateLimitRetries: config.rateLimitRetries,
    fetch: ctx.deps.fetch,
  });
  const user = await api.authenticate();
  logger.info(`Logged in as ${user.displayName} (${user.username})`);

  // A token typed at the prompt is kept in the configured backend
  const method = config.credentialStorage;
  if (loaded.source === "none" && (method === "keyring" || method === "file")) {
    try {
      await credentials.save(loaded.token, method);
      logger.info(`Token saved to ${method}.`);
    } catch (err) {
      logger.warn(`Could not save token to ${method}: ${errorMessage(err)}`);
    }
  }

  return { api, token: loaded.token, user };
}

function createEngine(api: DiscordApi, config: AppConfig, logger: Logger): ExportEngine {
  return new ExportEngine({
    api,
    writer: createOutputWriter(config.saveDir),
    logger,
    pageSize: config.pageSize,
  });
}

// ─── Argument Parsers ───

function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number.parseInt(value, 10) <= 0) {
    throw new InvalidArgumentError("Must be a positive whole number.");
  }
  return Number.parseInt(value, 10);
}

function parseFormat(value: string): ExportFormat {
  if (!isExportFormat(value)) {
    throw new InvalidArgumentError(`Expected one of ${EXPORT_FORMATS.join(", ")}.`);
  }
  return value;
}

function parseStorage(value: string): CredentialMethod {
  if (!isCredentialMethod(value)) {
    throw new InvalidArgumentError(`Expected one of ${CREDENTIAL_METHODS.join(", ")}.`);
  }
  return value;
}

// ─── Output ───

function printChannels(
  print: (line: string) => void,
  title: string,
  channels: DiscordChannel[],
): void {
  print(`\n${title}`);
  for (const ch of channels) {
    print(`  ${ch.id}  ${channelLabel(ch)}`);
  }
}

export function printResults(print: (line: string) => void, results: ExportResult[]): void {
  print("\n═══ Export Summary ═══\n");
  for (const r of results) {
    const status = r.errors.length === 0 ? "✓" : "✗";
    const target = r.filePath ?? "nothing written";
    print(
      `${status} ${r.channelName} (${r.format}): ${r.messagesExported} messages -> ${target} [${(r.durationMs / 1000).toFixed(1)}s]`,
    );
    for (const err of r.errors) {
      print(`  ✗ ${err.entity}: ${err.error}`);
    }
  }
}

// ─── Commands ───

interface ChannelsOptions {
  dms?: boolean;
  servers?: boolean;
  search?: string;
}

interface ExportCommandOptions {
  channel: string[];
  count?: number;
  format?: ExportFormat;
  output?: string;
}

interface TokenSetOptions {
  storage?: CredentialMethod;
}

interface ConfigOptions {
  saveDir?: string;
  storage?: CredentialMethod;
  count?: number;
  format?: ExportFormat;
}

async function runInteractive(ctx: AppContext): Promise<number> {
  const prompter = prompterFor(ctx);
  const session = await connect(ctx, prompter);
  const config = ctx.configStore.ensureSaveDir(ctx.config);

  const shell = new InteractiveShell({
    prompter,
    browser: new ResourceBrowser(session.api, ctx.logger),
    createExporter: (current) => createEngine(session.api, current, ctx.logger),
    credentials: ctx.credentials,
    configStore: ctx.configStore,
    logger: ctx.logger,
    config,
    token: session.token,
    print: ctx.print,
  });
  await shell.run();
  ctx.print("Goodbye!");
  return 0;
}

async function runChannels(ctx: AppContext, opts: ChannelsOptions): Promise<number> {
  const { api } = await connect(ctx);
  const browser = new ResourceBrowser(api, ctx.logger);

  if (opts.search) {
    const found = await browser.search(opts.search);
    printChannels(ctx.print, `Channels matching "${opts.search}"`, found);
    return 0;
  }

  const showAll = !opts.dms && !opts.servers;
  if (opts.dms || showAll) {
    printChannels(ctx.print, "Direct Messages", await browser.loadDirectMessages());
  }
  if (opts.servers || showAll) {
    for (const entry of await browser.loadServers()) {
      printChannels(ctx.print, entry.server.name, entry.channels);
    }
  }
  return 0;
}

async function runExport(ctx: AppContext, opts: ExportCommandOptions): Promise<number> {
  const { api } = await connect(ctx);
  const config = ctx.configStore.ensureSaveDir(
    opts.output ? { ...ctx.config, saveDir: path.resolve(opts.output) } : ctx.config,
  );
  const browser = new ResourceBrowser(api, ctx.logger);

  const dms = await browser.loadDirectMessages();
  const servers: ServerWithChannels[] = await browser.loadServers();
  const known = new Map<string, DiscordChannel>();
  for (const ch of [...dms, ...servers.flatMap((s) => s.channels)]) {
    known.set(ch.id, ch);
  }

  const missing = opts.channel.filter((id) => !known.has(id));
  for (const id of missing) {
    ctx.logger.error(`Channel ${id} is not accessible with this token`);
  }

  const requests = opts.channel.flatMap((id) => {
    const channel = known.get(id);
    return channel
      ? [
          {
            channel,
            count: opts.count ?? config.defaultCount,
            format: opts.format ?? config.defaultFormat,
          },
        ]
      : [];
  });

  const results = await createEngine(api, config, ctx.logger).exportChannels(requests);
  printResults(ctx.print, results);

  const failed = missing.length > 0 || results.some((r) => r.errors.length > 0);
  return failed ? 1 : 0;
}

async function runTokenSet(
  ctx: AppContext,
  value: string | undefined,
  opts: TokenSetOptions,
): Promise<number> {
  const method = opts.storage ?? ctx.config.credentialStorage;
  const entered = value ?? (await prompterFor(ctx).password("Discord token"));
  if (entered === undefined) return 1;

  await ctx.credentials.save(entered, method);
  if (method !== ctx.config.credentialStorage) {
    ctx.configStore.save({ ...ctx.config, credentialStorage: method });
  }
  ctx.logger.info(`Token saved to ${method}.`);
  return 0;
}

async function runTokenStatus(ctx: AppContext): Promise<number> {
  const loaded = await ctx.credentials.load(ctx.config.credentialStorage);
  if (!loaded) {
    ctx.print(`No token stored (storage: ${ctx.config.credentialStorage})`);
    return 1;
  }
  ctx.print(`Token found (${loaded.source})`);
  return 0;
}

function runConfig(ctx: AppContext, opts: ConfigOptions): number {
  const patch: Partial<AppConfig> = {};
  if (opts.saveDir) patch.saveDir = path.resolve(opts.saveDir);
  if (opts.storage) patch.credentialStorage = opts.storage;
  if (opts.count) patch.defaultCount = opts.count;
  if (opts.format) patch.defaultFormat = opts.format;

  let config = ctx.config;
  if (Object.keys(patch).length > 0) {
    config = { ...config, ...patch };
    ctx.configStore.save(config);
    ctx.logger.info(`Saved ${ctx.configStore.filePath}`);
  }
  for (const [key, val] of Object.entries(config)) {
    ctx.print(`${key}: ${String(val)}`);
  }
  return 0;
}

// ─── Program ───

/**
 * Build the commander program. Each action stores its exit code through
 * `setExitCode`; the context is created lazily so `--help` touches nothing.
 */
function createProgram(
  context: () => AppContext,
  setExitCode: (code: number) => void,
  print: (line: string) => void,
): Command {
  const program = new Command()
    .name("discord-chat-fetcher")
    .description("Export Discord DM and server channel history to local files")
    .version("1.0.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => print(str.trimEnd()),
      writeErr: (str) => print(str.trimEnd()),
    });

  program
    .command("interactive", { isDefault: true })
    .description("Browse channels and export messages from a menu")
    .action(async () => {
      setExitCode(await runInteractive(context()));
    });

  program
    .command("channels")
    .description("List the DMs and server channels the token can read")
    .option("--dms", "Only list direct messages")
    .option("--servers", "Only list server channels")
    .option("--search <term>", "Only list channels whose name contains <term>")
    .action(async (opts: ChannelsOptions) => {
      setExitCode(await runChannels(context(), opts));
    });

  program
    .command("export")
    .description("Export one or more channels by id")
    .requiredOption("--channel <id...>", "Channel ids to export")
    .option("--count <n>", "Messages to fetch per channel", parsePositiveInt)
    .option("--format <format>", `One of ${EXPORT_FORMATS.join(", ")}`, parseFormat)
    .option("--output <dir>", "Directory to save exports in")
    .action(async (opts: ExportCommandOptions) => {
      setExitCode(await runExport(context(), opts));
    });

  const token = program.command("token").description("Manage the stored Discord token");

  token
    .command("set")
    .description("Store a token (asks for it when not given)")
    .argument("[value]", "Token to store")
    .option("--storage <method>", "keyring or file", parseStorage)
    .action(async (value: string | undefined, opts: TokenSetOptions) => {
      setExitCode(await runTokenSet(context(), value, opts));
    });

  token
    .command("clear")
    .description("Remove the token from keyring and file storage")
    .action(async () => {
      const ctx = context();
      await ctx.credentials.clear();
      ctx.logger.info("Stored token cleared.");
      setExitCode(0);
    });

  token
    .command("status")
    .description("Show where the token is loaded from")
    .action(async () => {
      setExitCode(await runTokenStatus(context()));
    });

  program
    .command("config")
    .description("Show or update settings")
    .option("--save-dir <dir>", "Directory to save exports in")
    .option("--storage <method>", "Where the token is stored", parseStorage)
    .option("--count <n>", "Default number of messages", parsePositiveInt)
    .option("--format <format>", "Default export format", parseFormat)
    .action((opts: ConfigOptions) => {
      setExitCode(runConfig(context(), opts));
    });

  return program;
}

/** Run one command line (`argv` as in `process.argv`) and resolve to its exit code. */
export async function main(argv: string[], deps: AppDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger("discord");
  const print = deps.print ?? ((line: string) => console.log(line));
  let exitCode = 0;

  const program = createProgram(
    () => createContext(deps, logger, print),
    (code) => {
      exitCode = code;
    },
    print,
  );

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof AuthError) {
      logger.error(`Authentication failed: ${err.message}`);
    } else {
      logger.error(errorMessage(err));
    }
    return 1;
  }
}
