/**
 * Resource browser: loads the DMs and server channels the token can see
 * and resolves operator input (a list number or a name fragment) to
 * exactly one entry.
 */

import type { Logger } from "../core/index.js";
import { errorMessage, isSkippableError } from "../core/index.js";
import type { DiscordApi } from "./api.js";
import type { DiscordChannel, ServerWithChannels } from "./types.js";

export type BrowserApi = Pick<DiscordApi, "listDMs" | "listServers" | "listChannels">;

export type Selection<T> =
  | { kind: "selected"; item: T }
  | { kind: "ambiguous"; matches: T[] }
  | { kind: "none"; term: string }
  | { kind: "invalid"; reason: string };

const byName = (item: { name: string }): string => item.name;

export const serverName = (entry: ServerWithChannels): string =>
  entry.server.name;

function normalizeTerm(term: string): string {
  return term.trim().replace(/^#/, "").toLowerCase();
}

/**
 * Case-insensitive substring search over display names. A leading `#`
 * in the term is ignored.
 */
export function searchByName<T>(
  items: readonly T[],
  term: string,
  nameOf: (item: T) => string,
): T[] {
  const needle = normalizeTerm(term);
  if (!needle) return [];
  return items.filter((item) => nameOf(item).toLowerCase().includes(needle));
}

/**
 * Resolve input to one item: a 1-based list number selects directly,
 * anything else is searched by name.
 */
export function resolveSelection<T>(
  items: readonly T[],
  input: string,
  nameOf: (item: T) => string,
): Selection<T> {
  const trimmed = input.trim();
  if (!trimmed) {
    return { kind: "invalid", reason: "Enter a number or a name to search" };
  }

  if (/^\d+$/.test(trimmed)) {
    const index = Number.parseInt(trimmed, 10) - 1;
    const item = items[index];
    if (index < 0 || item === undefined) {
      return {
        kind: "invalid",
        reason: `Choose a number between 1 and ${items.length}`,
      };
    }
    return { kind: "selected", item };
  }

  const matches = searchByName(items, trimmed, nameOf);
  const only = matches[0];
  if (matches.length === 1 && only !== undefined) {
    return { kind: "selected", item: only };
  }
  if (matches.length === 0) return { kind: "none", term: trimmed };
  return { kind: "ambiguous", matches };
}

export function resolveChannel(
  channels: readonly DiscordChannel[],
  input: string,
): Selection<DiscordChannel> {
  return resolveSelection(channels, input, byName);
}

export function resolveServer(
  servers: readonly ServerWithChannels[],
  input: string,
): Selection<ServerWithChannels> {
  return resolveSelection(servers, input, serverName);
}

export class ResourceBrowser {
  private readonly api: BrowserApi;
  private readonly logger: Logger;

  constructor(api: BrowserApi, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  async loadDirectMessages(): Promise<DiscordChannel[]> {
    const dms = await this.api.listDMs();
    this.logger.info(`Loaded ${dms.length} DMs`);
    return dms;
  }

  /**
   * Every server with at least one readable channel. Servers whose
   * channel list cannot be read are skipped with a warning.
   */
  async loadServers(): Promise<ServerWithChannels[]> {
    const servers = await this.api.listServers();
    const loaded: ServerWithChannels[] = [];

    if (servers.length > 0) {
      this.logger.info(`Loading channels from ${servers.length} servers...`);
    }

    let done = 0;
    for (const server of servers) {
      try {
        const channels = await this.api.listChannels(server.id, server.name);
        if (channels.length > 0) loaded.push({ server, channels });
      } catch (err) {
        if (!isSkippableError(err)) throw err;
        this.logger.warn(`Skipped server ${server.name}: ${errorMessage(err)}`);
      }
      done++;
      this.logger.progress(done, servers.length, "Loading server channels");
    }

    this.logger.info(`Loaded ${loaded.length} servers`);
    return loaded;
  }

  /** Search DMs and every server channel at once. */
  async search(term: string): Promise<DiscordChannel[]> {
    const dms = await this.loadDirectMessages();
    const servers = await this.loadServers();
    const all = [...dms, ...servers.flatMap((entry) => entry.channels)];
    return searchByName(all, term, (ch) =>
      ch.serverName ? `${ch.name} ${ch.serverName}` : ch.name,
    );
  }
}
