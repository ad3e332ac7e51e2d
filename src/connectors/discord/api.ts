/**
 * Rate-limited wrapper around Discord's user HTTP API (v9).
 *
 * Handles the authorization header, 429 + Retry-After backoff, retry of
 * transient failures, backward pagination through channel history, and
 * maps raw payloads to our internal Discord types.
 */

import { z } from "zod";
import type { Logger, RateLimiter } from "../core/index.js";
import {
  AuthError,
  CancelledError,
  FetcherError,
  NetworkError,
  PermissionError,
  RateLimitedError,
  errorMessage,
  sleep,
  withRetry,
} from "../core/index.js";
import {
  compareSnowflakes,
  mapMessage,
  mapPrivateChannel,
  mapServer,
  mapServerChannel,
  mapUser,
  rateLimitBodySchema,
  rawChannelSchema,
  rawGuildSchema,
  rawMessageSchema,
  rawUserSchema,
} from "./schemas.js";
import type {
  DiscordChannel,
  DiscordMessage,
  DiscordServer,
  DiscordUser,
  MessagePage,
} from "./types.js";

export const DISCORD_API_BASE = "https://discord.com/api/v9";

/** The API returns at most this many messages per request. */
export const MAX_PAGE_SIZE = 100;

const DEFAULT_RETRY_AFTER_MS = 1_000;

// Mimic the web client
const CLIENT_HEADERS: Record<string, string> = {
  accept: "*/*",
  "accept-language": "en-US,en;q=0.9",
  "content-type": "application/json",
  "user-agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/138.0.0.0 Safari/537.36",
  "x-discord-locale": "en-US",
};

export interface DiscordApiOptions {
  token: string;
  rateLimiter: RateLimiter;
  logger: Logger;
  baseUrl?: string;
  /** Retries for network failures and 5xx responses */
  maxRetries?: number;
  /** Retries after a 429 before the request is given up */
  rateLimitRetries?: number;
  retryBaseDelayMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchHistoryOptions {
  pageSize?: number;
  signal?: AbortSignal;
  onPage?: (fetched: number, total: number) => void;
}

export class DiscordApi {
  private readonly token: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly rateLimitRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: DiscordApiOptions) {
    this.token = opts.token;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger;
    this.baseUrl = (opts.baseUrl ?? DISCORD_API_BASE).replace(/\/+$/, "");
    this.maxRetries = opts.maxRetries ?? 3;
    this.rateLimitRetries = opts.rateLimitRetries ?? 1;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 1_000;
    this.fetchImpl = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? sleep;
  }

  // ─── Rate-Limited Request Wrapper ───

  private async request<T>(
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    query: Record<string, string | undefined> = {},
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    return withRetry(() => this.send(url.toString(), schema, label), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      retryOn: (err) => err instanceof NetworkError,
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(
          `${label} failed (${errorMessage(err)}), retry ${attempt}/${this.maxRetries} in ${(delayMs / 1000).toFixed(1)}s`,
        );
      },
    });
  }

  private async send<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
  ): Promise<T> {
    let rateLimitHits = 0;

    for (;;) {
      await this.rateLimiter.acquire();

      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method: "GET",
          headers: { ...CLIENT_HEADERS, authorization: this.token },
        });
      } catch (err) {
        throw new NetworkError(`${label} failed: ${errorMessage(err)}`, {
          cause: err,
          url,
        });
      }

      this.rateLimiter.updateFromHeaders(headersToRecord(res.headers));

      if (res.status === 429) {
        const retryAfterMs = await readRetryAfter(res);
        if (rateLimitHits >= this.rateLimitRetries) {
          throw new RateLimitedError(label, retryAfterMs);
        }
        rateLimitHits++;
        this.logger.warn(
          `Rate limited on ${label}, retrying in ${retryAfterMs / 1000}s`,
        );
        this.rateLimiter.backoff(retryAfterMs);
        await this.sleep(retryAfterMs);
        continue;
      }

      if (res.status === 401) {
        throw new AuthError("Token is invalid or expired", { status: 401 });
      }
      if (res.status === 403 || res.status === 404) {
        throw new PermissionError(label, res.status);
      }
      if (res.status >= 500) {
        throw new NetworkError(`${label} returned ${res.status}`, {
          status: res.status,
          url,
        });
      }
      if (!res.ok) {
        throw new FetcherError({
          code: "HTTP_ERROR",
          message: `${label} returned ${res.status} ${res.statusText}`,
          metadata: { status: res.status, url },
        });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new NetworkError(`${label} returned malformed JSON`, {
          cause: err,
          status: res.status,
          url,
        });
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new FetcherError({
          code: "INVALID_RESPONSE",
          message: `Unexpected response from ${label}`,
          cause: parsed.error,
          metadata: { url },
        });
      }
      return parsed.data;
    }
  }

  // ─── Auth ───

  async authenticate(): Promise<DiscordUser> {
    const raw = await this.request("/users/@me", rawUserSchema, "users/@me");
    return mapUser(raw);
  }

  // ─── Servers & Channels ───

  async listServers(): Promise<DiscordServer[]> {
    const raw = await this.request(
      "/users/@me/guilds",
      z.array(rawGuildSchema),
      "users/@me/guilds",
    );
    return raw.map(mapServer);
  }

  async listChannels(
    serverId: string,
    serverName?: string,
  ): Promise<DiscordChannel[]> {
    const raw = await this.request(
      `/guilds/${encodeURIComponent(serverId)}/channels`,
      z.array(rawChannelSchema),
      `guilds/${serverId}/channels`,
    );
    const channels: DiscordChannel[] = [];
    for (const ch of raw) {
      const mapped = mapServerChannel(ch, serverId, serverName);
      if (mapped) channels.push(mapped);
    }
    return channels.sort((a, b) => a.position - b.position);
  }

  /** DMs and group DMs, most recently active first. */
  async listDMs(): Promise<DiscordChannel[]> {
    const raw = await this.request(
      "/users/@me/channels",
      z.array(rawChannelSchema),
      "users/@me/channels",
    );
    const active = [...raw].sort((a, b) =>
      compareSnowflakes(b.last_message_id ?? "0", a.last_message_id ?? "0"),
    );
    const channels: DiscordChannel[] = [];
    for (const ch of active) {
      const mapped = mapPrivateChannel(ch);
      if (mapped) channels.push(mapped);
    }
    return channels;
  }

  // ─── Channel History ───

  /**
   * One page of messages older than `before` (or the newest page when
   * `before` is omitted). `limit` is clamped to 1..100.
   */
  async fetchMessages(
    channelId: string,
    limit: number,
    before?: string,
  ): Promise<MessagePage> {
    const pageLimit = Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(limit)));
    const raw = await this.request(
      `/channels/${encodeURIComponent(channelId)}/messages`,
      z.array(rawMessageSchema),
      `channels/${channelId}/messages`,
      { limit: String(pageLimit), before },
    );
    const messages = raw.map(mapMessage);
    const oldest = messages[messages.length - 1];
    return { messages, nextCursor: oldest ? oldest.id : null };
  }

  /**
   * Page backward from the newest message until `total` messages are
   * collected or the channel runs out. Returns them oldest first.
   */
  async fetchHistory(
    channelId: string,
    total: number,
    opts: FetchHistoryOptions = {},
  ): Promise<DiscordMessage[]> {
    const pageSize = Math.max(
      1,
      Math.min(MAX_PAGE_SIZE, opts.pageSize ?? MAX_PAGE_SIZE),
    );
    const collected: DiscordMessage[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;

    while (collected.length < total) {
      throwIfAborted(opts.signal);

      const requested = Math.min(pageSize, total - collected.length);
      const page = await this.fetchMessages(channelId, requested, cursor);
      if (page.messages.length === 0) break;

      for (const msg of page.messages) {
        if (seen.has(msg.id)) continue;
        seen.add(msg.id);
        collected.push(msg);
      }
      opts.onPage?.(Math.min(collected.length, total), total);

      // A short page means the start of the channel was reached
      if (page.messages.length < requested || !page.nextCursor) break;
      cursor = page.nextCursor;
    }

    // API returns newest first; reverse to get chronological order
    return collected.slice(0, total).reverse();
  }
}

// ─── Helpers ───

function headersToRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

/** Retry-After in ms, from the header (seconds) or the JSON body. */
async function readRetryAfter(res: Response): Promise<number> {
  const header = res.headers.get("retry-after");
  if (header !== null) {
    const seconds = parseFloat(header);
    if (!Number.isNaN(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1000);
    }
  }
  try {
    const body = rateLimitBodySchema.safeParse(await res.json());
    if (body.success) return Math.ceil(body.data.retry_after * 1000);
  } catch {
    // Body is not JSON; fall through to the default
  }
  return DEFAULT_RETRY_AFTER_MS;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError("Fetch cancelled");
  }
}
