import type {
  ExportFormat,
  ExportResult,
  Logger,
  OutputWriter,
} from "../core/index.js";
import { errorMessage, isSkippableError } from "../core/index.js";
import type { DiscordApi } from "./api.js";
import { channelLabel } from "./transform.js";
import type { DiscordChannel, ExportBatch } from "./types.js";
import { writeBatch } from "./writer.js";

export interface ExportRequest {
  channel: DiscordChannel;
  count: number;
  format: ExportFormat;
}

export interface ExportOptions {
  signal?: AbortSignal;
  /** Shown the fetched batch before writing; resolving false discards it. */
  review?: (batch: ExportBatch) => Promise<boolean>;
}

export interface ExportEngineConfig {
  api: Pick<DiscordApi, "fetchHistory">;
  writer: OutputWriter;
  logger: Logger;
  pageSize: number;
  now?: () => Date;
}

/**
 * Runs fetch -> render -> write for one channel at a time. Failures that
 * only concern one channel are reported in its result; auth failures and
 * cancellation end the run.
 */
export class ExportEngine {
  private readonly config: ExportEngineConfig;

  constructor(config: ExportEngineConfig) {
    this.config = config;
  }

  async exportChannels(
    requests: ExportRequest[],
    options: ExportOptions = {},
  ): Promise<ExportResult[]> {
    if (options.signal) return this.runAll(requests, options.signal, options.review);

    const { logger } = this.config;
    const ac = new AbortController();

    // Stop between pages on Ctrl+C
    const sigHandler = () => {
      logger.warn("Received interrupt, stopping after the current page...");
      ac.abort();
    };
    process.on("SIGINT", sigHandler);
    try {
      return await this.runAll(requests, ac.signal, options.review);
    } finally {
      process.removeListener("SIGINT", sigHandler);
    }
  }

  async exportChannel(
    request: ExportRequest,
    options: ExportOptions = {},
  ): Promise<ExportResult> {
    const [result] = await this.exportChannels([request], options);
    if (!result) throw new Error("Export produced no result");
    return result;
  }

  private async runAll(
    requests: ExportRequest[],
    signal: AbortSignal,
    review?: ExportOptions["review"],
  ): Promise<ExportResult[]> {
    const results: ExportResult[] = [];
    for (const request of requests) {
      results.push(await this.runOne(request, signal, review));
    }
    return results;
  }

  private async runOne(
    request: ExportRequest,
    signal: AbortSignal,
    review?: ExportOptions["review"],
  ): Promise<ExportResult> {
    const { api, writer, logger, pageSize } = this.config;
    const { channel, count, format } = request;
    const label = channelLabel(channel);
    const startTime = Date.now();

    const result: ExportResult = {
      channelId: channel.id,
      channelName: label,
      format,
      messagesExported: 0,
      filePath: null,
      errors: [],
      durationMs: 0,
    };

    logger.info(`Fetching up to ${count} messages from ${label}`);
    try {
      const messages = await api.fetchHistory(channel.id, count, {
        pageSize,
        signal,
        onPage: (fetched, total) =>
          logger.progress(fetched, total, "Fetching messages"),
      });

      if (messages.length > 0 && messages.length < count) {
        // Close the progress line at the real total
        logger.progress(messages.length, messages.length, "Fetching messages");
        logger.info(`Channel start reached after ${messages.length} messages`);
      }

      if (messages.length === 0) {
        logger.warn(`No messages were retrieved from ${label}`);
      } else {
        const batch: ExportBatch = {
          channel,
          messages,
          exportedAt: this.config.now?.() ?? new Date(),
        };
        if (review && !(await review(batch))) {
          logger.info(`Discarded ${messages.length} messages from ${label}`);
        } else {
          result.filePath = await writeBatch(writer, batch, format);
          result.messagesExported = messages.length;
          logger.info(`Saved ${messages.length} messages to ${result.filePath}`);
        }
      }
    } catch (err) {
      if (!isSkippableError(err)) throw err;
      logger.error(`Skipped ${label}: ${errorMessage(err)}`);
      result.errors.push({
        entity: channel.id,
        error: errorMessage(err),
        code: err.code,
        retryable: err.retryable,
      });
    }

    result.durationMs = Date.now() - startTime;
    return result;
  }
}
