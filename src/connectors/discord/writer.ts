/**
 * Export renderers for a batch of channel messages.
 *
 * Produces, for one channel:
 * - {label}_{YYYYMMDD}_{HHMMSS}.txt  (date-grouped plain text)
 * - {label}_{YYYYMMDD}_{HHMMSS}.json (channel_info + full message objects)
 * - {label}_{YYYYMMDD}_{HHMMSS}.csv  (one row per message)
 * - {label}_{YYYYMMDD}_{HHMMSS}.md   (YAML frontmatter + date sections)
 *
 * Rendering is pure; `writeBatch` hands the result to an OutputWriter.
 */

import { stringify as yamlStringify } from "yaml";
import type { ExportFormat, OutputWriter } from "../core/index.js";
import { fileTimestamp } from "../core/index.js";
import {
  channelLabel,
  channelSlug,
  describeAttachment,
  formatDate,
  formatLongDate,
  formatTime,
  getAuthorHandle,
  getAuthorName,
  messageBody,
} from "./transform.js";
import type { ExportBatch, RenderedExport } from "./types.js";

export const CSV_COLUMNS = [
  "Timestamp",
  "Date",
  "Time",
  "Author",
  "Username",
  "Author_ID",
  "Message",
  "Attachments",
] as const;

const DATE_RULE = "―――――";

// ─── Entry Points ───

export function exportFilename(batch: ExportBatch, format: ExportFormat): string {
  return `${channelSlug(batch.channel)}_${fileTimestamp(batch.exportedAt)}.${format}`;
}

export function renderExport(
  batch: ExportBatch,
  format: ExportFormat,
): RenderedExport {
  return {
    label: channelSlug(batch.channel),
    filename: exportFilename(batch, format),
    content: RENDERERS[format](batch),
  };
}

/**
 * Render and write one batch under `<label>/`. Resolves to the path of
 * the new file.
 */
export async function writeBatch(
  writer: OutputWriter,
  batch: ExportBatch,
  format: ExportFormat,
): Promise<string> {
  const rendered = renderExport(batch, format);
  return writer.writeExport(rendered.label, rendered.filename, rendered.content);
}

const RENDERERS: Record<ExportFormat, (batch: ExportBatch) => string> = {
  txt: renderTxt,
  json: renderJson,
  csv: renderCsv,
  md: renderMarkdown,
};

// ─── Plain Text ───

export function renderTxt(batch: ExportBatch): string {
  const parts: string[] = [];
  parts.push(`Discord Messages from ${channelLabel(batch.channel)}\n`);
  parts.push(`${"=".repeat(50)}\n\n`);

  if (batch.messages.length === 0) {
    parts.push("No messages.\n");
    return parts.join("");
  }

  let currentDate = "";
  for (const msg of batch.messages) {
    const dateGroup = formatDate(msg.timestamp);
    if (dateGroup !== currentDate) {
      if (currentDate) parts.push("\n");
      parts.push(`\n${DATE_RULE} ${formatLongDate(msg.timestamp)} ${DATE_RULE}\n\n`);
      currentDate = dateGroup;
    }

    parts.push(
      `${formatTime(msg.timestamp)} - ${getAuthorName(msg.author)}: ${messageBody(msg)}\n`,
    );
    for (const attachment of msg.attachments) {
      parts.push(`[Attachment: ${attachment.filename} - ${attachment.url}]\n`);
    }
    parts.push("\n");
  }

  return parts.join("");
}

// ─── JSON ───

export function renderJson(batch: ExportBatch): string {
  const { channel } = batch;
  const data = {
    channel_info: {
      channel_name: channelLabel(channel),
      channel_id: channel.id,
      channel_kind: channel.kind,
      server_name: channel.serverName ?? null,
      export_time: batch.exportedAt.toISOString(),
      message_count: batch.messages.length,
    },
    messages: batch.messages,
  };
  return `${JSON.stringify(data, null, 2)}\n`;
}

// ─── CSV ───

function csvCell(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function renderCsv(batch: ExportBatch): string {
  const rows: string[][] = [[...CSV_COLUMNS]];
  for (const msg of batch.messages) {
    rows.push([
      msg.timestamp,
      formatDate(msg.timestamp),
      formatTime(msg.timestamp),
      getAuthorName(msg.author),
      getAuthorHandle(msg.author),
      msg.author.id,
      msg.content,
      msg.attachments.map(describeAttachment).join("; "),
    ]);
  }
  return `${rows.map((row) => row.map(csvCell).join(",")).join("\r\n")}\r\n`;
}

// ─── Markdown ───

export function renderMarkdown(batch: ExportBatch): string {
  const { channel } = batch;
  const frontmatter: Record<string, unknown> = {
    channel: channelLabel(channel),
    channel_id: channel.id,
    kind: channel.kind,
    server: channel.serverName ?? null,
    exported_at: batch.exportedAt.toISOString(),
    message_count: batch.messages.length,
  };
  const fm = yamlStringify(frontmatter).trim();
  return `---\n${fm}\n---\n\n${renderMarkdownBody(batch)}`;
}

function renderMarkdownBody(batch: ExportBatch): string {
  if (batch.messages.length === 0) {
    return "_No messages._\n";
  }

  const lines: string[] = [];
  let currentDate = "";

  for (const msg of batch.messages) {
    const dateGroup = formatDate(msg.timestamp);
    if (dateGroup !== currentDate) {
      if (currentDate) lines.push(""); // blank line before new date
      lines.push(`## ${dateGroup}`);
      lines.push("");
      currentDate = dateGroup;
    }

    lines.push(`**${getAuthorName(msg.author)}** (${formatTime(msg.timestamp)}):`);
    for (const textLine of messageBody(msg).split("\n")) {
      lines.push(textLine);
    }
    for (const attachment of msg.attachments) {
      lines.push(`[Attachment: ${attachment.filename}](${attachment.url})`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
