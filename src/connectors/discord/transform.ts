/**
 * Message field formatting shared by the export renderers.
 *
 * Message times are rendered in UTC, the zone Discord timestamps are
 * reported in.
 */

import { sanitizeFilename } from "../core/index.js";
import type {
  DiscordAttachment,
  DiscordChannel,
  DiscordMessage,
  DiscordUser,
} from "./types.js";

export const NO_TEXT_CONTENT = "[No text content]";

const LONG_DATE = new Intl.DateTimeFormat("en-US", {
  weekday: "long",
  year: "numeric",
  month: "long",
  day: "numeric",
  timeZone: "UTC",
});

function parseTimestamp(timestamp: string): Date | null {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Date portion like "2024-01-15", used for grouping by day.
 */
export function formatDate(timestamp: string): string {
  const date = parseTimestamp(timestamp);
  if (!date) return timestamp;
  return date.toISOString().slice(0, 10);
}

/**
 * 24-hour time like "09:05:03".
 */
export function formatTime(timestamp: string): string {
  const date = parseTimestamp(timestamp);
  if (!date) return timestamp;
  return date.toISOString().slice(11, 19);
}

/**
 * Heading date like "Monday, January 15, 2024".
 */
export function formatLongDate(timestamp: string): string {
  const date = parseTimestamp(timestamp);
  if (!date) return timestamp;
  return LONG_DATE.format(date);
}

export function getAuthorName(author: DiscordUser): string {
  return author.displayName || author.username || author.id;
}

/** `name#1234` for legacy accounts, the bare username otherwise. */
export function getAuthorHandle(author: DiscordUser): string {
  if (author.discriminator && author.discriminator !== "0") {
    return `${author.username}#${author.discriminator}`;
  }
  return author.username;
}

export function messageBody(message: DiscordMessage): string {
  return message.content.length > 0 ? message.content : NO_TEXT_CONTENT;
}

export function describeAttachment(attachment: DiscordAttachment): string {
  return `${attachment.filename} (${attachment.url})`;
}

/**
 * Human label for a channel: the DM name, or `#name (from Server)`.
 */
export function channelLabel(channel: DiscordChannel): string {
  if (channel.kind === "server-channel") {
    return channel.serverName
      ? `#${channel.name} (from ${channel.serverName})`
      : `#${channel.name}`;
  }
  return channel.name;
}

/** Label made safe for directory and file names. */
export function channelSlug(channel: DiscordChannel): string {
  return sanitizeFilename(channelLabel(channel));
}
