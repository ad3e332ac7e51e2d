/**
 * zod schemas for the Discord v9 payloads we read, and mappers from the
 * raw snake_case shapes to our internal types.
 */

import { z } from "zod";
import type {
  DiscordAttachment,
  DiscordChannel,
  DiscordMessage,
  DiscordServer,
  DiscordUser,
} from "./types.js";

// ─── Channel type ids ───

export const CHANNEL_TYPE = {
  GUILD_TEXT: 0,
  DM: 1,
  GROUP_DM: 3,
  GUILD_ANNOUNCEMENT: 5,
} as const;

const READABLE_SERVER_CHANNEL_TYPES = new Set<number>([
  CHANNEL_TYPE.GUILD_TEXT,
  CHANNEL_TYPE.GUILD_ANNOUNCEMENT,
]);

// ─── Raw payloads ───

export const rawUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  global_name: z.string().nullish(),
  discriminator: z.string().optional().default("0"),
  bot: z.boolean().optional().default(false),
});

export const rawGuildSchema = z.object({
  id: z.string(),
  name: z.string(),
  icon: z.string().nullish(),
  owner: z.boolean().optional().default(false),
});

export const rawChannelSchema = z.object({
  id: z.string(),
  type: z.number().int(),
  name: z.string().nullish(),
  position: z.number().optional().default(0),
  guild_id: z.string().nullish(),
  last_message_id: z.string().nullish(),
  recipients: z.array(rawUserSchema).optional().default([]),
});

export const rawAttachmentSchema = z.object({
  id: z.string(),
  filename: z.string(),
  url: z.string(),
  size: z.number().optional().default(0),
  content_type: z.string().nullish(),
});

export const rawMessageSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  author: rawUserSchema,
  content: z.string().optional().default(""),
  timestamp: z.string(),
  edited_timestamp: z.string().nullish(),
  attachments: z.array(rawAttachmentSchema).optional().default([]),
  type: z.number().int().optional().default(0),
  pinned: z.boolean().optional().default(false),
  message_reference: z
    .object({ message_id: z.string().nullish() })
    .nullish(),
});

export const rateLimitBodySchema = z.object({
  retry_after: z.number(),
  global: z.boolean().optional(),
});

export type RawUser = z.infer<typeof rawUserSchema>;
export type RawGuild = z.infer<typeof rawGuildSchema>;
export type RawChannel = z.infer<typeof rawChannelSchema>;
export type RawMessage = z.infer<typeof rawMessageSchema>;

// ─── Mappers ───

export function mapUser(raw: RawUser): DiscordUser {
  return {
    id: raw.id,
    username: raw.username,
    displayName: raw.global_name || raw.username,
    discriminator: raw.discriminator,
    bot: raw.bot,
  };
}

export function mapServer(raw: RawGuild): DiscordServer {
  return {
    id: raw.id,
    name: raw.name,
    icon: raw.icon ?? null,
    owner: raw.owner,
  };
}

export function mapAttachment(
  raw: z.infer<typeof rawAttachmentSchema>,
): DiscordAttachment {
  return {
    id: raw.id,
    filename: raw.filename,
    url: raw.url,
    size: raw.size,
    contentType: raw.content_type ?? null,
  };
}

export function mapMessage(raw: RawMessage): DiscordMessage {
  return {
    id: raw.id,
    channelId: raw.channel_id,
    author: mapUser(raw.author),
    timestamp: raw.timestamp,
    editedTimestamp: raw.edited_timestamp ?? null,
    content: raw.content,
    attachments: raw.attachments.map(mapAttachment),
    type: raw.type,
    pinned: raw.pinned,
    referencedMessageId: raw.message_reference?.message_id ?? null,
  };
}

/**
 * Map a DM or group DM. Returns null for other channel types and for a
 * one-to-one DM without recipients.
 */
export function mapPrivateChannel(raw: RawChannel): DiscordChannel | null {
  if (raw.type === CHANNEL_TYPE.DM) {
    const recipient = raw.recipients[0];
    if (!recipient) return null;
    return {
      id: raw.id,
      name: `DM with ${recipient.username}`,
      kind: "dm",
      position: 0,
    };
  }
  if (raw.type === CHANNEL_TYPE.GROUP_DM) {
    return {
      id: raw.id,
      name: raw.name || `Group with ${raw.recipients.length} members`,
      kind: "group-dm",
      position: 0,
    };
  }
  return null;
}

/** Map a server channel. Returns null for channels without readable text. */
export function mapServerChannel(
  raw: RawChannel,
  serverId: string,
  serverName?: string,
): DiscordChannel | null {
  if (!READABLE_SERVER_CHANNEL_TYPES.has(raw.type)) return null;
  return {
    id: raw.id,
    name: raw.name || raw.id,
    kind: "server-channel",
    serverId,
    serverName,
    position: raw.position,
  };
}

/** Compare snowflake ids numerically. */
export function compareSnowflakes(a: string, b: string): number {
  if (!/^\d+$/.test(a) || !/^\d+$/.test(b)) return a.localeCompare(b);
  const x = BigInt(a);
  const y = BigInt(b);
  if (x === y) return 0;
  return x < y ? -1 : 1;
}
