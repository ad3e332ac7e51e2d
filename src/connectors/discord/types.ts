/** Discord-specific type definitions. */

// ─── Core Discord Entities ───

export interface DiscordUser {
  id: string;
  username: string;
  displayName: string;
  /** "0" for accounts migrated to unique usernames */
  discriminator: string;
  bot: boolean;
}

export interface DiscordServer {
  id: string;
  name: string;
  icon: string | null;
  owner: boolean;
}

export type ChannelKind = "dm" | "group-dm" | "server-channel";

export interface DiscordChannel {
  id: string;
  name: string;
  kind: ChannelKind;
  serverId?: string;
  serverName?: string;
  position: number;
}

export interface DiscordAttachment {
  id: string;
  filename: string;
  url: string;
  size: number;
  contentType: string | null;
}

export interface DiscordMessage {
  id: string;
  channelId: string;
  author: DiscordUser;
  /** ISO-8601 */
  timestamp: string;
  editedTimestamp: string | null;
  content: string;
  attachments: DiscordAttachment[];
  type: number;
  pinned: boolean;
  referencedMessageId: string | null;
}

// ─── API Results ───

export interface MessagePage {
  /** Newest first, as the API returns them */
  messages: DiscordMessage[];
  /** Id of the oldest message on the page; null when the page was empty */
  nextCursor: string | null;
}

export interface ServerWithChannels {
  server: DiscordServer;
  channels: DiscordChannel[];
}

// ─── Exporter Input ───

export interface ExportBatch {
  channel: DiscordChannel;
  /** Oldest first */
  messages: readonly DiscordMessage[];
  exportedAt: Date;
}

export interface RenderedExport {
  /** Sanitized channel label, also used as the directory name */
  label: string;
  filename: string;
  content: string;
}
