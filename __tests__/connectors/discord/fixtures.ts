import type {
  DiscordChannel,
  DiscordMessage,
  DiscordUser,
} from "../../../src/connectors/discord/types.js";

export const alice: DiscordUser = {
  id: "u1",
  username: "alice",
  displayName: "Alice",
  discriminator: "0",
  bot: false,
};

export const bob: DiscordUser = {
  id: "u2",
  username: "bob",
  displayName: "Bob",
  discriminator: "1234",
  bot: false,
};

export const general: DiscordChannel = {
  id: "c1",
  name: "general",
  kind: "server-channel",
  serverId: "s1",
  serverName: "My Server",
  position: 0,
};

export const random: DiscordChannel = {
  id: "c2",
  name: "random",
  kind: "server-channel",
  serverId: "s1",
  serverName: "My Server",
  position: 1,
};

export const dmWithBob: DiscordChannel = {
  id: "d1",
  name: "DM with bob",
  kind: "dm",
  position: 0,
};

export function message(
  id: string,
  author: DiscordUser,
  timestamp: string,
  content: string,
  overrides: Partial<DiscordMessage> = {},
): DiscordMessage {
  return {
    id,
    channelId: "c1",
    author,
    timestamp,
    editedTimestamp: null,
    content,
    attachments: [],
    type: 0,
    pinned: false,
    referencedMessageId: null,
    ...overrides,
  };
}

/** Three messages across two UTC days. */
export function sampleMessages(): DiscordMessage[] {
  return [
    message("1", alice, "2024-01-15T09:05:03.000Z", "Hello, world"),
    message("2", bob, "2024-01-15T23:59:59.000Z", "", {
      attachments: [
        {
          id: "a1",
          filename: "cat.png",
          url: "https://cdn.example.com/cat.png",
          size: 10,
          contentType: "image/png",
        },
      ],
    }),
    message("3", alice, "2024-01-16T00:00:10.000Z", 'She said "hi"\nsecond line'),
  ];
}
