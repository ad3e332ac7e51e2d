import { describe, expect, it, vi } from "vitest";
import { AuthError, PermissionError } from "../../../src/connectors/core/errors.js";
import {
  ResourceBrowser,
  resolveChannel,
  resolveServer,
  searchByName,
} from "../../../src/connectors/discord/browser.js";
import type { BrowserApi } from "../../../src/connectors/discord/browser.js";
import type {
  DiscordChannel,
  DiscordServer,
} from "../../../src/connectors/discord/types.js";
import { createTestLogger } from "../helpers.js";
import { dmWithBob, general, random } from "./fixtures.js";

function server(id: string, name: string): DiscordServer {
  return { id, name, icon: null, owner: false };
}

describe("resolveChannel", () => {
  const channels = [general, random];

  it("selects by 1-based list number", () => {
    expect(resolveChannel(channels, "2")).toEqual({ kind: "selected", item: random });
    expect(resolveChannel(channels, " 1 ")).toEqual({ kind: "selected", item: general });
  });

  it("rejects numbers outside the list", () => {
    const invalid = { kind: "invalid", reason: "Choose a number between 1 and 2" };
    expect(resolveChannel(channels, "0")).toEqual(invalid);
    expect(resolveChannel(channels, "3")).toEqual(invalid);
  });

  it("rejects blank input", () => {
    expect(resolveChannel(channels, "   ")).toEqual({
      kind: "invalid",
      reason: "Enter a number or a name to search",
    });
  });

  it("selects the only case-insensitive match", () => {
    expect(resolveChannel(channels, "#GEN")).toEqual({ kind: "selected", item: general });
  });

  it("reports several matches", () => {
    expect(resolveChannel(channels, "r")).toEqual({
      kind: "ambiguous",
      matches: [general, random],
    });
  });

  it("reports no match", () => {
    expect(resolveChannel(channels, "xyz")).toEqual({ kind: "none", term: "xyz" });
  });
});

describe("resolveServer", () => {
  it("searches by server name", () => {
    const servers = [
      { server: server("s1", "Book Club"), channels: [general] },
      { server: server("s2", "Chess"), channels: [random] },
    ];
    expect(resolveServer(servers, "chess")).toEqual({
      kind: "selected",
      item: servers[1],
    });
  });
});

describe("searchByName", () => {
  it("returns nothing for an empty term", () => {
    expect(searchByName([general], "#", (ch) => ch.name)).toEqual([]);
  });
});

describe("ResourceBrowser", () => {
  function createApi(
    listChannels: (serverId: string) => Promise<DiscordChannel[]>,
  ): BrowserApi {
    return {
      listDMs: vi.fn(async () => [dmWithBob]),
      listServers: vi.fn(async () => [
        server("s1", "My Server"),
        server("s2", "Locked"),
        server("s3", "Empty"),
      ]),
      listChannels: vi.fn(listChannels),
    };
  }

  const channelsByServer = async (serverId: string): Promise<DiscordChannel[]> => {
    if (serverId === "s1") return [general, random];
    if (serverId === "s2") throw new PermissionError("guilds/s2/channels", 403);
    return [];
  };

  it("loads servers with channels and skips unreadable ones", async () => {
    const logger = createTestLogger();
    const browser = new ResourceBrowser(createApi(channelsByServer), logger);

    const servers = await browser.loadServers();

    expect(servers).toEqual([
      { server: server("s1", "My Server"), channels: [general, random] },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Skipped server Locked: No permission to read guilds/s2/channels",
    );
    expect(logger.progress).toHaveBeenLastCalledWith(3, 3, "Loading server channels");
  });

  it("lets auth failures through", async () => {
    const browser = new ResourceBrowser(
      createApi(async () => {
        throw new AuthError("Token is invalid or expired");
      }),
      createTestLogger(),
    );
    await expect(browser.loadServers()).rejects.toBeInstanceOf(AuthError);
  });

  it("searches DMs and server channels together", async () => {
    const browser = new ResourceBrowser(createApi(channelsByServer), createTestLogger());

    await expect(browser.search("bob")).resolves.toEqual([dmWithBob]);
    await expect(browser.search("my server")).resolves.toEqual([general, random]);
  });
});
