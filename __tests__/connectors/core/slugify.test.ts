import { describe, expect, it } from "vitest";
import {
  fileTimestamp,
  sanitizeFilename,
} from "../../../src/connectors/core/slugify.js";

describe("sanitizeFilename", () => {
  it("replaces separators and spaces", () => {
    expect(sanitizeFilename("Server Name/Test!")).toBe("Server_Name_Test");
  });

  it("collapses runs of underscores", () => {
    expect(sanitizeFilename("#general (from My Server)")).toBe(
      "general_from_My_Server",
    );
  });

  it("keeps dots, hyphens and letters outside ASCII", () => {
    expect(sanitizeFilename("café-chat.v2")).toBe("café-chat.v2");
  });

  it("falls back when nothing usable is left", () => {
    expect(sanitizeFilename("!!!")).toBe("discord_channel");
    expect(sanitizeFilename("")).toBe("discord_channel");
  });

  it("truncates to the max length", () => {
    expect(sanitizeFilename("a".repeat(150))).toHaveLength(100);
    expect(sanitizeFilename("abcdef", 3)).toBe("abc");
  });

  it("is idempotent", () => {
    const inputs = [
      "Server Name/Test!",
      "DM with someone",
      "__weird..name__",
      "  spaced  out  ",
      `${"x".repeat(99)} y`,
    ];
    for (const input of inputs) {
      const once = sanitizeFilename(input);
      expect(sanitizeFilename(once)).toBe(once);
    }
  });
});

describe("fileTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(fileTimestamp(new Date(2024, 0, 15, 9, 5, 3))).toBe("20240115_090503");
  });
});
