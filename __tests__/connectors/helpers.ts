import { vi } from "vitest";
import type { Logger } from "../../src/connectors/core/index.js";

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
  } satisfies Logger;
}
