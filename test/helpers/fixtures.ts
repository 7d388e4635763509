import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "../../src/config/schema.js";
import type { TicketDeskConfig } from "../../src/config/types.js";
import type { ToolContext } from "../../src/tools/types.js";
import { createSilentLogger } from "../../src/logging/logger.js";

/** 2026-10-19T00:00:00Z; the sample catalog's occurrences are all after it. */
export const FIXED_NOW = Date.parse("2026-10-19T00:00:00.000Z");

export function makeConfig(overrides: Record<string, unknown> = {}): TicketDeskConfig {
  return parseConfig(overrides);
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function makeToolContext(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    sessionId: "session-1",
    userId: "user-1",
    turnId: "turn-1",
    logger: createSilentLogger(),
    ...overrides,
  };
}
