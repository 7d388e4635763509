import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import { DEFAULT_HISTORY_ROUNDS, lastRounds, type ConversationTurn, type SessionMemory } from "./types.js";

const storedSessionsSchema = z.record(
  z.array(z.object({ role: z.enum(["user", "assistant"]), content: z.string() })),
);

type StoredSessions = Record<string, ConversationTurn[]>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * History kept in `memory.json` under the state directory so sessions survive
 * a restart. Every operation reads the file under a lock, so instances and
 * processes sharing the directory see each other's writes.
 */
export class FileSessionMemory implements SessionMemory {
  private readonly filePath: string;

  constructor(
    dataDir: string,
    private readonly logger: Logger,
    private readonly maxRounds = DEFAULT_HISTORY_ROUNDS,
  ) {
    mkdirSync(dataDir, { recursive: true });
    this.filePath = join(dataDir, "memory.json");
  }

  async getHistory(sessionId: string, rounds = this.maxRounds): Promise<ConversationTurn[]> {
    const sessions = await withFileLock(this.filePath, () => this.readSessions());
    return lastRounds(sessions[sessionId] ?? [], rounds);
  }

  async append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    return withFileLock(this.filePath, async () => {
      const sessions = await this.readSessions();
      sessions[sessionId] = lastRounds([...(sessions[sessionId] ?? []), ...turns], this.maxRounds);
      await this.writeSessions(sessions);
    });
  }

  async clear(sessionId: string): Promise<void> {
    return withFileLock(this.filePath, async () => {
      const sessions = await this.readSessions();
      if (!(sessionId in sessions)) return;
      delete sessions[sessionId];
      await this.writeSessions(sessions);
    });
  }

  private async readSessions(): Promise<StoredSessions> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    const parsed = storedSessionsSchema.safeParse(safeJson(raw));
    if (!parsed.success) {
      this.logger.warn({ path: this.filePath }, "Session memory file is unreadable, starting empty");
      return {};
    }
    return parsed.data;
  }

  private async writeSessions(sessions: StoredSessions): Promise<void> {
    await writeFile(this.filePath, JSON.stringify(sessions, null, 2));
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
