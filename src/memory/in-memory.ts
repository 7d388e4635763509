import { DEFAULT_HISTORY_ROUNDS, lastRounds, type ConversationTurn, type SessionMemory } from "./types.js";

/** Process-local history, trimmed to the most recent `maxRounds` rounds per session. */
export class InMemorySessionMemory implements SessionMemory {
  private readonly sessions = new Map<string, readonly ConversationTurn[]>();

  constructor(private readonly maxRounds = DEFAULT_HISTORY_ROUNDS) {}

  async getHistory(sessionId: string, rounds = this.maxRounds): Promise<ConversationTurn[]> {
    return lastRounds(this.sessions.get(sessionId) ?? [], rounds);
  }

  async append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void> {
    const current = this.sessions.get(sessionId) ?? [];
    this.sessions.set(sessionId, Object.freeze(lastRounds([...current, ...turns], this.maxRounds)));
  }

  async clear(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }
}
