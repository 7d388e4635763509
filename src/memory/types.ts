export interface ConversationTurn {
  readonly role: "user" | "assistant";
  readonly content: string;
}

export const DEFAULT_HISTORY_ROUNDS = 10;

/**
 * Session-scoped conversation history. A round is one user turn and the
 * assistant turn that answered it.
 */
export interface SessionMemory {
  getHistory(sessionId: string, rounds?: number): Promise<ConversationTurn[]>;
  append(sessionId: string, turns: readonly ConversationTurn[]): Promise<void>;
  clear(sessionId: string): Promise<void>;
}

/** The most recent `rounds` rounds, counted as pairs of turns. */
export function lastRounds(
  turns: readonly ConversationTurn[],
  rounds: number,
): ConversationTurn[] {
  if (rounds <= 0) return [];
  return turns.slice(-rounds * 2);
}
