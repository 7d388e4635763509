import type { ConversationTurn } from "../memory/types.js";
import type { ToolCallRecord } from "../reasoning/contracts.js";

export const APOLOGY_MESSAGE =
  "I'm sorry, I wasn't able to complete your request right now. Please try again in a moment.";

export const DEFAULT_MAX_ITERATIONS = 10;

export interface AgentRequest {
  readonly userMessage: string;
  readonly history: readonly ConversationTurn[];
  readonly pageContext: string;
  readonly personalization?: string;
  readonly userId: string;
  readonly sessionId: string | null;
  readonly turnId: string;
}

export type Termination = "finish" | "iteration_cap" | "reasoning_fault" | "no_answer" | "aborted";

export interface AgentOutcome {
  readonly answer: string;
  readonly iterations: number;
  readonly terminatedBy: Termination;
  readonly trajectory: readonly ToolCallRecord[];
}
