import type { ExperimentConfig } from "../experiment/types.js";
import type { Logger } from "../logging/logger.js";
import { DEFAULT_HISTORY_ROUNDS, type ConversationTurn, type SessionMemory } from "../memory/types.js";
import type { ConversationPipeline, TurnRequest, TurnResult } from "./conversation.js";

export interface ChatRequest {
  readonly message: string;
  readonly userId: string;
  readonly sessionId: string;
  readonly pageContext?: string;
  readonly personalization?: string;
}

/** Runs turns against session memory: reads the history, then records both sides. */
export class ConversationService {
  constructor(
    private readonly pipeline: ConversationPipeline,
    private readonly memory: SessionMemory,
    private readonly logger: Logger,
    private readonly rounds = DEFAULT_HISTORY_ROUNDS,
  ) {}

  async chat(
    request: ChatRequest,
    experiment?: ExperimentConfig,
    opts: { signal?: AbortSignal } = {},
  ): Promise<TurnResult> {
    const history = await this.memory.getHistory(request.sessionId, this.rounds);
    const turn: TurnRequest = {
      userMessage: request.message,
      history,
      pageContext: request.pageContext,
      userId: request.userId,
      sessionId: request.sessionId,
      personalization: request.personalization,
    };
    const result = await this.pipeline.handleTurn(turn, experiment, opts);

    await this.memory.append(request.sessionId, [
      { role: "user", content: request.message },
      { role: "assistant", content: result.answer },
    ]);
    this.logger.debug({ sessionId: request.sessionId, stage: result.stage }, "Turn recorded");
    return result;
  }

  history(sessionId: string): Promise<ConversationTurn[]> {
    return this.memory.getHistory(sessionId, this.rounds);
  }

  reset(sessionId: string): Promise<void> {
    return this.memory.clear(sessionId);
  }
}
