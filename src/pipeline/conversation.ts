import { randomUUID } from "node:crypto";
import { AgentOrchestrator } from "../agent/orchestrator.js";
import type { AgentOutcome } from "../agent/types.js";
import type { AgentConfig, ExperimentSettings, GuardrailsConfig } from "../config/types.js";
import { resolveAssignments } from "../experiment/assignor.js";
import { experimentConfigFrom, stageProfileFor } from "../experiment/profiles.js";
import type { AssignmentSet, ExperimentConfig } from "../experiment/types.js";
import { InputGuardrail } from "../guardrails/input.js";
import { OutputGuardrail } from "../guardrails/output.js";
import { DEFAULT_REDIRECT } from "../guardrails/patterns.js";
import type { ViolationKind } from "../guardrails/types.js";
import type { Logger } from "../logging/logger.js";
import type { ConversationTurn } from "../memory/types.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import type { ToolRegistry } from "../tools/registry.js";

export const DEFAULT_PAGE_CONTEXT = "general";

export interface TurnRequest {
  readonly userMessage: string;
  readonly history: readonly ConversationTurn[];
  readonly pageContext?: string;
  readonly userId: string;
  readonly sessionId?: string;
  readonly personalization?: string;
  readonly turnId?: string;
}

export interface TurnResult {
  readonly answer: string;
  /** `rejected` when the input guardrail answered instead of the agent. */
  readonly stage: "rejected" | "answered";
  readonly assignments: AssignmentSet;
  readonly violationKind: ViolationKind | null;
  readonly agent: AgentOutcome | null;
}

export interface PipelineSettings {
  readonly guardrails: GuardrailsConfig;
  readonly agent: AgentConfig;
  readonly experiment: ExperimentSettings;
}

/**
 * One user turn: variant selection, input guardrail, agent loop, output
 * guardrail. Stages run strictly in sequence and are built per turn from the
 * user's variant profile; nothing here holds per-turn state.
 */
export class ConversationPipeline {
  constructor(
    private readonly reasoning: ReasoningProvider,
    private readonly tools: ToolRegistry,
    private readonly logger: Logger,
    private readonly settings: PipelineSettings,
  ) {}

  async handleTurn(
    request: TurnRequest,
    experiment?: ExperimentConfig,
    opts: { signal?: AbortSignal } = {},
  ): Promise<TurnResult> {
    const assignments = resolveAssignments(
      request.userId,
      experiment ?? experimentConfigFrom(this.settings.experiment),
    );
    const profile = stageProfileFor(
      assignments,
      this.settings.experiment,
      this.settings.guardrails,
      this.settings.agent,
    );
    const pageContext = request.pageContext?.trim() || DEFAULT_PAGE_CONTEXT;
    const log = this.logger.child({ userId: request.userId, sessionId: request.sessionId ?? null });
    log.debug({ assignments, profile }, "Turn started");

    const input = new InputGuardrail(this.reasoning, log.child({ stage: "input_guardrail" }), {
      semantic: profile.inputSemantic,
      injectionPhrases: this.settings.guardrails.injectionPhrases,
      competitors: this.settings.guardrails.competitors,
    });
    const inputVerdict = await input.validate(
      { userMessage: request.userMessage, history: request.history, pageContext },
      opts,
    );
    if (!inputVerdict.isAcceptable) {
      log.info({ violationKind: inputVerdict.violationKind }, "Input rejected");
      return {
        answer: inputVerdict.userMessage ?? DEFAULT_REDIRECT,
        stage: "rejected",
        assignments,
        violationKind: inputVerdict.violationKind,
        agent: null,
      };
    }

    const agent = new AgentOrchestrator(this.reasoning, this.tools, log.child({ stage: "agent" }), {
      maxIterations: profile.maxIterations,
    });
    const outcome = await agent.run(
      {
        userMessage: request.userMessage,
        history: request.history,
        pageContext,
        personalization: request.personalization,
        userId: request.userId,
        sessionId: request.sessionId ?? null,
        turnId: request.turnId ?? randomUUID(),
      },
      opts,
    );

    const output = new OutputGuardrail(this.reasoning, log.child({ stage: "output_guardrail" }), {
      semantic: profile.outputSemantic,
      competitors: this.settings.guardrails.competitors,
    });
    const outputVerdict = await output.validate(
      { answer: outcome.answer, userMessage: request.userMessage, pageContext },
      opts,
    );

    return {
      answer: outputVerdict.sanitizedContent,
      stage: "answered",
      assignments,
      violationKind: outputVerdict.violationKind,
      agent: outcome,
    };
  }
}
