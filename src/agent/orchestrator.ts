import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { actContract, type ActStep, type ToolCallRecord } from "../reasoning/contracts.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import { FINISH_TOOL, type ToolRegistry } from "../tools/registry.js";
import type { ToolContext } from "../tools/types.js";
import {
  APOLOGY_MESSAGE,
  DEFAULT_MAX_ITERATIONS,
  type AgentOutcome,
  type AgentRequest,
  type Termination,
} from "./types.js";

export interface AgentOptions {
  maxIterations?: number;
}

/**
 * Bounded reason/act loop. Each iteration asks the reasoning provider for one
 * tool call, runs it and records the observation, until the provider calls
 * `finish` or the iteration budget runs out.
 */
export class AgentOrchestrator {
  readonly maxIterations: number;

  constructor(
    private readonly reasoning: ReasoningProvider,
    private readonly tools: ToolRegistry,
    private readonly logger: Logger,
    options: AgentOptions = {},
  ) {
    this.maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS);
  }

  async run(request: AgentRequest, opts: { signal?: AbortSignal } = {}): Promise<AgentOutcome> {
    const log = this.logger.child({ turnId: request.turnId });
    const catalog = this.tools.describe();
    const trajectory: ToolCallRecord[] = [];
    let draft = "";

    const done = (answer: string, terminatedBy: Termination, iterations: number): AgentOutcome => {
      log.info({ terminatedBy, iterations, toolCalls: trajectory.length }, "Agent finished");
      return { answer, iterations, terminatedBy, trajectory };
    };

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      if (opts.signal?.aborted) {
        return done(draft || APOLOGY_MESSAGE, "aborted", iteration - 1);
      }

      let step: ActStep;
      try {
        step = await this.reasoning.invoke(
          actContract,
          {
            userMessage: request.userMessage,
            history: [...request.history],
            pageContext: request.pageContext,
            personalization: request.personalization,
            trajectory: [...trajectory],
            tools: catalog,
            iteration,
            maxIterations: this.maxIterations,
          },
          { signal: opts.signal },
        );
      } catch (err) {
        log.error({ error: errorMessage(err), iteration }, "Reasoning step failed");
        return done(APOLOGY_MESSAGE, "reasoning_fault", iteration);
      }

      if (step.answer.trim().length > 0) draft = step.answer.trim();
      const tool = step.tool.trim();

      if (tool === FINISH_TOOL) {
        const final = finalAnswer(step) || draft;
        return final
          ? done(final, "finish", iteration)
          : done(APOLOGY_MESSAGE, "no_answer", iteration);
      }

      const ctx: ToolContext = {
        sessionId: request.sessionId,
        userId: request.userId,
        turnId: request.turnId,
        logger: log.child({ tool }),
        signal: opts.signal,
      };
      let result: unknown;
      try {
        result = await this.tools.invoke(tool, step.args, ctx);
      } catch (err) {
        log.warn({ tool, error: errorMessage(err) }, "Tool call failed");
        result = { error: errorMessage(err) };
      }
      trajectory.push({ iteration, capabilityName: tool, arguments: step.args, result });
    }

    log.warn({ maxIterations: this.maxIterations }, "Iteration limit reached");
    return draft
      ? done(draft, "iteration_cap", this.maxIterations)
      : done(APOLOGY_MESSAGE, "no_answer", this.maxIterations);
  }
}

function finalAnswer(step: ActStep): string {
  const value = step.args["answer"];
  return typeof value === "string" ? value.trim() : "";
}
