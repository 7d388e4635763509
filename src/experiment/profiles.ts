import type { ExperimentSettings, GuardrailsConfig, AgentConfig } from "../config/types.js";
import type { AssignmentSet, ExperimentConfig } from "./types.js";

export interface StageProfile {
  readonly inputSemantic: boolean;
  readonly outputSemantic: boolean;
  readonly maxIterations: number;
}

export function experimentConfigFrom(settings: ExperimentSettings): ExperimentConfig {
  return Object.freeze({
    enabled: settings.enabled,
    moduleToTest: settings.moduleToTest,
    ratioA: settings.ratioA,
    ratioB: settings.ratioB,
  });
}

/**
 * Translates a user's assignments into the stage settings they experience.
 * Variant profiles can switch the semantic layer off or shorten the loop;
 * they never raise the configured iteration ceiling.
 */
export function stageProfileFor(
  assignments: AssignmentSet,
  settings: ExperimentSettings,
  guardrails: GuardrailsConfig,
  agent: AgentConfig,
): StageProfile {
  const { semanticGuardrail, agentIterations } = settings.profiles;
  return {
    inputSemantic:
      guardrails.input.semantic && semanticGuardrail[assignments.pre_guardrail.variant],
    outputSemantic:
      guardrails.output.semantic && semanticGuardrail[assignments.post_guardrail.variant],
    maxIterations: Math.min(agent.maxIterations, agentIterations[assignments.agent.variant]),
  };
}
