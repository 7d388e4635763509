export const EXPERIMENT_MODULES = ["pre_guardrail", "post_guardrail", "agent"] as const;
export type ExperimentModule = (typeof EXPERIMENT_MODULES)[number];

export const VARIANTS = ["control", "variant_a", "variant_b"] as const;
export type Variant = (typeof VARIANTS)[number];

export interface ExperimentAssignment {
  readonly module: ExperimentModule;
  readonly variant: Variant;
  readonly enabled: boolean;
}

/**
 * Experiment parameters for a single request. Built once per request and
 * passed down explicitly; nothing below the pipeline reads the environment.
 */
export interface ExperimentConfig {
  readonly enabled: boolean;
  readonly moduleToTest: ExperimentModule;
  readonly ratioA: number;
  readonly ratioB: number;
}

export type AssignmentSet = Readonly<Record<ExperimentModule, ExperimentAssignment>>;
