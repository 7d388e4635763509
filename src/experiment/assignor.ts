import { createHash } from "node:crypto";
import { ConfigurationError } from "../errors.js";
import type {
  AssignmentSet,
  ExperimentAssignment,
  ExperimentConfig,
  ExperimentModule,
  Variant,
} from "./types.js";

const BUCKETS = 100n;

/** Stable 0..99 bucket: the MD5 digest of the user id read as an unsigned integer. */
export function bucketOf(userId: string): number {
  const hex = createHash("md5").update(userId, "utf8").digest("hex");
  return Number(BigInt(`0x${hex}`) % BUCKETS);
}

export function validateRatios(ratioA: number, ratioB: number): void {
  for (const [name, value] of [["ratioA", ratioA], ["ratioB", ratioB]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      throw new ConfigurationError(`${name} must be an integer between 0 and 100, got ${value}`);
    }
  }
  if (ratioA + ratioB > 100) {
    throw new ConfigurationError(
      `ratioA + ratioB must not exceed 100, got ${ratioA} + ${ratioB}`,
    );
  }
}

export function variantForBucket(bucket: number, ratioA: number, ratioB: number): Variant {
  if (bucket < ratioA) return "variant_a";
  if (bucket < ratioA + ratioB) return "variant_b";
  return "control";
}

export function assign(
  userId: string,
  module: ExperimentModule,
  ratioA: number,
  ratioB: number,
): ExperimentAssignment {
  validateRatios(ratioA, ratioB);
  return Object.freeze({
    module,
    variant: variantForBucket(bucketOf(userId), ratioA, ratioB),
    enabled: true,
  });
}

function controlFor(module: ExperimentModule): ExperimentAssignment {
  return Object.freeze({ module, variant: "control", enabled: false });
}

/**
 * One assignment per module. Only the module under test is bucketed;
 * the others, and all of them when the experiment is off, run control.
 */
export function resolveAssignments(
  userId: string,
  experiment: ExperimentConfig,
): AssignmentSet {
  if (experiment.enabled) {
    validateRatios(experiment.ratioA, experiment.ratioB);
  }
  const pick = (module: ExperimentModule): ExperimentAssignment =>
    experiment.enabled && module === experiment.moduleToTest
      ? assign(userId, module, experiment.ratioA, experiment.ratioB)
      : controlFor(module);
  return Object.freeze({
    pre_guardrail: pick("pre_guardrail"),
    post_guardrail: pick("post_guardrail"),
    agent: pick("agent"),
  });
}
