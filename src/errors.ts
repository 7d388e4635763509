/**
 * Thrown at boundaries when configuration is unusable: invalid experiment
 * ratios, an unreadable config file, a capability registered twice.
 */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
}

/** A query the data store refused or failed to run. */
export class ExecutionError extends Error {
  override readonly name = "ExecutionError";
}

/** The reasoning provider failed: transport, malformed JSON or a schema mismatch. */
export class ReasoningFault extends Error {
  override readonly name = "ReasoningFault";

  constructor(
    readonly contract: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A capability threw while executing; rendered as an observation, not propagated. */
export class CapabilityInvocationFault extends Error {
  override readonly name = "CapabilityInvocationFault";

  constructor(
    readonly capability: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Kind tag carried by a failed synthesis result. */
export const QUERY_SYNTHESIS_EXHAUSTED = "QuerySynthesisExhausted" as const;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
