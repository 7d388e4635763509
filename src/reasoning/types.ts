import type { z } from "zod";

export type ContractName = "validate_input" | "validate_output" | "synthesize_query" | "act";

/**
 * A typed request to the reasoning capability: what to do, what goes in,
 * and the shape the answer must take.
 */
export interface ReasoningContract<
  I extends z.ZodTypeAny = z.ZodTypeAny,
  O extends z.ZodTypeAny = z.ZodTypeAny,
> {
  readonly name: ContractName;
  readonly instructions: string;
  readonly input: I;
  readonly output: O;
  /** Field descriptions rendered into the prompt. */
  readonly fields: {
    readonly inputs: Readonly<Record<string, string>>;
    readonly outputs: Readonly<Record<string, string>>;
  };
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface ReasoningProvider {
  invoke<I extends z.ZodTypeAny, O extends z.ZodTypeAny>(
    contract: ReasoningContract<I, O>,
    inputs: z.input<I>,
    options?: InvokeOptions,
  ): Promise<z.output<O>>;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  signal?: AbortSignal;
}

/** Sends one chat completion in JSON mode and returns the raw text. */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;
