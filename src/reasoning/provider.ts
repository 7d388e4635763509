import type { z } from "zod";
import { ReasoningFault, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { parseJsonObject } from "./parse.js";
import type {
  ChatMessage,
  CompletionFn,
  InvokeOptions,
  ReasoningContract,
  ReasoningProvider,
} from "./types.js";

function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value, null, 2);
}

export function buildMessages(
  contract: ReasoningContract,
  inputs: Record<string, unknown>,
): ChatMessage[] {
  const outputs = Object.entries(contract.fields.outputs)
    .map(([name, desc]) => `- ${name}: ${desc}`)
    .join("\n");

  const system =
    `${contract.instructions}\n\n` +
    `Respond with a single JSON object and nothing else. Fields:\n${outputs}`;

  const sections: string[] = [];
  for (const [name, desc] of Object.entries(contract.fields.inputs)) {
    const value = inputs[name];
    if (value === undefined) continue;
    sections.push(`## ${name}\n${desc}\n\n${renderValue(value)}`);
  }

  return [
    { role: "system", content: system },
    { role: "user", content: sections.join("\n\n") },
  ];
}

/**
 * Reasoning over any chat-completion backend that answers in JSON. The reply
 * is validated against the contract's output schema; every failure surfaces
 * as a ReasoningFault.
 */
export class JsonReasoningProvider implements ReasoningProvider {
  constructor(
    private readonly complete: CompletionFn,
    private readonly logger: Logger,
  ) {}

  async invoke<I extends z.ZodTypeAny, O extends z.ZodTypeAny>(
    contract: ReasoningContract<I, O>,
    inputs: z.input<I>,
    options: InvokeOptions = {},
  ): Promise<z.output<O>> {
    const log = this.logger.child({ contract: contract.name });

    const validInputs = contract.input.safeParse(inputs);
    if (!validInputs.success) {
      throw new ReasoningFault(contract.name, `Invalid inputs: ${validInputs.error.message}`);
    }
    const payload: unknown = validInputs.data;
    const record: Record<string, unknown> =
      typeof payload === "object" && payload !== null ? { ...payload } : {};

    let raw: string;
    try {
      raw = await this.complete({
        messages: buildMessages(contract, record),
        signal: options.signal,
      });
    } catch (err) {
      log.warn({ err }, "Completion request failed");
      throw new ReasoningFault(contract.name, `Completion failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = parseJsonObject(raw);
    if (!parsed.ok) {
      log.warn({ error: parsed.error }, "Reply is not valid JSON");
      throw new ReasoningFault(contract.name, `Invalid JSON reply: ${parsed.error}`);
    }

    const result = contract.output.safeParse(parsed.value);
    if (!result.success) {
      log.warn({ issues: result.error.issues }, "Reply does not match contract");
      throw new ReasoningFault(
        contract.name,
        `Reply does not match contract: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }
    log.debug("Reasoning step completed");
    return result.data;
  }
}
