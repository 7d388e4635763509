import type { z } from "zod";
import { ReasoningFault } from "../../src/errors.js";
import type {
  ContractName,
  InvokeOptions,
  ReasoningContract,
  ReasoningProvider,
} from "../../src/reasoning/types.js";

type Responder = (inputs: unknown, call: number) => unknown;

export interface RecordedCall {
  contract: ContractName;
  inputs: unknown;
}

/**
 * Reasoning provider driven by canned replies. Queued replies are used first,
 * then the contract's responder. An Error reply is thrown as a ReasoningFault.
 * Replies go through the contract's output schema like real ones.
 */
export class ScriptedReasoning implements ReasoningProvider {
  readonly calls: RecordedCall[] = [];
  private readonly queues = new Map<ContractName, unknown[]>();
  private readonly responders = new Map<ContractName, Responder>();

  on(contract: ContractName, ...replies: unknown[]): this {
    this.queues.set(contract, [...(this.queues.get(contract) ?? []), ...replies]);
    return this;
  }

  respond(contract: ContractName, responder: Responder): this {
    this.responders.set(contract, responder);
    return this;
  }

  callsFor(contract: ContractName): unknown[] {
    return this.calls.filter((c) => c.contract === contract).map((c) => c.inputs);
  }

  async invoke<I extends z.ZodTypeAny, O extends z.ZodTypeAny>(
    contract: ReasoningContract<I, O>,
    inputs: z.input<I>,
    _options?: InvokeOptions,
  ): Promise<z.output<O>> {
    const call = this.calls.filter((c) => c.contract === contract.name).length;
    this.calls.push({ contract: contract.name, inputs });

    const queue = this.queues.get(contract.name) ?? [];
    let reply: unknown;
    if (queue.length > 0) {
      reply = queue.shift();
    } else {
      const responder = this.responders.get(contract.name);
      if (!responder) {
        throw new ReasoningFault(contract.name, `No scripted reply for ${contract.name}`);
      }
      reply = responder(inputs, call);
    }

    if (reply instanceof Error) {
      throw new ReasoningFault(contract.name, reply.message, { cause: reply });
    }
    return contract.output.parse(reply);
  }
}
