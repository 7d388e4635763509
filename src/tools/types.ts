import { z } from "zod";
import type { Logger } from "../logging/logger.js";

export interface ToolContext {
  readonly sessionId: string | null;
  readonly userId: string;
  /** Identifies the user turn; repeated side effects within one turn are collapsed. */
  readonly turnId: string;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

export type ToolArgs<S extends z.ZodRawShape> = z.output<z.ZodObject<S, "strip">>;

export interface ToolDefinition<S extends z.ZodRawShape> {
  readonly name: string;
  readonly description: string;
  readonly args: S;
  execute(args: ToolArgs<S>, ctx: ToolContext): Promise<unknown>;
}

export interface ArgumentDescription {
  readonly name: string;
  readonly type: string;
  readonly optional: boolean;
  readonly description: string | undefined;
}

/** A tool with its argument types erased; arguments are validated on every run. */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly arguments: readonly ArgumentDescription[];
  run(rawArgs: unknown, ctx: ToolContext): Promise<unknown>;
}

export interface InvalidArguments {
  readonly error: string;
  readonly issues: Record<string, string[]>;
}

export function typeLabel(type: z.ZodTypeAny): string {
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) return typeLabel(type.unwrap());
  if (type instanceof z.ZodDefault) return typeLabel(type.removeDefault());
  if (type instanceof z.ZodEffects) return typeLabel(type.innerType());
  if (type instanceof z.ZodString) return "string";
  if (type instanceof z.ZodNumber) return "number";
  if (type instanceof z.ZodBoolean) return "boolean";
  if (type instanceof z.ZodEnum) return type.options.map((o: string) => JSON.stringify(o)).join(" | ");
  if (type instanceof z.ZodArray) return `${typeLabel(type.element)}[]`;
  if (type instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = type.options;
    return options.map(typeLabel).join(" | ");
  }
  return "value";
}

export function defineTool<S extends z.ZodRawShape>(def: ToolDefinition<S>): Tool {
  const schema: z.ZodTypeAny = z.object(def.args);
  const args = Object.entries(def.args).map(([name, type]) => ({
    name,
    type: typeLabel(type),
    optional: type.isOptional(),
    description: type.description,
  }));

  return {
    name: def.name,
    description: def.description,
    arguments: args,
    async run(rawArgs, ctx) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues: Record<string, string[]> = {};
        for (const issue of parsed.error.issues) {
          const key = issue.path.join(".") || "(arguments)";
          (issues[key] ??= []).push(issue.message);
        }
        const invalid: InvalidArguments = { error: `Invalid arguments for ${def.name}`, issues };
        return invalid;
      }
      return def.execute(parsed.data, ctx);
    },
  };
}
