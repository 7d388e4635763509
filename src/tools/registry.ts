import { CapabilityInvocationFault, ConfigurationError, errorMessage } from "../errors.js";
import type { Tool, ToolContext } from "./types.js";

/** Reserved name the reasoning step uses to end a turn. */
export const FINISH_TOOL = "finish";

const FINISH_DESCRIPTION = [
  `<tool name="${FINISH_TOOL}">`,
  "End the turn and reply to the user.",
  "Arguments:",
  "- answer (string): The final reply.",
  "</tool>",
].join("\n");

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: Tool): this {
    if (tool.name === FINISH_TOOL) {
      throw new ConfigurationError(`"${FINISH_TOOL}" is reserved`);
    }
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Runs a tool. Invalid arguments come back as an `{error, issues}` payload;
   * an unknown name or a throwing tool raises CapabilityInvocationFault.
   */
  async invoke(name: string, args: unknown, ctx: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new CapabilityInvocationFault(
        name,
        `Unknown tool "${name}". Available tools: ${[...this.names(), FINISH_TOOL].join(", ")}`,
      );
    }
    try {
      return await tool.run(args, ctx);
    } catch (err) {
      throw new CapabilityInvocationFault(name, `Tool "${name}" failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Tool catalog rendered for the reasoning step, `finish` last. */
  describe(): string {
    const blocks = [...this.tools.values()].map((tool) => {
      const lines = [`<tool name="${tool.name}">`, tool.description];
      if (tool.arguments.length > 0) {
        lines.push("Arguments:");
        for (const arg of tool.arguments) {
          const type = arg.optional ? `${arg.type}, optional` : arg.type;
          lines.push(`- ${arg.name} (${type})${arg.description ? `: ${arg.description}` : ""}`);
        }
      } else {
        lines.push("Arguments: none");
      }
      lines.push("</tool>");
      return lines.join("\n");
    });
    blocks.push(FINISH_DESCRIPTION);
    return blocks.join("\n\n");
  }
}
