import { describe, it, expect } from "vitest";
import { z } from "zod";
import { CapabilityInvocationFault, ConfigurationError } from "../../src/errors.js";
import { FINISH_TOOL, ToolRegistry } from "../../src/tools/registry.js";
import { createThinkingTool } from "../../src/tools/thinking.js";
import { defineTool, typeLabel, type Tool } from "../../src/tools/types.js";
import { makeToolContext } from "../helpers/fixtures.js";

const echo = defineTool({
  name: "echo",
  description: "Echo text.",
  args: {
    text: z.string().describe("Text to echo."),
    times: z.number().int().optional(),
  },
  async execute({ text, times }) {
    return text.repeat(times ?? 1);
  },
});

const boom: Tool = defineTool({
  name: "boom",
  description: "Always fails.",
  args: {},
  async execute() {
    throw new Error("kaput");
  },
});

const FINISH_BLOCK = [
  '<tool name="finish">',
  "End the turn and reply to the user.",
  "Arguments:",
  "- answer (string): The final reply.",
  "</tool>",
].join("\n");

describe("typeLabel", () => {
  it("names primitive types", () => {
    expect(typeLabel(z.string())).toBe("string");
    expect(typeLabel(z.coerce.number())).toBe("number");
    expect(typeLabel(z.boolean().default(false))).toBe("boolean");
  });

  it("unwraps optional and nullable types", () => {
    expect(typeLabel(z.string().optional())).toBe("string");
    expect(typeLabel(z.number().nullable())).toBe("number");
  });

  it("lists enum values and union members", () => {
    expect(typeLabel(z.enum(["a", "b"]))).toBe('"a" | "b"');
    expect(typeLabel(z.union([z.string(), z.array(z.string())]))).toBe("string | string[]");
  });

  it("falls back to value", () => {
    expect(typeLabel(z.record(z.string()))).toBe("value");
  });
});

describe("defineTool", () => {
  it("describes its arguments", () => {
    expect(echo.arguments).toEqual([
      { name: "text", type: "string", optional: false, description: "Text to echo." },
      { name: "times", type: "number", optional: true, description: undefined },
    ]);
  });

  it("runs with validated arguments", async () => {
    expect(await echo.run({ text: "ab", times: 2 }, makeToolContext())).toBe("abab");
  });

  it("returns issues for invalid arguments instead of throwing", async () => {
    expect(await echo.run({ text: 5 }, makeToolContext())).toEqual({
      error: "Invalid arguments for echo",
      issues: { text: ["Expected string, received number"] },
    });
  });

  it("treats missing arguments as an empty object", async () => {
    expect(await echo.run(undefined, makeToolContext())).toEqual({
      error: "Invalid arguments for echo",
      issues: { text: ["Required"] },
    });
  });

  it("reports a non-object under (arguments)", async () => {
    expect(await echo.run("hello", makeToolContext())).toEqual({
      error: "Invalid arguments for echo",
      issues: { "(arguments)": ["Expected object, received string"] },
    });
  });
});

describe("ToolRegistry", () => {
  it("lists registered tool names in order", () => {
    expect(new ToolRegistry([echo, boom]).names()).toEqual(["echo", "boom"]);
  });

  it("refuses the reserved finish name", () => {
    const finish = defineTool({ name: FINISH_TOOL, description: "x", args: {}, execute: async () => null });
    expect(() => new ToolRegistry([finish])).toThrow(ConfigurationError);
    expect(() => new ToolRegistry([finish])).toThrow('"finish" is reserved');
  });

  it("refuses duplicate names", () => {
    expect(() => new ToolRegistry([echo, echo])).toThrow("Tool already registered: echo");
  });

  it("invokes a tool by name", async () => {
    const registry = new ToolRegistry([echo]);
    expect(registry.has("echo")).toBe(true);
    expect(await registry.invoke("echo", { text: "hi" }, makeToolContext())).toBe("hi");
  });

  it("raises for an unknown tool and names the available ones", async () => {
    const registry = new ToolRegistry([echo, boom]);
    await expect(registry.invoke("nope", {}, makeToolContext())).rejects.toThrow(
      'Unknown tool "nope". Available tools: echo, boom, finish',
    );
  });

  it("wraps a throwing tool", async () => {
    const registry = new ToolRegistry([boom]);
    const call = registry.invoke("boom", {}, makeToolContext());
    await expect(call).rejects.toBeInstanceOf(CapabilityInvocationFault);
    await expect(registry.invoke("boom", {}, makeToolContext())).rejects.toThrow('Tool "boom" failed: kaput');
  });

  it("renders the catalog with finish last", () => {
    const registry = new ToolRegistry([echo, boom]);
    expect(registry.describe()).toBe(
      [
        [
          '<tool name="echo">',
          "Echo text.",
          "Arguments:",
          "- text (string): Text to echo.",
          "- times (number, optional)",
          "</tool>",
        ].join("\n"),
        ['<tool name="boom">', "Always fails.", "Arguments: none", "</tool>"].join("\n"),
        FINISH_BLOCK,
      ].join("\n\n"),
    );
  });

  it("renders only finish when empty", () => {
    expect(new ToolRegistry().describe()).toBe(FINISH_BLOCK);
  });
});

describe("thinking tool", () => {
  it("echoes the note", async () => {
    expect(await createThinkingTool().run({ note: "check dates first" }, makeToolContext())).toBe(
      "check dates first",
    );
  });
});
