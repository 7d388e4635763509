import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { ReasoningFault } from "../../src/errors.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { synthesizeQueryContract, validateInputContract } from "../../src/reasoning/contracts.js";
import { parseJsonObject, stripCodeFence } from "../../src/reasoning/parse.js";
import { JsonReasoningProvider, buildMessages } from "../../src/reasoning/provider.js";
import type { CompletionFn, ReasoningContract } from "../../src/reasoning/types.js";

describe("stripCodeFence", () => {
  it("removes a fence with a language tag", () => {
    expect(stripCodeFence("```sql\nSELECT 1\n```")).toBe("SELECT 1");
  });

  it("removes a fence on one line", () => {
    expect(stripCodeFence("```SELECT 1```")).toBe("SELECT 1");
  });

  it("trims unfenced text", () => {
    expect(stripCodeFence("  SELECT 1 ")).toBe("SELECT 1");
  });
});

describe("parseJsonObject", () => {
  it("parses a fenced object", () => {
    expect(parseJsonObject('```json\n{"query":"SELECT 1"}\n```')).toEqual({ ok: true, value: { query: "SELECT 1" } });
  });

  it("finds an object inside prose", () => {
    expect(parseJsonObject('Sure! {"query":"SELECT 1"} Hope this helps')).toEqual({
      ok: true,
      value: { query: "SELECT 1" },
    });
  });

  it("rejects arrays and empty replies", () => {
    expect(parseJsonObject("[1, 2]")).toEqual({ ok: false, error: "response is not a JSON object" });
    expect(parseJsonObject("   ")).toEqual({ ok: false, error: "empty response" });
  });
});

describe("buildMessages", () => {
  it("lists output fields in the system message and inputs in the user message", () => {
    const [system, user] = buildMessages(synthesizeQueryContract, {
      request: "query: jazz",
      schema: "S",
      insights: "I",
    });

    expect(system?.role).toBe("system");
    expect(system?.content.endsWith(
      "Respond with a single JSON object and nothing else. Fields:\n- query: A single valid SQLite SELECT statement with ORDER BY and LIMIT.",
    )).toBe(true);
    expect(user).toEqual({
      role: "user",
      content: [
        "## request\nThe user's search criteria.\n\nquery: jazz",
        "## schema\nThe catalog schema.\n\nS",
        "## insights\nCurrent catalog context: categories, locations and statistics.\n\nI",
      ].join("\n\n"),
    });
  });

  it("renders structured inputs as JSON", () => {
    const [, user] = buildMessages(validateInputContract, {
      userMessage: "Hi",
      history: [{ role: "user", content: "Hello" }],
      pageContext: "general",
    });
    expect(user?.content).toContain(
      '## history\nPrevious turns of the conversation.\n\n[\n  {\n    "role": "user",\n    "content": "Hello"\n  }\n]',
    );
  });
});

describe("JsonReasoningProvider", () => {
  function provider(complete: CompletionFn): JsonReasoningProvider {
    return new JsonReasoningProvider(complete, createSilentLogger());
  }

  const inputs = { request: "query: jazz", schema: "S", insights: "I" };

  it("returns the parsed reply", async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('```json\n{"query":"SELECT 1"}\n```');
    const controller = new AbortController();

    const out = await provider(complete).invoke(synthesizeQueryContract, inputs, { signal: controller.signal });

    expect(out).toEqual({ query: "SELECT 1" });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0]?.[0].signal).toBe(controller.signal);
  });

  it("applies output defaults", async () => {
    const out = await provider(async () => '{"acceptable": true}').invoke(validateInputContract, {
      userMessage: "Hi",
      history: [],
      pageContext: "general",
    });
    expect(out).toEqual({ acceptable: true, violationKind: null, userMessage: "" });
  });

  it("raises a fault for a failed completion", async () => {
    const call = provider(async () => {
      throw new Error("network down");
    }).invoke(synthesizeQueryContract, inputs);
    await expect(call).rejects.toThrow(new ReasoningFault("synthesize_query", "Completion failed: network down"));
  });

  it("raises a fault for a reply that is not JSON", async () => {
    const call = provider(async () => "I cannot help with that").invoke(synthesizeQueryContract, inputs);
    await expect(call).rejects.toBeInstanceOf(ReasoningFault);
  });

  it("raises a fault for a reply that breaks the contract", async () => {
    const call = provider(async () => '{"answer": 1}').invoke(synthesizeQueryContract, inputs);
    await expect(call).rejects.toThrow("Reply does not match contract: query: Required");
  });

  it("checks inputs before calling the backend", async () => {
    const contract: ReasoningContract = {
      name: "act",
      instructions: "Test",
      input: z.object({ text: z.string().min(3) }),
      output: z.object({ ok: z.boolean() }),
      fields: { inputs: { text: "Text" }, outputs: { ok: "Result" } },
    };
    const complete = vi.fn<CompletionFn>();

    await expect(provider(complete).invoke(contract, { text: "x" })).rejects.toThrow(/^Invalid inputs:/);
    expect(complete).not.toHaveBeenCalled();
  });
});
