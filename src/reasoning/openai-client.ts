import OpenAI from "openai";
import type { ReasoningConfig } from "../config/types.js";
import { ConfigurationError } from "../errors.js";
import type { CompletionFn } from "./types.js";

export function createOpenAICompletion(config: ReasoningConfig): CompletionFn {
  const apiKey = config.apiKey ?? process.env["OPENAI_API_KEY"];
  if (!apiKey) {
    throw new ConfigurationError(
      "Missing OpenAI API key. Set reasoning.apiKey or OPENAI_API_KEY.",
    );
  }

  const client = new OpenAI({
    apiKey,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    timeout: config.timeoutMs,
    maxRetries: 1,
  });

  return async ({ messages, signal }) => {
    const res = await client.chat.completions.create(
      {
        model: config.model,
        messages: messages.map((m) =>
          m.role === "system"
            ? { role: "system" as const, content: m.content }
            : { role: "user" as const, content: m.content },
        ),
        temperature: config.temperature,
        response_format: { type: "json_object" },
      },
      { signal },
    );
    return res.choices[0]?.message?.content ?? "";
  };
}
