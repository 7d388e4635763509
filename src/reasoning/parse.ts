/** Removes a surrounding ``` or ```lang fence, if present. */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (!text.startsWith("```")) return text;

  const firstNewline = text.indexOf("\n");
  const lastFence = text.lastIndexOf("```");
  if (firstNewline !== -1 && lastFence > firstNewline) {
    text = text.slice(firstNewline + 1, lastFence);
  } else {
    text = text.replace(/^```\w*\s*/, "").replace(/```$/, "");
  }
  return text.trim();
}

export type JsonParseResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a model reply as a JSON object. Tolerates code fences and prose
 * around the object.
 */
export function parseJsonObject(raw: string): JsonParseResult {
  const text = stripCodeFence(raw);
  const candidates = [text];
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start > 0 || (end !== -1 && end < text.length - 1)) {
    if (start !== -1 && end > start) candidates.push(text.slice(start, end + 1));
  }

  let lastError = "empty response";
  for (const candidate of candidates) {
    if (candidate.length === 0) continue;
    try {
      const value: unknown = JSON.parse(candidate);
      if (isObject(value)) return { ok: true, value };
      lastError = "response is not a JSON object";
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }
  }
  return { ok: false, error: lastError };
}
