export const INJECTION_PHRASES: readonly string[] = [
  "ignore previous instructions",
  "ignore all previous",
  "forget everything",
  "system prompt",
  "you are now",
  "act as a",
  "pretend you are",
  "roleplay as",
  "your instructions are",
  "disregard all",
  "new instructions:",
  "admin mode",
  "developer mode",
  "jailbreak",
];

export const COMPETITORS: readonly string[] = [
  "eventbrite",
  "ticketmaster",
  "stubhub",
  "seatgeek",
  "vivid seats",
  "ticketek",
  "axs.com",
  "ticketfly",
];

export const INJECTION_REDIRECT =
  "I'm here to help you discover events and manage your tickets! Let me know what you're looking for.";
export const COMPETITOR_REDIRECT =
  "I specialize in helping you find events on our platform! What kind of events are you interested in?";
export const DEFAULT_REDIRECT =
  "I'm here to help you find amazing events and manage your tickets! How can I assist you with that today?";

export const EXTERNAL_PLATFORM = "[external platform]";
export const QUERY_DETAILS = "[query details]";
export const DATABASE_QUERY = "[database query]";
export const REDACTED = "[redacted]";
export const INTERNAL_REFERENCE = "[internal reference]";

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** First phrase contained in the text, compared case-insensitively. */
export function findPhrase(text: string, phrases: readonly string[]): string | null {
  const lower = text.toLowerCase();
  for (const phrase of phrases) {
    if (lower.includes(phrase.toLowerCase())) return phrase;
  }
  return null;
}

export function mergePhrases(base: readonly string[], extra: readonly string[] = []): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const phrase of [...base, ...extra]) {
    const key = phrase.trim().toLowerCase();
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    merged.push(key);
  }
  return merged;
}
