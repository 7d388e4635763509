import type { InsightMap, Row } from "../catalog/types.js";

export const NO_RESULTS_MESSAGE = "No events found matching the specified criteria.";

const UTM_PARAMS = "utm_source=chatbot&utm_medium=ai&utm_campaign=event_search";

function text(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "bigint") return value.toString();
  return null;
}

/** The slug when present, otherwise the numeric id. */
export function rowIdentifier(row: Row): string | null {
  return text(row["slug"]) ?? text(row["id"]);
}

export function eventLink(baseUrl: string, identifier: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/events/${encodeURIComponent(identifier)}?${UTM_PARAMS}`;
}

export function formatRow(row: Row, baseUrl: string): string | null {
  const identifier = rowIdentifier(row);
  if (identifier === null) return null;

  const name = text(row["event_name"]) ?? text(row["name"]) ?? "Untitled event";
  let summary = `Event: '${name}'`;
  const description = text(row["description"]);
  if (description) summary += `, Description: '${description}'`;
  const city = text(row["city"]);
  if (city) summary += `, Location: '${city}'`;
  const start = text(row["start_time"]);
  if (start) summary += `, Starts on: '${start}'`;
  return `${summary}, Link: ${eventLink(baseUrl, identifier)}`;
}

export interface FormattedRows {
  lines: string[];
  /** Rows with neither slug nor id; they cannot be linked and are left out. */
  unlinked: number;
}

export function formatRows(rows: readonly Row[], baseUrl: string): FormattedRows {
  const lines: string[] = [];
  let unlinked = 0;
  for (const row of rows) {
    const line = formatRow(row, baseUrl);
    if (line === null) unlinked++;
    else lines.push(line);
  }
  return { lines, unlinked };
}

export function resultSummary(lines: readonly string[]): string {
  const noun = lines.length === 1 ? "event" : "events";
  return `Found ${lines.length} ${noun}. Details:\n${lines.map((l) => `- ${l}`).join("\n")}`;
}

export function noResultsSummary(insights: InsightMap): string {
  const parts = [NO_RESULTS_MESSAGE];
  const popular = insights.popular?.events ?? [];
  if (popular.length > 0) {
    parts.push(
      `Upcoming events you might like: ${popular
        .slice(0, 3)
        .map((e) => `${e.name} (${e.category})`)
        .join(", ")}`,
    );
  }
  const categories = insights.categories?.entries ?? [];
  if (categories.length > 0) {
    parts.push(`Available categories: ${categories.map((c) => c.canonicalName).join(", ")}`);
  }
  return parts.join("\n");
}
