import { z } from "zod";

export const searchCriteriaShape = {
  query: z.string().optional().describe("Free-text description of what the user is looking for."),
  location: z.string().optional().describe("City or district, e.g. 'Causeway Bay'."),
  date: z.string().optional().describe("Date or range, e.g. 'this weekend' or '2026-11-02'."),
  category: z.string().optional().describe("Event category, e.g. 'music' or 'workshops'."),
  tags: z.array(z.string()).optional().describe("Keywords the event should be tagged with."),
  isOnline: z.boolean().optional().describe("true for online events only, false for in-person only."),
  maxPrice: z.number().nonnegative().optional().describe("Highest acceptable ticket price."),
  organizerName: z.string().optional().describe("Name of the organizer or merchant."),
  venueName: z.string().optional().describe("Name of the venue."),
};

export const searchCriteriaSchema = z.object(searchCriteriaShape);

export type SearchCriteria = z.infer<typeof searchCriteriaSchema>;

function filled(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

export function hasAnyCriterion(criteria: SearchCriteria): boolean {
  return (
    filled(criteria.query) ||
    filled(criteria.location) ||
    filled(criteria.date) ||
    filled(criteria.category) ||
    filled(criteria.organizerName) ||
    filled(criteria.venueName) ||
    (criteria.tags?.some((t) => t.trim().length > 0) ?? false) ||
    criteria.isOnline !== undefined ||
    criteria.maxPrice !== undefined
  );
}

/** The query text, derived from the other fields when the user gave none. */
export function deriveQuery(criteria: SearchCriteria): string {
  if (filled(criteria.query)) return criteria.query.trim();

  const parts: string[] = [];
  if (criteria.isOnline === true) parts.push("online");
  parts.push(filled(criteria.category) ? `${criteria.category.trim()} events` : "events");
  const tags = (criteria.tags ?? []).map((t) => t.trim()).filter((t) => t.length > 0);
  if (tags.length > 0) parts.push(`tagged ${tags.join(", ")}`);
  if (filled(criteria.organizerName)) parts.push(`by ${criteria.organizerName.trim()}`);
  if (filled(criteria.venueName)) parts.push(`at ${criteria.venueName.trim()}`);
  if (filled(criteria.location)) parts.push(`in ${criteria.location.trim()}`);
  if (filled(criteria.date)) parts.push(`on ${criteria.date.trim()}`);
  if (criteria.maxPrice !== undefined) parts.push(`under ${criteria.maxPrice}`);
  if (criteria.isOnline === false) parts.push("in person");
  return parts.join(" ");
}

/** Criteria rendered one field per line for the synthesis request. */
export function describeCriteria(criteria: SearchCriteria, query: string): string {
  const lines = [`query: ${query}`];
  if (filled(criteria.location)) lines.push(`location: ${criteria.location.trim()}`);
  if (filled(criteria.date)) lines.push(`date: ${criteria.date.trim()}`);
  if (filled(criteria.category)) lines.push(`category: ${criteria.category.trim()}`);
  if (criteria.tags && criteria.tags.length > 0) lines.push(`tags: ${criteria.tags.join(", ")}`);
  if (criteria.isOnline !== undefined) lines.push(`online: ${criteria.isOnline ? "yes" : "no"}`);
  if (criteria.maxPrice !== undefined) lines.push(`max price: ${criteria.maxPrice}`);
  if (filled(criteria.organizerName)) lines.push(`organizer: ${criteria.organizerName.trim()}`);
  if (filled(criteria.venueName)) lines.push(`venue: ${criteria.venueName.trim()}`);
  return lines.join("\n");
}
