import type { Logger } from "../logging/logger.js";
import type { CatalogDB } from "./db.js";
import type { InsightCache } from "./insight-cache.js";
import type {
  CategoryEntry,
  InsightKind,
  InsightMap,
  InsightPayloads,
  LocationEntry,
  PopularEvent,
} from "./types.js";

const LIVE = "e.event_status = 'published' AND e.visibility = 'public'";

const SEMANTIC_EXAMPLE_LIMIT = 5;
const PLURAL_WORDS: Readonly<Record<string, string>> = {
  concerts: "concert",
  exhibitions: "exhibition",
  workshops: "workshop",
  conferences: "conference",
};

/**
 * Aggregate statistics over the catalog, generated per kind and kept in the
 * shared InsightCache. Only missing or stale kinds are regenerated.
 */
export class CatalogInsights {
  constructor(
    private readonly catalog: CatalogDB,
    private readonly cache: InsightCache,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  load(): InsightMap {
    return {
      categories: this.resolve("categories", () => this.categories()),
      locations: this.resolve("locations", () => this.locations()),
      date_ranges: this.resolve("date_ranges", () => this.dateRanges()),
      popular: this.resolve("popular", () => this.popular()),
      stats: this.resolve("stats", () => this.stats()),
    };
  }

  private resolve<K extends InsightKind>(
    kind: K,
    generate: () => InsightPayloads[K],
  ): InsightPayloads[K] | null {
    const cached = this.cache.get(kind);
    if (cached) return cached.payload;
    try {
      const payload = generate();
      this.cache.set(kind, payload);
      this.logger.debug({ kind }, "Insight regenerated");
      return payload;
    } catch (err) {
      this.logger.warn({ err, kind }, "Failed to generate insight");
      return null;
    }
  }

  private nowIso(): string {
    return new Date(this.now()).toISOString();
  }

  categories(): InsightPayloads["categories"] {
    const rows = this.catalog
      .raw()
      .prepare(
        `SELECT c.name AS name, COUNT(e.id) AS count
         FROM categories c
         JOIN events e ON e.category_id = c.id
         WHERE ${LIVE}
         GROUP BY c.id, c.name
         HAVING count > 0
         ORDER BY count DESC, c.name ASC`,
      )
      .all() as Array<{ name: string; count: number }>;

    const entries: CategoryEntry[] = rows.map((r) => ({ canonicalName: r.name, count: r.count }));
    return {
      entries,
      summary:
        entries.length > 0
          ? `Available categories: ${entries.map((e) => `${e.canonicalName} (${e.count} events)`).join(", ")}`
          : "No categories available",
    };
  }

  locations(): InsightPayloads["locations"] {
    const rows = this.catalog
      .raw()
      .prepare(
        `SELECT v.city AS city, COUNT(DISTINCT o.event_id) AS count
         FROM venues v
         JOIN event_occurrences o ON o.venue_id = v.id
         JOIN events e ON e.id = o.event_id
         WHERE ${LIVE} AND v.city IS NOT NULL
         GROUP BY v.city
         ORDER BY count DESC, v.city ASC
         LIMIT 20`,
      )
      .all() as Array<{ city: string; count: number }>;

    const entries: LocationEntry[] = rows.map((r) => ({ city: r.city, count: r.count }));
    return {
      entries,
      summary:
        entries.length > 0
          ? `Events available in: ${entries.map((e) => `${e.city} (${e.count} events)`).join(", ")}`
          : "No locations available",
    };
  }

  dateRanges(): InsightPayloads["date_ranges"] {
    const row = this.catalog
      .raw()
      .prepare(
        `SELECT MIN(o.start_at_utc) AS earliest, MAX(o.start_at_utc) AS latest,
                COUNT(DISTINCT e.id) AS upcoming
         FROM event_occurrences o
         JOIN events e ON e.id = o.event_id
         WHERE ${LIVE} AND o.start_at_utc >= @now`,
      )
      .get({ now: this.nowIso() }) as
      | { earliest: string | null; latest: string | null; upcoming: number }
      | undefined;

    const range = {
      earliest: row?.earliest ?? null,
      latest: row?.latest ?? null,
      upcomingEvents: row?.upcoming ?? 0,
    };
    return {
      range,
      summary:
        range.upcomingEvents > 0
          ? `${range.upcomingEvents} upcoming events from ${range.earliest?.slice(0, 10) ?? "now"} to ${range.latest?.slice(0, 10) ?? "future"}`
          : "No upcoming events available",
    };
  }

  popular(): InsightPayloads["popular"] {
    const rows = this.catalog
      .raw()
      .prepare(
        `SELECT e.name AS name, c.name AS category, e.slug AS slug,
                MIN(o.start_at_utc) AS nextOccurrence
         FROM events e
         JOIN categories c ON c.id = e.category_id
         JOIN event_occurrences o ON o.event_id = e.id
         WHERE ${LIVE} AND o.start_at_utc >= @now
         GROUP BY e.id
         ORDER BY nextOccurrence ASC
         LIMIT 10`,
      )
      .all({ now: this.nowIso() }) as PopularEvent[];

    return {
      events: rows,
      summary:
        rows.length > 0
          ? `Featured upcoming events: ${rows
              .slice(0, 5)
              .map((r) => `${r.name} (${r.category})`)
              .join(", ")}`
          : "No popular events",
    };
  }

  stats(): InsightPayloads["stats"] {
    const row = this.catalog
      .raw()
      .prepare(
        `SELECT
           (SELECT COUNT(*) FROM events e WHERE ${LIVE}) AS totalEvents,
           (SELECT COUNT(*) FROM categories) AS totalCategories,
           (SELECT COUNT(DISTINCT venue_id) FROM event_occurrences) AS totalVenues,
           (SELECT COUNT(*) FROM event_occurrences WHERE start_at_utc >= @now) AS upcomingOccurrences`,
      )
      .get({ now: this.nowIso() }) as
      | { totalEvents: number; totalCategories: number; totalVenues: number; upcomingOccurrences: number }
      | undefined;

    const stats = row ?? { totalEvents: 0, totalCategories: 0, totalVenues: 0, upcomingOccurrences: 0 };
    return {
      stats,
      summary: `Catalog contains ${stats.totalEvents} published events across ${stats.totalCategories} categories, ${stats.totalVenues} venues, with ${stats.upcomingOccurrences} upcoming occurrences`,
    };
  }
}

/** Renders available insights as the context block fed to query synthesis. */
export function compileContext(insights: InsightMap): string {
  const summaries = [
    insights.categories?.summary,
    insights.locations?.summary,
    insights.date_ranges?.summary,
    insights.popular?.summary,
    insights.stats?.summary,
  ].filter((s): s is string => typeof s === "string" && s.length > 0);

  if (summaries.length === 0) {
    return "No catalog insights available.";
  }

  let context = "CATALOG CONTEXT:\n" + summaries.map((s) => `- ${s}`).join("\n");

  const categories = insights.categories?.entries ?? [];
  if (categories.length > 0) {
    const examples = categories
      .slice(0, SEMANTIC_EXAMPLE_LIMIT)
      .map((c) => `  '${searchVariation(c.canonicalName)}' → '${c.canonicalName}'`);
    context +=
      "\n\nSEMANTIC MATCHING GUIDE:" +
      "\n- When users search with category-like terms, match them to the EXACT category names listed above" +
      "\n- Examples of semantic matches:\n" +
      examples.join("\n");
  }
  return context;
}

export function searchVariation(categoryName: string): string {
  const base = categoryName.toLowerCase();
  if (categoryName.endsWith("s")) {
    return base.slice(0, -1);
  }
  for (const [plural, singular] of Object.entries(PLURAL_WORDS)) {
    if (base.includes(plural)) return base.replace(plural, singular);
  }
  return base;
}
