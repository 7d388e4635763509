export interface CategoryEntry {
  readonly canonicalName: string;
  readonly count: number;
}

export interface LocationEntry {
  readonly city: string;
  readonly count: number;
}

export interface DateRangeInsight {
  readonly earliest: string | null;
  readonly latest: string | null;
  readonly upcomingEvents: number;
}

export interface PopularEvent {
  readonly name: string;
  readonly category: string;
  readonly slug: string | null;
  readonly nextOccurrence: string;
}

export interface CatalogStats {
  readonly totalEvents: number;
  readonly totalCategories: number;
  readonly totalVenues: number;
  readonly upcomingOccurrences: number;
}

export interface InsightPayloads {
  categories: { readonly entries: readonly CategoryEntry[]; readonly summary: string };
  locations: { readonly entries: readonly LocationEntry[]; readonly summary: string };
  date_ranges: { readonly range: DateRangeInsight; readonly summary: string };
  popular: { readonly events: readonly PopularEvent[]; readonly summary: string };
  stats: { readonly stats: CatalogStats; readonly summary: string };
}

export type InsightKind = keyof InsightPayloads;

export const INSIGHT_KINDS: readonly InsightKind[] = [
  "categories",
  "locations",
  "date_ranges",
  "popular",
  "stats",
];

export interface CachedInsight<K extends InsightKind = InsightKind> {
  readonly kind: K;
  readonly payload: InsightPayloads[K];
  readonly createdAt: number;
}

/** Snapshot handed to synthesis: a kind is null when it could not be produced. */
export type InsightMap = { readonly [K in InsightKind]: InsightPayloads[K] | null };

export type Row = Record<string, unknown>;

export interface QueryExecutor {
  execute(queryText: string): Promise<Row[]>;
}
