import type { CachedInsight, InsightKind, InsightPayloads } from "./types.js";

export const INSIGHT_TTL_MS = 5 * 60 * 1000;

type Entries = { readonly [K in InsightKind]?: CachedInsight<K> };

export interface InsightCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Per-kind TTL cache. Writers publish a whole new entry map, so a reader
 * sees either the old entry or the new one.
 */
export class InsightCache {
  private entries: Entries = {};
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InsightCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? INSIGHT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get<K extends InsightKind>(kind: K): CachedInsight<K> | null {
    const entry: CachedInsight<K> | undefined = this.entries[kind];
    if (!entry) return null;
    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.evict(kind);
      return null;
    }
    return entry;
  }

  set<K extends InsightKind>(kind: K, payload: InsightPayloads[K]): CachedInsight<K> {
    const entry: CachedInsight<K> = Object.freeze({
      kind,
      payload,
      createdAt: this.now(),
    });
    this.entries = Object.freeze({ ...this.entries, [kind]: entry });
    return entry;
  }

  /** Fresh entries only; stale ones are evicted on the way. */
  getAll(): CachedInsight[] {
    return [
      this.get("categories"),
      this.get("locations"),
      this.get("date_ranges"),
      this.get("popular"),
      this.get("stats"),
    ].filter((e): e is NonNullable<typeof e> => e !== null);
  }

  clear(): void {
    this.entries = {};
  }

  private evict(kind: InsightKind): void {
    const next: { -readonly [K in keyof Entries]: Entries[K] } = { ...this.entries };
    delete next[kind];
    this.entries = Object.freeze(next);
  }
}
