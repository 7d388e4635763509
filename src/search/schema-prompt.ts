/** Catalog schema as shown to query synthesis. Enquiry tables are not exposed. */
export const CATALOG_SCHEMA_PROMPT = `
Table categories: id INTEGER, name TEXT (canonical category name, e.g. 'Music Concerts')
Table organizers: id INTEGER, name TEXT
Table venues: id INTEGER, name TEXT, city TEXT
Table events: id INTEGER, slug TEXT (may be NULL), name TEXT, description TEXT,
  category_id INTEGER -> categories.id, organizer_id INTEGER -> organizers.id,
  event_status TEXT ('draft' | 'published' | 'cancelled'),
  visibility TEXT ('public' | 'private'),
  is_online INTEGER (0 or 1), tags TEXT (comma separated), min_price REAL
Table event_occurrences: id INTEGER, event_id INTEGER -> events.id,
  venue_id INTEGER -> venues.id, start_at_utc TEXT (ISO 8601, UTC)

Conventions: alias events as e, event_occurrences as o, venues as v, categories as c.
Dates compare as ISO strings; use strftime('%Y-%m-%dT%H:%M:%SZ', 'now') for the current time.
Match names case-insensitively with LIKE.
`.trim();
