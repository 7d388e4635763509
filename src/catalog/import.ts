import { z } from "zod";
import type { CatalogDB } from "./db.js";

const id = z.number().int().positive();
const optionalText = z.string().nullable().optional();

export const catalogSeedSchema = z.object({
  categories: z.array(z.object({ id, name: z.string().min(1) })).default([]),
  organizers: z
    .array(
      z.object({
        id,
        name: z.string().min(1),
        contactEmail: z.string().email().nullable().optional(),
        contactPhone: optionalText,
      }),
    )
    .default([]),
  venues: z.array(z.object({ id, name: z.string().min(1), city: optionalText })).default([]),
  events: z
    .array(
      z.object({
        id,
        slug: optionalText,
        name: z.string().min(1),
        description: optionalText,
        categoryId: id.nullable().optional(),
        organizerId: id.nullable().optional(),
        status: z.enum(["draft", "published", "cancelled"]).default("published"),
        visibility: z.enum(["public", "private"]).default("public"),
        isOnline: z.boolean().default(false),
        tags: z.array(z.string()).default([]),
        minPrice: z.number().nonnegative().nullable().optional(),
      }),
    )
    .default([]),
  occurrences: z
    .array(
      z.object({
        id: id.optional(),
        eventId: id,
        venueId: id.nullable().optional(),
        startAtUtc: z.string().datetime({ offset: true }),
      }),
    )
    .default([]),
});

export type CatalogSeed = z.input<typeof catalogSeedSchema>;

export interface ImportCounts {
  categories: number;
  organizers: number;
  venues: number;
  events: number;
  occurrences: number;
}

/** Upserts catalog records in one transaction. Validation failures throw before anything is written. */
export function importCatalog(catalog: CatalogDB, seed: CatalogSeed): ImportCounts {
  const data = catalogSeedSchema.parse(seed);
  const db = catalog.raw();

  const upsertCategory = db.prepare("INSERT OR REPLACE INTO categories (id, name) VALUES (?, ?)");
  const upsertOrganizer = db.prepare(
    "INSERT OR REPLACE INTO organizers (id, name, contact_email, contact_phone) VALUES (?, ?, ?, ?)",
  );
  const upsertVenue = db.prepare("INSERT OR REPLACE INTO venues (id, name, city) VALUES (?, ?, ?)");
  const upsertEvent = db.prepare(
    `INSERT OR REPLACE INTO events
       (id, slug, name, description, category_id, organizer_id, event_status, visibility, is_online, tags, min_price)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const upsertOccurrence = db.prepare(
    "INSERT OR REPLACE INTO event_occurrences (id, event_id, venue_id, start_at_utc) VALUES (?, ?, ?, ?)",
  );

  const run = db.transaction((): ImportCounts => {
    for (const c of data.categories) upsertCategory.run(c.id, c.name);
    for (const o of data.organizers) {
      upsertOrganizer.run(o.id, o.name, o.contactEmail ?? null, o.contactPhone ?? null);
    }
    for (const v of data.venues) upsertVenue.run(v.id, v.name, v.city ?? null);
    for (const e of data.events) {
      upsertEvent.run(
        e.id,
        e.slug ?? null,
        e.name,
        e.description ?? null,
        e.categoryId ?? null,
        e.organizerId ?? null,
        e.status,
        e.visibility,
        e.isOnline ? 1 : 0,
        e.tags.length > 0 ? e.tags.join(",") : null,
        e.minPrice ?? null,
      );
    }
    for (const o of data.occurrences) {
      upsertOccurrence.run(o.id ?? null, o.eventId, o.venueId ?? null, new Date(o.startAtUtc).toISOString());
    }
    return {
      categories: data.categories.length,
      organizers: data.organizers.length,
      venues: data.venues.length,
      events: data.events.length,
      occurrences: data.occurrences.length,
    };
  });
  return run();
}
