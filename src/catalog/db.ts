import Database from "better-sqlite3";
import { ExecutionError } from "../errors.js";
import type { QueryExecutor, Row } from "./types.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS categories (
  id    INTEGER PRIMARY KEY,
  name  TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS organizers (
  id             INTEGER PRIMARY KEY,
  name           TEXT NOT NULL,
  contact_email  TEXT,
  contact_phone  TEXT
);
CREATE INDEX IF NOT EXISTS idx_organizers_name ON organizers(name COLLATE NOCASE);

CREATE TABLE IF NOT EXISTS venues (
  id    INTEGER PRIMARY KEY,
  name  TEXT NOT NULL,
  city  TEXT
);

CREATE TABLE IF NOT EXISTS events (
  id            INTEGER PRIMARY KEY,
  slug          TEXT UNIQUE,
  name          TEXT NOT NULL,
  description   TEXT,
  category_id   INTEGER REFERENCES categories(id),
  organizer_id  INTEGER REFERENCES organizers(id),
  event_status  TEXT NOT NULL DEFAULT 'draft' CHECK(event_status IN ('draft','published','cancelled')),
  visibility    TEXT NOT NULL DEFAULT 'public' CHECK(visibility IN ('public','private')),
  is_online     INTEGER NOT NULL DEFAULT 0,
  tags          TEXT,
  min_price     REAL
);
CREATE INDEX IF NOT EXISTS idx_events_category ON events(category_id);

CREATE TABLE IF NOT EXISTS event_occurrences (
  id            INTEGER PRIMARY KEY,
  event_id      INTEGER NOT NULL REFERENCES events(id) ON DELETE CASCADE,
  venue_id      INTEGER REFERENCES venues(id),
  start_at_utc  TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_occurrences_start ON event_occurrences(start_at_utc);

CREATE TABLE IF NOT EXISTS booking_enquiries (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id      TEXT,
  event_id        INTEGER,
  organizer_id    INTEGER NOT NULL,
  enquiry_type    TEXT NOT NULL DEFAULT 'custom_booking'
                  CHECK(enquiry_type IN ('ticket_booking','custom_booking','group_booking','special_request')),
  user_message    TEXT NOT NULL,
  contact_email   TEXT NOT NULL,
  contact_phone   TEXT,
  merchant_email  TEXT NOT NULL,
  merchant_phone  TEXT,
  request_key     TEXT UNIQUE,
  status          TEXT NOT NULL DEFAULT 'pending'
                  CHECK(status IN ('pending','sent','replied','confirmed','declined','completed','cancelled')),
  created_at      INTEGER NOT NULL,
  updated_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_enquiries_session ON booking_enquiries(session_id);
CREATE INDEX IF NOT EXISTS idx_enquiries_status ON booking_enquiries(status);

CREATE TABLE IF NOT EXISTS enquiry_replies (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  enquiry_id     INTEGER NOT NULL REFERENCES booking_enquiries(id) ON DELETE CASCADE,
  reply_from     TEXT NOT NULL CHECK(reply_from IN ('merchant','user','system')),
  reply_message  TEXT NOT NULL,
  reply_channel  TEXT NOT NULL DEFAULT 'api' CHECK(reply_channel IN ('email','whatsapp','api','log')),
  created_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_replies_enquiry ON enquiry_replies(enquiry_id);
`;

const MAX_ROWS = 25;

// Enquiry data and contact details are never reachable through generated queries.
const RESTRICTED = /\b(booking_enquiries|enquiry_replies|contact_email|contact_phone|sqlite_\w+)\b/i;

export class CatalogDB {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Runs generated catalog queries. Anything that is not a single read-only SELECT is refused. */
export class CatalogQueryExecutor implements QueryExecutor {
  constructor(
    private readonly catalog: CatalogDB,
    private readonly maxRows = MAX_ROWS,
  ) {}

  async execute(queryText: string): Promise<Row[]> {
    const text = queryText.trim().replace(/;\s*$/, "");
    if (text.length === 0) {
      throw new ExecutionError("Empty query");
    }
    if (!/^(select|with)\b/i.test(text)) {
      throw new ExecutionError("Only SELECT statements are allowed");
    }
    if (RESTRICTED.test(text)) {
      throw new ExecutionError("Query references restricted data");
    }

    let stmt: Database.Statement;
    try {
      stmt = this.catalog.raw().prepare(text);
    } catch (err) {
      throw new ExecutionError(err instanceof Error ? err.message : String(err), { cause: err });
    }
    if (!stmt.reader || !stmt.readonly) {
      throw new ExecutionError("Only read-only statements are allowed");
    }

    const rows: Row[] = [];
    try {
      for (const row of stmt.iterate()) {
        if (isRow(row)) rows.push(row);
        if (rows.length >= this.maxRows) break;
      }
    } catch (err) {
      throw new ExecutionError(err instanceof Error ? err.message : String(err), { cause: err });
    }
    return rows;
  }
}
