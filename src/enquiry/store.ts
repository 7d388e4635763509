import type Database from "better-sqlite3";
import type { CatalogDB } from "../catalog/db.js";
import type {
  BookingEnquiry,
  EnquiryReply,
  EnquiryStatus,
  EnquiryType,
  MerchantContact,
  ReplyChannel,
  ReplySource,
} from "./types.js";

interface EnquiryRow {
  id: number;
  session_id: string | null;
  event_id: number | null;
  organizer_id: number;
  enquiry_type: EnquiryType;
  user_message: string;
  contact_email: string;
  contact_phone: string | null;
  merchant_email: string;
  merchant_phone: string | null;
  status: EnquiryStatus;
  created_at: number;
  updated_at: number;
}

interface ReplyRow {
  id: number;
  enquiry_id: number;
  reply_from: ReplySource;
  reply_message: string;
  reply_channel: ReplyChannel;
  created_at: number;
}

export interface CreateEnquiryParams {
  eventId: number | null;
  sessionId: string | null;
  enquiryType: EnquiryType;
  userMessage: string;
  contactEmail: string;
  contactPhone: string | null;
  merchant: MerchantContact & { merchantEmail: string };
  /** Same key, same enquiry: a repeated request returns the stored record. */
  requestKey: string;
}

export interface CreateEnquiryResult {
  enquiry: BookingEnquiry;
  created: boolean;
}

export class EnquiryStore {
  private readonly db: Database.Database;

  constructor(
    catalog: CatalogDB,
    private readonly now: () => number = Date.now,
  ) {
    this.db = catalog.raw();
  }

  // ── Merchant lookup ──

  findMerchantByEvent(eventId: number): MerchantContact | null {
    const row = this.db
      .prepare(
        `SELECT o.id AS organizerId, o.name AS merchantName, o.contact_email AS merchantEmail,
                o.contact_phone AS merchantPhone, e.name AS subject
         FROM events e
         JOIN organizers o ON o.id = e.organizer_id
         WHERE e.id = ? AND e.event_status = 'published'`,
      )
      .get(eventId) as MerchantContact | undefined;
    return row ?? null;
  }

  findMerchantByName(name: string): MerchantContact | null {
    const row = this.db
      .prepare(
        `SELECT o.id AS organizerId, o.name AS merchantName, o.contact_email AS merchantEmail,
                o.contact_phone AS merchantPhone, 'General Enquiry' AS subject
         FROM organizers o
         WHERE o.name LIKE ? ESCAPE '\\'
         ORDER BY length(o.name) ASC
         LIMIT 1`,
      )
      .get(`%${escapeLike(name.trim())}%`) as MerchantContact | undefined;
    return row ?? null;
  }

  // ── Enquiries ──

  /** Inserts a pending enquiry unless one with the same request key exists. */
  createPending(params: CreateEnquiryParams): CreateEnquiryResult {
    const run = this.db.transaction((): CreateEnquiryResult => {
      const existing = this.db
        .prepare("SELECT * FROM booking_enquiries WHERE request_key = ?")
        .get(params.requestKey) as EnquiryRow | undefined;
      if (existing) {
        return { enquiry: toEnquiry(existing), created: false };
      }

      const now = this.now();
      const result = this.db
        .prepare(
          `INSERT INTO booking_enquiries
             (session_id, event_id, organizer_id, enquiry_type, user_message, contact_email,
              contact_phone, merchant_email, merchant_phone, request_key, status, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?)`,
        )
        .run(
          params.sessionId,
          params.eventId,
          params.merchant.organizerId,
          params.enquiryType,
          params.userMessage,
          params.contactEmail,
          params.contactPhone,
          params.merchant.merchantEmail,
          params.merchant.merchantPhone,
          params.requestKey,
          now,
          now,
        );
      const created = this.get(Number(result.lastInsertRowid));
      if (!created) {
        throw new Error("Enquiry vanished after insert");
      }
      return { enquiry: created, created: true };
    });
    return run();
  }

  get(id: number): BookingEnquiry | null {
    const row = this.db
      .prepare("SELECT * FROM booking_enquiries WHERE id = ?")
      .get(id) as EnquiryRow | undefined;
    return row ? toEnquiry(row) : null;
  }

  listBySession(sessionId: string): BookingEnquiry[] {
    const rows = this.db
      .prepare("SELECT * FROM booking_enquiries WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId) as EnquiryRow[];
    return rows.map(toEnquiry);
  }

  updateStatus(id: number, status: EnquiryStatus): boolean {
    const result = this.db
      .prepare("UPDATE booking_enquiries SET status = ?, updated_at = ? WHERE id = ?")
      .run(status, this.now(), id);
    return result.changes > 0;
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS n FROM booking_enquiries").get() as { n: number };
    return row.n;
  }

  // ── Replies ──

  addReply(
    enquiryId: number,
    from: ReplySource,
    message: string,
    channel: ReplyChannel,
  ): EnquiryReply {
    const createdAt = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO enquiry_replies (enquiry_id, reply_from, reply_message, reply_channel, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(enquiryId, from, message, channel, createdAt);
    return {
      id: Number(result.lastInsertRowid),
      enquiryId,
      from,
      message,
      channel,
      createdAt,
    };
  }

  listReplies(enquiryId: number): EnquiryReply[] {
    const rows = this.db
      .prepare("SELECT * FROM enquiry_replies WHERE enquiry_id = ? ORDER BY id ASC")
      .all(enquiryId) as ReplyRow[];
    return rows.map((r) => ({
      id: r.id,
      enquiryId: r.enquiry_id,
      from: r.reply_from,
      message: r.reply_message,
      channel: r.reply_channel,
      createdAt: r.created_at,
    }));
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toEnquiry(row: EnquiryRow): BookingEnquiry {
  return {
    id: row.id,
    eventId: row.event_id,
    organizerId: row.organizer_id,
    sessionId: row.session_id,
    enquiryType: row.enquiry_type,
    userMessage: row.user_message,
    contactEmail: row.contact_email,
    contactPhone: row.contact_phone,
    merchantEmail: row.merchant_email,
    merchantPhone: row.merchant_phone,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
