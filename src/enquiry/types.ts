export const ENQUIRY_TYPES = [
  "ticket_booking",
  "custom_booking",
  "group_booking",
  "special_request",
] as const;
export type EnquiryType = (typeof ENQUIRY_TYPES)[number];

export const ENQUIRY_STATUSES = [
  "pending",
  "sent",
  "replied",
  "confirmed",
  "declined",
  "completed",
  "cancelled",
] as const;
export type EnquiryStatus = (typeof ENQUIRY_STATUSES)[number];

export interface BookingEnquiry {
  readonly id: number;
  readonly eventId: number | null;
  readonly organizerId: number;
  readonly sessionId: string | null;
  readonly enquiryType: EnquiryType;
  readonly userMessage: string;
  readonly contactEmail: string;
  readonly contactPhone: string | null;
  readonly merchantEmail: string;
  readonly merchantPhone: string | null;
  readonly status: EnquiryStatus;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** Who receives an enquiry and what it is about. */
export interface MerchantContact {
  readonly organizerId: number;
  readonly merchantName: string;
  readonly merchantEmail: string | null;
  readonly merchantPhone: string | null;
  /** Event name, or "General Enquiry" for merchant-addressed enquiries. */
  readonly subject: string;
}

export type ReplySource = "merchant" | "user" | "system";
export type ReplyChannel = "email" | "whatsapp" | "api" | "log";

export interface EnquiryReply {
  readonly id: number;
  readonly enquiryId: number;
  readonly from: ReplySource;
  readonly message: string;
  readonly channel: ReplyChannel;
  readonly createdAt: number;
}
