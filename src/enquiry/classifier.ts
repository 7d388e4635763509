import type { EnquiryType } from "./types.js";

export const GROUP_SIZE_THRESHOLD = 20;

const GROUP_WORDS = /\b(group|groups|corporate|company|team|school|class trip|party of)\b/i;
const SPECIAL_WORDS =
  /\b(wheelchair|accessible|accessibility|disabled|disability|mobility|hearing|sign language|vip|private|exclusive|backstage|dietary|allergy|allergies)\b/i;

// Digit runs with separators that read as phone numbers or dates.
const PHONE_LIKE = /\+?\d[\d\s().-]{6,}\d/g;
// Standalone counts: not a price, percentage, time or decimal.
const COUNT = /(?<![\d$#:.,/])\b(\d{2,4})\b(?![:.,/]\d|\s*%)/g;

function isYear(n: number): boolean {
  return n >= 1900 && n <= 2100;
}

/** Largest number in the text that reads as a head count, if any. */
export function largestCount(message: string): number | null {
  const stripped = message.replace(PHONE_LIKE, " ");
  let largest: number | null = null;
  for (const match of stripped.matchAll(COUNT)) {
    const n = Number(match[1]);
    if (isYear(n)) continue;
    if (largest === null || n > largest) largest = n;
  }
  return largest;
}

export function isGroupEnquiry(message: string): boolean {
  if (GROUP_WORDS.test(message)) return true;
  const count = largestCount(message);
  return count !== null && count >= GROUP_SIZE_THRESHOLD;
}

export function isSpecialRequest(message: string): boolean {
  return SPECIAL_WORDS.test(message);
}

/**
 * Keyword classification of an enquiry. Event-addressed enquiries default
 * to a ticket booking, merchant-addressed ones to a custom booking.
 */
export function classifyEnquiry(message: string, mode: "event" | "merchant"): EnquiryType {
  if (isGroupEnquiry(message)) return "group_booking";
  if (isSpecialRequest(message)) return "special_request";
  return mode === "event" ? "ticket_booking" : "custom_booking";
}
