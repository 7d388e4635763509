import type { Logger } from "../logging/logger.js";
import type { NotificationService } from "../notifications/service.js";
import type { NotificationResult } from "../notifications/types.js";
import type { EnquiryStore } from "./store.js";
import type { EnquiryReply, ReplyChannel } from "./types.js";

export interface MerchantReplyOutcome {
  readonly reply: EnquiryReply;
  readonly notification: NotificationResult;
}

/**
 * Records an organizer's reply, moves the enquiry to `replied` and forwards
 * the reply to the user. Returns null when the enquiry does not exist.
 */
export async function recordMerchantReply(
  store: EnquiryStore,
  notifications: NotificationService,
  logger: Logger,
  enquiryId: number,
  message: string,
  channel: ReplyChannel,
): Promise<MerchantReplyOutcome | null> {
  const enquiry = store.get(enquiryId);
  if (!enquiry) return null;

  const reply = store.addReply(enquiryId, "merchant", message, channel);
  store.updateStatus(enquiryId, "replied");

  const subject =
    (enquiry.eventId !== null ? store.findMerchantByEvent(enquiry.eventId)?.subject : undefined) ??
    "General Enquiry";
  const notification = await notifications.sendReplyToUser({
    enquiryId,
    eventName: subject,
    userEmail: enquiry.contactEmail,
    userPhone: enquiry.contactPhone,
    merchantReply: message,
  });
  logger.info({ enquiryId, delivered: notification.success }, "Merchant reply recorded");
  return { reply, notification };
}
