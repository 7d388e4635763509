import { createHash } from "node:crypto";
import { z } from "zod";
import { classifyEnquiry } from "../enquiry/classifier.js";
import type { EnquiryStore } from "../enquiry/store.js";
import { ENQUIRY_TYPES, type EnquiryType, type MerchantContact } from "../enquiry/types.js";
import type { NotificationService } from "../notifications/service.js";
import { defineTool, type Tool, type ToolContext } from "./types.js";

export type BookingEnquiryResult =
  | {
      readonly status: "success";
      readonly message: string;
      readonly enquiryId: number;
      readonly enquiryType: EnquiryType;
    }
  | { readonly status: "error"; readonly message: string };

function failure(message: string): BookingEnquiryResult {
  return { status: "error", message };
}

/** Same session, same turn, same target and message: same key. */
export function enquiryRequestKey(
  ctx: Pick<ToolContext, "sessionId" | "userId" | "turnId">,
  target: string,
  message: string,
): string {
  return createHash("sha256")
    .update([ctx.sessionId ?? `user:${ctx.userId}`, ctx.turnId, target, message.trim()].join("\u0000"))
    .digest("hex");
}

export function createBookingEnquiryTool(
  store: EnquiryStore,
  notifications: NotificationService,
): Tool {
  return defineTool({
    name: "booking_enquiry",
    description:
      "Send a booking enquiry to an event organizer. Give exactly one of eventId or merchantName, never both. Ask the user for their email first.",
    args: {
      message: z.string().trim().min(1).describe("The user's enquiry, in their words."),
      contactEmail: z.string().trim().email().describe("Email address the organizer should reply to."),
      contactPhone: z.string().trim().min(1).optional().describe("Optional phone number."),
      eventId: z.coerce.number().int().positive().optional().describe("ID of the event the enquiry is about."),
      merchantName: z.string().optional().describe("Organizer name, when no specific event is concerned."),
      enquiryType: z.enum(ENQUIRY_TYPES).optional().describe("Overrides the type inferred from the message."),
    },
    async execute(args, ctx): Promise<BookingEnquiryResult> {
      const merchantName = args.merchantName?.trim() ?? "";
      const hasEvent = args.eventId !== undefined;
      const hasMerchant = merchantName.length > 0;
      if (!hasEvent && !hasMerchant) {
        return failure("Please provide either an event ID or merchant name for your enquiry.");
      }
      if (hasEvent && hasMerchant) {
        return failure("Please provide either an event ID or a merchant name, not both.");
      }

      const mode = args.eventId !== undefined ? "event" : "merchant";
      let merchant: MerchantContact | null;
      if (args.eventId !== undefined) {
        merchant = store.findMerchantByEvent(args.eventId);
        if (!merchant) {
          return failure(
            "Event not found or not available for booking enquiries. Please check the event ID and try again.",
          );
        }
      } else {
        merchant = store.findMerchantByName(merchantName);
        if (!merchant) {
          return failure(`Merchant '${merchantName}' not found. Please check the spelling or contact support.`);
        }
      }
      if (!merchant.merchantEmail) {
        return failure("Merchant contact information not available. Please contact support.");
      }

      const enquiryType = args.enquiryType ?? classifyEnquiry(args.message, mode);
      const target = mode === "event" ? `event:${args.eventId}` : `merchant:${merchant.organizerId}`;
      const { enquiry, created } = store.createPending({
        eventId: args.eventId ?? null,
        sessionId: ctx.sessionId,
        enquiryType,
        userMessage: args.message,
        contactEmail: args.contactEmail,
        contactPhone: args.contactPhone ?? null,
        merchant: { ...merchant, merchantEmail: merchant.merchantEmail },
        requestKey: enquiryRequestKey(ctx, target, args.message),
      });

      const log = ctx.logger.child({ enquiryId: enquiry.id });
      const sent: BookingEnquiryResult = {
        status: "success",
        message: `Your enquiry has been sent to ${merchant.merchantName}. Reference: #${enquiry.id}. They will respond within 24-48 hours via email.`,
        enquiryId: enquiry.id,
        enquiryType: enquiry.enquiryType,
      };
      if (!created && enquiry.status !== "pending") {
        log.info("Repeated enquiry request, returning existing enquiry");
        return sent;
      }

      const result = await notifications.sendEnquiryToMerchant({
        enquiryId: enquiry.id,
        eventName: merchant.subject,
        userMessage: enquiry.userMessage,
        userEmail: enquiry.contactEmail,
        userPhone: enquiry.contactPhone,
        merchantEmail: enquiry.merchantEmail,
        merchantPhone: enquiry.merchantPhone,
      });
      if (!result.success) {
        log.warn({ channel: result.channel, reason: result.message }, "Enquiry stored but not delivered");
        return failure("Failed to send enquiry. Please try again or contact support.");
      }

      store.updateStatus(enquiry.id, "sent");
      log.info({ enquiryType: enquiry.enquiryType, channel: result.channel }, "Enquiry sent");
      return sent;
    },
  });
}
