import { dirname } from "node:path";
import pino from "pino";
import { ensureDir } from "../config/paths.js";
import type { Logger } from "../logging/logger.js";
import type {
  EnquiryNotification,
  NotificationChannel,
  NotificationResult,
  ReplyNotification,
} from "./types.js";

const RULE = "=".repeat(72);
const THIN_RULE = "-".repeat(72);

export function formatEnquiryMessage(n: EnquiryNotification): string {
  return [
    RULE,
    `NEW BOOKING ENQUIRY #${n.enquiryId}`,
    RULE,
    `Event: ${n.eventName}`,
    `From: ${n.userEmail}`,
    ...(n.userPhone ? [`Phone: ${n.userPhone}`] : []),
    "",
    "Message:",
    n.userMessage,
    "",
    THIN_RULE,
    "To reply to this enquiry, visit:",
    n.replyUrl,
    THIN_RULE,
  ].join("\n");
}

export function formatReplyMessage(n: ReplyNotification): string {
  return [
    RULE,
    `REPLY TO YOUR BOOKING ENQUIRY #${n.enquiryId}`,
    RULE,
    `Event: ${n.eventName}`,
    "",
    "The organizer has responded to your enquiry:",
    n.merchantReply,
    "",
    THIN_RULE,
    "If you have more questions, just continue the conversation.",
    THIN_RULE,
  ].join("\n");
}

/**
 * Records notifications as JSON lines instead of delivering them. Writes to
 * its own file when a path is given, otherwise through the application logger.
 */
export class LogNotificationChannel implements NotificationChannel {
  readonly name = "log";
  private readonly sink: Logger;

  constructor(logger: Logger, private readonly logPath?: string) {
    if (logPath) {
      ensureDir(dirname(logPath));
      this.sink = pino(
        { base: null, timestamp: pino.stdTimeFunctions.isoTime },
        pino.destination({ dest: logPath, sync: true }),
      );
    } else {
      this.sink = logger.child({ component: "notifications" });
    }
  }

  async sendEnquiryToMerchant(n: EnquiryNotification): Promise<NotificationResult> {
    this.sink.info(
      {
        type: "enquiry_to_merchant",
        channel: this.name,
        enquiryId: n.enquiryId,
        eventName: n.eventName,
        merchant: { email: n.merchantEmail, phone: n.merchantPhone },
        user: { email: n.userEmail, phone: n.userPhone, message: n.userMessage },
        replyUrl: n.replyUrl,
        formattedMessage: formatEnquiryMessage(n),
      },
      "Enquiry notification",
    );
    return {
      success: true,
      message: `Enquiry #${n.enquiryId} logged${this.logPath ? ` to ${this.logPath}` : ""}`,
      channel: this.name,
    };
  }

  async sendReplyToUser(n: ReplyNotification): Promise<NotificationResult> {
    this.sink.info(
      {
        type: "reply_to_user",
        channel: this.name,
        enquiryId: n.enquiryId,
        eventName: n.eventName,
        user: { email: n.userEmail, phone: n.userPhone },
        merchantReply: n.merchantReply,
        formattedMessage: formatReplyMessage(n),
      },
      "Reply notification",
    );
    return {
      success: true,
      message: `Reply to enquiry #${n.enquiryId} logged${this.logPath ? ` to ${this.logPath}` : ""}`,
      channel: this.name,
    };
  }
}
