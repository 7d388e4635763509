import type {
  EnquiryNotification,
  NotificationChannel,
  NotificationResult,
  ReplyNotification,
} from "../../src/notifications/types.js";

/** Keeps every notification in memory. `failWith` makes the next send throw. */
export class RecordingChannel implements NotificationChannel {
  readonly name = "recording";
  readonly enquiries: EnquiryNotification[] = [];
  readonly replies: ReplyNotification[] = [];
  failWith: Error | null = null;

  async sendEnquiryToMerchant(notification: EnquiryNotification): Promise<NotificationResult> {
    this.throwIfFailing();
    this.enquiries.push(notification);
    return { success: true, message: `recorded #${notification.enquiryId}`, channel: this.name };
  }

  async sendReplyToUser(notification: ReplyNotification): Promise<NotificationResult> {
    this.throwIfFailing();
    this.replies.push(notification);
    return { success: true, message: `recorded reply #${notification.enquiryId}`, channel: this.name };
  }

  private throwIfFailing(): void {
    const err = this.failWith;
    if (err) {
      this.failWith = null;
      throw err;
    }
  }
}
