import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type {
  EnquiryNotification,
  NotificationChannel,
  NotificationResult,
  ReplyNotification,
} from "./types.js";

export type EnquiryDispatch = Omit<EnquiryNotification, "replyUrl">;

/** Dispatches through one channel. A channel that throws yields a failed result. */
export class NotificationService {
  constructor(
    private readonly channel: NotificationChannel,
    private readonly replyBaseUrl: string,
    private readonly logger: Logger,
  ) {}

  get channelName(): string {
    return this.channel.name;
  }

  replyUrlFor(enquiryId: number): string {
    return `${this.replyBaseUrl.replace(/\/+$/, "")}/${enquiryId}`;
  }

  async sendEnquiryToMerchant(dispatch: EnquiryDispatch): Promise<NotificationResult> {
    try {
      return await this.channel.sendEnquiryToMerchant({
        ...dispatch,
        replyUrl: this.replyUrlFor(dispatch.enquiryId),
      });
    } catch (err) {
      this.logger.error({ err, enquiryId: dispatch.enquiryId }, "Failed to notify merchant");
      return { success: false, message: errorMessage(err), channel: this.channel.name };
    }
  }

  async sendReplyToUser(notification: ReplyNotification): Promise<NotificationResult> {
    try {
      return await this.channel.sendReplyToUser(notification);
    } catch (err) {
      this.logger.error({ err, enquiryId: notification.enquiryId }, "Failed to notify user");
      return { success: false, message: errorMessage(err), channel: this.channel.name };
    }
  }
}
