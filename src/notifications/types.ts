export interface EnquiryNotification {
  readonly enquiryId: number;
  readonly eventName: string;
  readonly userMessage: string;
  readonly userEmail: string;
  readonly userPhone: string | null;
  readonly merchantEmail: string;
  readonly merchantPhone: string | null;
  readonly replyUrl: string;
}

export interface ReplyNotification {
  readonly enquiryId: number;
  readonly eventName: string;
  readonly userEmail: string;
  readonly userPhone: string | null;
  readonly merchantReply: string;
}

export interface NotificationResult {
  readonly success: boolean;
  readonly message: string;
  readonly channel: string;
}

export interface NotificationChannel {
  readonly name: string;
  sendEnquiryToMerchant(notification: EnquiryNotification): Promise<NotificationResult>;
  sendReplyToUser(notification: ReplyNotification): Promise<NotificationResult>;
}
