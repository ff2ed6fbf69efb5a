import type {
  MessagingClient,
  OutboundMessage,
  RecipientResult,
  SendMessageResult,
} from "../types/index.js";
import { logger } from "../logger.js";

export interface NotificationServiceOptions {
  client: MessagingClient;
  fromNumber?: string;
  messagingServiceSid?: string;
}

export interface NotificationService {
  sendWelcomeMessage: (phone: string, name: string) => Promise<SendMessageResult>;
  sendOrderNotification: (
    phone: string,
    orderId: string,
    status: string
  ) => Promise<SendMessageResult>;
  sendBulkAnnouncement: (
    phones: readonly string[],
    announcement: string
  ) => Promise<RecipientResult[]>;
}

const orderStatusTemplates: Readonly<Record<string, (orderId: string) => string>> =
  {
    confirmed: (orderId) => `Your order #${orderId} has been confirmed!`,
    shipped: (orderId) =>
      `Your order #${orderId} has shipped and is on its way!`,
    delivered: (orderId) =>
      `Your order #${orderId} has been delivered. Enjoy!`,
  };

export function formatOrderMessage(orderId: string, status: string): string {
  const template = orderStatusTemplates[status];
  return template ? template(orderId) : `Order #${orderId} status: ${status}`;
}

export function createNotificationService(
  options: NotificationServiceOptions
): NotificationService {
  const { client, fromNumber, messagingServiceSid } = options;
  const serviceLogger = logger.child({ module: "notification-service" });

  const sendMessage = async (
    to: string,
    body: string
  ): Promise<SendMessageResult> => {
    try {
      const messageParams: OutboundMessage = { to, body };

      if (messagingServiceSid) {
        messageParams.messagingServiceSid = messagingServiceSid;
      } else if (fromNumber) {
        messageParams.from = fromNumber;
      }

      const message = await client.messages.create(messageParams);

      serviceLogger.info(
        {
          to,
          messageSid: message.sid,
          status: message.status,
          messagingServiceSid: messageParams.messagingServiceSid,
        },
        "notification.message.sent"
      );

      return {
        success: true,
        messageSid: message.sid,
      };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown error";

      serviceLogger.error(
        {
          to,
          messagingServiceSid,
          error: errorMessage,
        },
        "notification.message.failed"
      );

      return {
        success: false,
        error: errorMessage,
      };
    }
  };

  return {
    sendWelcomeMessage: (phone, name) =>
      sendMessage(
        phone,
        `Welcome to our service, ${name}! Thanks for signing up.`
      ),
    sendOrderNotification: (phone, orderId, status) =>
      sendMessage(phone, formatOrderMessage(orderId, status)),
    sendBulkAnnouncement: async (phones, announcement) => {
      const results: RecipientResult[] = [];

      // Sequential, so recipients are messaged in the order given.
      for (const phone of phones) {
        const result = await sendMessage(phone, announcement);
        results.push({ phone, ...result });
      }

      return results;
    },
  };
}
