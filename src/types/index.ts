import { z } from "zod";

const phoneNumber = z.string().min(1, "Phone number is required");

export const welcomeRequestSchema = z.object({
  phone: phoneNumber,
  name: z.string().min(1, "Name is required"),
});

export const orderNotificationRequestSchema = z.object({
  phone: phoneNumber,
  orderId: z.string().min(1, "Order ID is required"),
  status: z.string().min(1, "Status is required"),
});

export const announcementRequestSchema = z.object({
  phones: z.array(phoneNumber).min(1, "At least one recipient is required"),
  message: z.string().min(1, "Message is required"),
});

export type WelcomeRequest = z.infer<typeof welcomeRequestSchema>;
export type OrderNotificationRequest = z.infer<
  typeof orderNotificationRequestSchema
>;
export type AnnouncementRequest = z.infer<typeof announcementRequestSchema>;

// A type alias rather than an interface so it also satisfies the fake
// client's open parameter bag.
export type OutboundMessage = {
  to: string;
  body: string;
  from?: string;
  messagingServiceSid?: string;
};

export interface SentMessage {
  sid: string;
  status: string;
  errorCode?: number | null;
  errorMessage?: string | null;
}

/** The slice of the Twilio client the application depends on. */
export interface MessagingClient {
  messages: {
    create(params: OutboundMessage): SentMessage | Promise<SentMessage>;
  };
}

export interface SendMessageResult {
  success: boolean;
  messageSid?: string;
  error?: string;
}

export interface RecipientResult extends SendMessageResult {
  phone: string;
}
