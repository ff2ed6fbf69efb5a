import twilio from "twilio";
import type { MessagingClient } from "../types/index.js";

export function createTwilioClient(
  accountSid: string,
  authToken: string
): MessagingClient {
  const client = twilio(accountSid, authToken);

  return {
    messages: {
      create: async (params) => {
        const message = await client.messages.create(params);
        return {
          sid: message.sid,
          status: message.status,
          errorCode: message.errorCode,
          errorMessage: message.errorMessage,
        };
      },
    },
  };
}
