import type { AppInstance } from "./app.js";
import { buildApp } from "./app.js";
import { env } from "./env.js";
import { createTwilioClient } from "./clients/twilio.js";
import { createFakeTwilioClient } from "./clients/twilio.fake.js";
import { createNotificationService } from "./services/notifications.js";
import type { MessagingClient } from "./types/index.js";

function shouldUseFakeClients() {
  return env.USE_FAKE_CLIENTS ?? env.NODE_ENV === "test";
}

export interface StartServerOptions {
  useFakeClients?: boolean;
  host?: string;
  port?: number;
}

export async function startServer(
  options: StartServerOptions = {}
): Promise<AppInstance> {
  const useFake = options.useFakeClients ?? shouldUseFakeClients();
  const host = options.host ?? "0.0.0.0";
  const port = options.port ?? env.PORT;

  const twilioClient: MessagingClient = useFake
    ? createFakeTwilioClient({
        accountSid: env.TWILIO_ACCOUNT_SID,
        authToken: env.TWILIO_AUTH_TOKEN,
      })
    : createTwilioClient(env.TWILIO_ACCOUNT_SID, env.TWILIO_AUTH_TOKEN);

  const notificationOptions: Parameters<typeof createNotificationService>[0] = {
    client: twilioClient,
  };

  if (env.TWILIO_PHONE_NUMBER) {
    notificationOptions.fromNumber = env.TWILIO_PHONE_NUMBER;
  }

  if (env.TWILIO_MESSAGING_SERVICE_SID) {
    notificationOptions.messagingServiceSid = env.TWILIO_MESSAGING_SERVICE_SID;
  }

  const app = await buildApp({
    notificationService: createNotificationService(notificationOptions),
  });

  await app.listen({
    port,
    host,
  });

  const address = app.server.address();
  const resolvedPort =
    typeof address === "object" && address !== null ? address.port : port;

  app.log.info(`Server is running on http://${host}:${resolvedPort}`);

  return app;
}
