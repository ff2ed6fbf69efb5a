import { z } from "zod";
import dotenv from "dotenv";
import { logger } from "./logger.js";

dotenv.config();

const isTest = process.env.NODE_ENV === "test";

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    PORT: z.string().default("3000").transform(Number),
    USE_FAKE_CLIENTS: z
      .enum(["true", "false"])
      .optional()
      .transform((value) => (value === undefined ? undefined : value === "true")),
    TWILIO_ACCOUNT_SID: z
      .string()
      .startsWith("AC", "Account SID must start with AC")
      .default(isTest ? "ACtest_account_sid_for_testing" : ""),
    TWILIO_AUTH_TOKEN: z
      .string()
      .min(1, "Auth token is required")
      .default(isTest ? "test_auth_token" : ""),
    TWILIO_PHONE_NUMBER: isTest
      ? z.string().min(1).default("+15555555555")
      : z.string().min(1).optional(),
    TWILIO_MESSAGING_SERVICE_SID: z
      .string()
      .startsWith("MG", "Messaging Service SID must start with MG")
      .optional(),
  })
  .refine(
    (data) =>
      data.NODE_ENV === "test" ||
      data.TWILIO_PHONE_NUMBER ||
      data.TWILIO_MESSAGING_SERVICE_SID,
    {
      message:
        "Either TWILIO_PHONE_NUMBER or TWILIO_MESSAGING_SERVICE_SID must be provided",
    }
  );

export type Environment = z.infer<typeof envSchema>;

function logEnvironmentDebug(): void {
  const envLogger = logger.child({ module: "env-validation" });
  envLogger.debug({ NODE_ENV: process.env.NODE_ENV }, "env.NODE_ENV");
  envLogger.debug({ PORT: process.env.PORT }, "env.PORT");
  envLogger.debug(
    { useFakeClients: process.env.USE_FAKE_CLIENTS ?? "[not set]" },
    "env.USE_FAKE_CLIENTS"
  );
  envLogger.debug(
    {
      accountSidPrefix: process.env.TWILIO_ACCOUNT_SID?.substring(0, 10),
    },
    "env.TWILIO_ACCOUNT_SID"
  );
  envLogger.debug(
    { isSet: Boolean(process.env.TWILIO_AUTH_TOKEN) },
    "env.TWILIO_AUTH_TOKEN"
  );
  envLogger.debug(
    { phoneNumber: process.env.TWILIO_PHONE_NUMBER },
    "env.TWILIO_PHONE_NUMBER"
  );
  envLogger.debug(
    { messagingServiceSid: process.env.TWILIO_MESSAGING_SERVICE_SID },
    "env.TWILIO_MESSAGING_SERVICE_SID"
  );
}

function validateEnvironment(): Environment {
  logEnvironmentDebug();

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const envLogger = logger.child({ module: "env-validation" });
    envLogger.error(
      { errors: result.error.flatten().fieldErrors },
      "env.validation.failed"
    );
    throw new Error("Environment validation failed");
  }

  logger.child({ module: "env-validation" }).info("env.validation.passed");
  return result.data;
}

export const env = validateEnvironment();
