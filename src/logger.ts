import pino from "pino";

const nodeEnv = process.env.NODE_ENV ?? "development";
const isDevelopment = nodeEnv === "development";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (nodeEnv === "test" ? "silent" : "info"),
  ...(isDevelopment
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            translateTime: "SYS:standard",
            colorize: true,
          },
        },
      }
    : {}),
});

export type Logger = typeof logger;
