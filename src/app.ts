import fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
  type RawServerDefault,
} from "fastify";
import { registerRoutes } from "./routes/index.js";
import type { NotificationService } from "./services/notifications.js";
import { logger } from "./logger.js";

export interface AppDependencies {
  notificationService: NotificationService;
}

export type AppInstance = FastifyInstance<RawServerDefault>;

export async function buildApp({
  notificationService,
}: AppDependencies): Promise<AppInstance> {
  const loggerInstance =
    process.env.NODE_ENV === "test"
      ? undefined
      : logger.child({ module: "fastify" });

  const appOptions: FastifyServerOptions<RawServerDefault> = loggerInstance
    ? { loggerInstance }
    : { logger: false };

  const app = fastify(appOptions);

  await app.register(async (instance) => {
    await registerRoutes(instance, { notifications: notificationService });
  });

  return app;
}
