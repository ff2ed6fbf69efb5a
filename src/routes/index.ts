import type { FastifyInstance } from "fastify";
import {
  notificationsRoutes,
  type NotificationsRouteDependencies,
} from "./notifications.js";

export interface RoutesDependencies {
  notifications: NotificationsRouteDependencies;
}

export async function registerRoutes(
  app: FastifyInstance,
  dependencies: RoutesDependencies
) {
  await app.register(async (instance) => {
    await notificationsRoutes(instance, dependencies.notifications);
  });
}
