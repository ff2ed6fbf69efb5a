import type { FastifyInstance } from "fastify";
import {
  createNotificationsHandlers,
  type NotificationsHandlerDependencies,
} from "../handlers/notifications.js";

export type NotificationsRouteDependencies = NotificationsHandlerDependencies;

export async function notificationsRoutes(
  app: FastifyInstance,
  dependencies: NotificationsRouteDependencies
) {
  const { handleHealthCheck, handleWelcome, handleOrderUpdate, handleAnnouncement } =
    createNotificationsHandlers(dependencies);

  app.get("/", handleHealthCheck);
  app.post("/notifications/welcome", handleWelcome);
  app.post("/notifications/orders", handleOrderUpdate);
  app.post("/notifications/announcements", handleAnnouncement);
}
