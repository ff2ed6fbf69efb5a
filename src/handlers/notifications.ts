import type { FastifyReply, FastifyRequest } from "fastify";
import {
  announcementRequestSchema,
  orderNotificationRequestSchema,
  welcomeRequestSchema,
  type SendMessageResult,
} from "../types/index.js";
import type { NotificationService } from "../services/notifications.js";

export type NotificationsHandlerDependencies = Pick<
  NotificationService,
  "sendWelcomeMessage" | "sendOrderNotification" | "sendBulkAnnouncement"
>;

function sendResult(
  reply: FastifyReply,
  request: FastifyRequest,
  result: SendMessageResult
) {
  if (!result.success) {
    request.log.error({ error: result.error }, "notification.send.failed");
    return reply.status(502).send({
      error: "Failed to send message",
      details: result.error,
    });
  }

  return reply.send({
    success: true,
    messageSid: result.messageSid,
  });
}

export function createNotificationsHandlers(
  dependencies: NotificationsHandlerDependencies
) {
  const { sendWelcomeMessage, sendOrderNotification, sendBulkAnnouncement } =
    dependencies;

  return {
    async handleWelcome(request: FastifyRequest, reply: FastifyReply) {
      const parsed = welcomeRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: "Invalid request body",
          details: parsed.error.flatten().fieldErrors,
        });
      }

      const { phone, name } = parsed.data;
      request.log.info({ phone }, "notification.welcome.requested");

      return sendResult(reply, request, await sendWelcomeMessage(phone, name));
    },

    async handleOrderUpdate(request: FastifyRequest, reply: FastifyReply) {
      const parsed = orderNotificationRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: "Invalid request body",
          details: parsed.error.flatten().fieldErrors,
        });
      }

      const { phone, orderId, status } = parsed.data;
      request.log.info({ phone, orderId, status }, "notification.order.requested");

      return sendResult(
        reply,
        request,
        await sendOrderNotification(phone, orderId, status)
      );
    },

    async handleAnnouncement(request: FastifyRequest, reply: FastifyReply) {
      const parsed = announcementRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: "Invalid request body",
          details: parsed.error.flatten().fieldErrors,
        });
      }

      const { phones, message } = parsed.data;
      const results = await sendBulkAnnouncement(phones, message);
      const failed = results.filter((result) => !result.success).length;

      request.log.info(
        { recipients: results.length, failed },
        "notification.announcement.complete"
      );

      return reply.status(failed === 0 ? 200 : 207).send({
        success: failed === 0,
        results,
      });
    },

    async handleHealthCheck(_request: FastifyRequest, reply: FastifyReply) {
      return reply.send({ ok: true });
    },
  };
}
