import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { validateRequest } from "@/middleware/validateRequest";
import { isValidEmail, isValidPhoneNumber } from "@/services/delivery/destinationValidators";
import type { NotificationService } from "@/services/notification/notification.service";
import { NOTIFICATION_CHANNELS, NOTIFICATION_STATUSES, type Notification } from "@/types/notification";

const createNotificationSchema = z
  .object({
    user_id: z.string().trim().min(1).max(255),
    channel: z.enum(NOTIFICATION_CHANNELS),
    message: z.string().trim().min(1).max(10_000),
    destination: z.string().trim().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.channel === "email" && !isValidEmail(value.destination)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A valid email address is required for email notifications",
        path: ["destination"],
      });
    }

    if (value.channel === "sms" && !isValidPhoneNumber(value.destination)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "An E.164 phone number is required for SMS notifications",
        path: ["destination"],
      });
    }
  });

const notificationParamsSchema = z.object({
  id: z.string().uuid(),
});

const userParamsSchema = z.object({
  userId: z.string().trim().min(1),
});

const userNotificationsQuerySchema = z.object({
  channel: z.enum(NOTIFICATION_CHANNELS).optional(),
  status: z.enum(NOTIFICATION_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

type CreateNotificationBody = z.infer<typeof createNotificationSchema>;
type NotificationParams = z.infer<typeof notificationParamsSchema>;
type UserParams = z.infer<typeof userParamsSchema>;
type UserNotificationsQuery = z.infer<typeof userNotificationsQuerySchema>;

export function serializeNotification(notification: Notification) {
  return {
    id: notification.id,
    user_id: notification.userId,
    channel: notification.channel,
    message: notification.message,
    destination: notification.destination,
    status: notification.status,
    retry_count: notification.retryCount,
    next_retry_time: notification.nextRetryTime?.toISOString() ?? null,
    last_error: notification.lastError,
    created_at: notification.createdAt.toISOString(),
    updated_at: notification.updatedAt.toISOString(),
  };
}

export function buildNotificationRoutes(service: NotificationService) {
  return async function registerNotificationRoutes(app: FastifyInstance) {
    app.post(
      "/notifications",
      {
        preHandler: [validateRequest({ body: createNotificationSchema })],
      },
      async (request, reply) => {
        const body = request.body as CreateNotificationBody;
        const notification = await service.createNotification({
          userId: body.user_id,
          channel: body.channel,
          message: body.message,
          destination: body.destination,
        });

        reply.code(201);
        return { id: notification.id, status: notification.status };
      },
    );

    app.get(
      "/notifications/:id",
      {
        preHandler: [validateRequest({ params: notificationParamsSchema })],
      },
      async (request) => {
        const params = request.params as NotificationParams;
        return serializeNotification(await service.getNotification(params.id));
      },
    );

    app.post(
      "/notifications/:id/retry",
      {
        preHandler: [validateRequest({ params: notificationParamsSchema })],
      },
      async (request, reply) => {
        const params = request.params as NotificationParams;
        const notification = await service.retryNotification(params.id);

        reply.code(202);
        return {
          id: notification.id,
          status: notification.status,
          retry_count: notification.retryCount,
        };
      },
    );

    app.get(
      "/users/:userId/notifications",
      {
        preHandler: [validateRequest({ params: userParamsSchema, query: userNotificationsQuerySchema })],
      },
      async (request) => {
        const params = request.params as UserParams;
        const query = request.query as UserNotificationsQuery;
        const notifications = await service.listUserNotifications(params.userId, {
          channel: query.channel,
          status: query.status,
          limit: query.limit,
        });

        return { notifications: notifications.map(serializeNotification) };
      },
    );

    app.get("/stats", async () => service.getStats());
  };
}
