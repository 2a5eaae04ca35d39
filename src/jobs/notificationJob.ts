import { z } from "zod";

import { NOTIFICATION_CHANNELS, type Notification } from "@/types/notification";

export const notificationJobSchema = z.object({
  notificationId: z.string().uuid(),
  userId: z.string().min(1),
  channel: z.enum(NOTIFICATION_CHANNELS),
  message: z.string(),
  destination: z.string().nullable(),
  retryCount: z.number().int().min(0),
});

export type NotificationJob = z.infer<typeof notificationJobSchema>;

export interface DeadLetterJob extends NotificationJob {
  lastError: string | null;
  failedAt: string;
}

export function toNotificationJob(notification: Notification): NotificationJob {
  return {
    notificationId: notification.id,
    userId: notification.userId,
    channel: notification.channel,
    message: notification.message,
    destination: notification.destination,
    retryCount: notification.retryCount,
  };
}

export function toDeadLetterJob(notification: Notification): DeadLetterJob {
  return {
    ...toNotificationJob(notification),
    lastError: notification.lastError,
    failedAt: notification.updatedAt.toISOString(),
  };
}
