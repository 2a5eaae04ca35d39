export const NOTIFICATION_CHANNELS = ["email", "sms", "in_app"] as const;
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

/**
 * Persisted statuses. A failed attempt is only ever a label on the way to
 * `retry_scheduled` or `failed_permanently`, so it has no stored value.
 */
export const NOTIFICATION_STATUSES = ["pending", "sent", "retry_scheduled", "failed_permanently"] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export interface Notification {
  id: string;
  userId: string;
  channel: NotificationChannel;
  message: string;
  destination: string | null;
  status: NotificationStatus;
  retryCount: number;
  nextRetryTime: Date | null;
  lastError: string | null;
  /** Set while a queue message for the current attempt is in flight. */
  dispatchedAt: Date | null;
  deadLetteredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NotificationPatch = Partial<
  Pick<Notification, "status" | "retryCount" | "nextRetryTime" | "lastError" | "dispatchedAt" | "deadLetteredAt">
>;

export type NotificationStatusCounts = Record<NotificationStatus, number>;

export function isNotificationChannel(value: unknown): value is NotificationChannel {
  return typeof value === "string" && NOTIFICATION_CHANNELS.some((channel) => channel === value);
}

export function isNotificationStatus(value: unknown): value is NotificationStatus {
  return typeof value === "string" && NOTIFICATION_STATUSES.some((status) => status === value);
}

export function emptyStatusCounts(): NotificationStatusCounts {
  return {
    pending: 0,
    sent: 0,
    retry_scheduled: 0,
    failed_permanently: 0,
  };
}
