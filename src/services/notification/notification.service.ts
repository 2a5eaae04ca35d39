import { randomUUID } from "node:crypto";

import { toNotificationJob } from "@/jobs/notificationJob";
import { dispatchJobId, type NotificationQueue } from "@/queue/notificationQueue";
import { isValidEmail, isValidPhoneNumber } from "@/services/delivery/destinationValidators";
import type { NotificationStore, UserNotificationFilter } from "@/services/notification/notification.repository";
import { planManualRetry } from "@/services/notification/stateMachine";
import type { Notification, NotificationChannel, NotificationStatusCounts } from "@/types/notification";
import {
  ConcurrentUpdateError,
  NotFoundError,
  ServiceUnavailableError,
  ValidationError,
} from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface CreateNotificationInput {
  userId: string;
  channel: NotificationChannel;
  message: string;
  destination?: string | null;
}

export interface NotificationServiceOptions {
  allowRetryFromScheduled: boolean;
  now?: () => Date;
  generateId?: () => string;
}

export interface NotificationStats {
  statuses: NotificationStatusCounts;
  total: number;
}

function normalizeDestination(channel: NotificationChannel, destination: string | null | undefined): string | null {
  const trimmed = destination?.trim() ?? "";

  switch (channel) {
    case "email":
      if (!isValidEmail(trimmed)) {
        throw new ValidationError("A valid email destination is required for email notifications");
      }
      return trimmed;
    case "sms":
      if (!isValidPhoneNumber(trimmed)) {
        throw new ValidationError("An E.164 phone number is required for SMS notifications");
      }
      return trimmed;
    case "in_app":
      return null;
  }
}

export class NotificationService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly store: NotificationStore,
    private readonly queue: Pick<NotificationQueue, "publish">,
    private readonly options: NotificationServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async createNotification(input: CreateNotificationInput): Promise<Notification> {
    const userId = input.userId.trim();
    const message = input.message.trim();
    if (!userId || !message) {
      throw new ValidationError("userId and message are required");
    }

    const destination = normalizeDestination(input.channel, input.destination);
    const now = this.now();

    const notification = await this.store.insert({
      id: this.generateId(),
      userId,
      channel: input.channel,
      message,
      destination,
      status: "pending",
      retryCount: 0,
      nextRetryTime: null,
      lastError: null,
      dispatchedAt: now,
      deadLetteredAt: null,
      createdAt: now,
      updatedAt: now,
    });

    await this.publishOrRelease(notification, "Failed to queue notification");

    logger.info("Notification queued", {
      notificationId: notification.id,
      userId: notification.userId,
      channel: notification.channel,
    });
    return notification;
  }

  async getNotification(id: string): Promise<Notification> {
    const notification = await this.store.get(id);
    if (!notification) {
      throw new NotFoundError(`Notification ${id} not found`);
    }

    return notification;
  }

  async listUserNotifications(userId: string, filter?: UserNotificationFilter): Promise<Notification[]> {
    return this.store.listByUser(userId, filter);
  }

  /** Moves a notification back to `pending` with a fresh retry budget and queues it again. */
  async retryNotification(id: string): Promise<Notification> {
    const current = await this.getNotification(id);
    const patch = planManualRetry(current, { allowFromRetryScheduled: this.options.allowRetryFromScheduled }, this.now());

    const updated = await this.store.updateFields(id, patch, {
      status: current.status,
      retryCount: current.retryCount,
    });

    if (!updated) {
      throw new ConcurrentUpdateError(`Notification ${id} changed while the retry was being requested`);
    }

    await this.publishOrRelease(updated, "Failed to queue notification retry");

    logger.warn("Manual retry requested", {
      notificationId: id,
      previousStatus: current.status,
      previousRetryCount: current.retryCount,
    });
    return updated;
  }

  async getStats(): Promise<NotificationStats> {
    const statuses = await this.store.countByStatus();
    const total = Object.values(statuses).reduce((sum, count) => sum + count, 0);
    return { statuses, total };
  }

  /**
   * On a failed publish the dispatch claim is dropped so the retry scheduler
   * picks the pending record up on its next scan.
   */
  private async publishOrRelease(notification: Notification, failureMessage: string) {
    try {
      await this.queue.publish(toNotificationJob(notification), { dedupeKey: dispatchJobId(notification) });
    } catch (error) {
      logger.error(failureMessage, { notificationId: notification.id, error });

      await this.store
        .updateFields(notification.id, { dispatchedAt: null }, { status: "pending", dispatchedAt: notification.dispatchedAt })
        .catch((releaseError: unknown) => {
          logger.error("Failed to release dispatch claim", { notificationId: notification.id, releaseError });
        });

      throw new ServiceUnavailableError(failureMessage, { notificationId: notification.id });
    }
  }
}
