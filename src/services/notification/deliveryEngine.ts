import { notificationJobSchema, type NotificationJob } from "@/jobs/notificationJob";
import type { NotificationQueue } from "@/queue/notificationQueue";
import type { AdapterRegistry, DeliveryResult } from "@/services/delivery/adapter.types";
import { resolveAdapter } from "@/services/delivery/adapterRegistry";
import { publishDeadLetter } from "@/services/notification/deadLetter";
import type { NotificationStore } from "@/services/notification/notification.repository";
import { isDispatchable, resolveDeliveryOutcome } from "@/services/notification/stateMachine";
import type { Notification } from "@/types/notification";
import { describeError, MalformedMessageError } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { TimeoutError, withTimeout } from "@/utils/timeout";

export type SkipReason = "already_sent" | "already_failed" | "stale_message" | "not_dispatched" | "concurrent_update";

export type ProcessOutcome =
  | { kind: "sent"; notification: Notification }
  | { kind: "retry_scheduled"; notification: Notification }
  | { kind: "failed_permanently"; notification: Notification }
  | { kind: "skipped"; reason: SkipReason; notificationId: string };

export interface DeliveryEngineDependencies {
  store: NotificationStore;
  queue: Pick<NotificationQueue, "publishDeadLetter">;
  adapters: AdapterRegistry;
  deliveryTimeoutMs: number;
  now?: () => Date;
}

/**
 * Processes one primary-queue message. Resolving means the message can be
 * acknowledged; any thrown error means it must be redelivered by the broker.
 */
export class DeliveryEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: DeliveryEngineDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async process(payload: unknown): Promise<ProcessOutcome> {
    const job = this.parseJob(payload);
    const notification = await this.deps.store.get(job.notificationId);

    if (!notification) {
      throw new MalformedMessageError(`Notification ${job.notificationId} does not exist`, {
        notificationId: job.notificationId,
      });
    }

    if (notification.status === "sent") {
      return this.skip(notification.id, "already_sent");
    }

    if (notification.status === "failed_permanently") {
      if (notification.deadLetteredAt === null) {
        await this.deadLetter(notification);
      }
      return this.skip(notification.id, "already_failed");
    }

    if (job.retryCount !== notification.retryCount) {
      return this.skip(notification.id, "stale_message");
    }

    if (!isDispatchable(notification)) {
      return this.skip(notification.id, "not_dispatched");
    }

    const result = await this.attemptDelivery(notification);
    const transition = resolveDeliveryOutcome(notification, result, this.now());

    const updated = await this.deps.store.updateFields(notification.id, transition.patch, {
      status: notification.status,
      retryCount: notification.retryCount,
    });

    if (!updated) {
      logger.warn("Notification changed while it was being delivered, discarding outcome", {
        notificationId: notification.id,
        attemptedStatus: transition.status,
      });
      return this.skip(notification.id, "concurrent_update");
    }

    if (transition.deadLetter) {
      await this.deadLetter(updated);
      logger.warn("Notification failed permanently", {
        notificationId: updated.id,
        retryCount: updated.retryCount,
        lastError: updated.lastError,
      });
      return { kind: "failed_permanently", notification: updated };
    }

    if (updated.status === "retry_scheduled") {
      logger.info("Notification delivery failed, retry scheduled", {
        notificationId: updated.id,
        channel: updated.channel,
        retryCount: updated.retryCount,
        nextRetryTime: updated.nextRetryTime?.toISOString(),
        lastError: updated.lastError,
      });
      return { kind: "retry_scheduled", notification: updated };
    }

    logger.info("Notification delivered", {
      notificationId: updated.id,
      channel: updated.channel,
      retryCount: updated.retryCount,
    });
    return { kind: "sent", notification: updated };
  }

  private parseJob(payload: unknown): NotificationJob {
    const parsed = notificationJobSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedMessageError("Queue message does not match the notification schema", parsed.error.flatten());
    }

    return parsed.data;
  }

  private async attemptDelivery(notification: Notification): Promise<DeliveryResult> {
    const adapter = resolveAdapter(this.deps.adapters, notification.channel);

    try {
      return await withTimeout(
        adapter.deliver(notification.destination, notification.message),
        this.deps.deliveryTimeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { ok: false, reason: `${notification.channel} delivery timed out after ${error.timeoutMs}ms` };
      }

      logger.error("Delivery adapter threw instead of returning a failure", {
        notificationId: notification.id,
        channel: notification.channel,
        error,
      });
      return { ok: false, reason: describeError(error) };
    }
  }

  private async deadLetter(notification: Notification) {
    await publishDeadLetter(this.deps.store, this.deps.queue, notification, this.now());
  }

  private skip(notificationId: string, reason: SkipReason): ProcessOutcome {
    logger.info("Notification message skipped", { notificationId, reason });
    return { kind: "skipped", reason, notificationId };
  }
}
