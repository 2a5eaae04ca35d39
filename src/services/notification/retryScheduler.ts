import cron, { type ScheduledTask } from "node-cron";

import { toNotificationJob } from "@/jobs/notificationJob";
import { dispatchJobId, type NotificationQueue } from "@/queue/notificationQueue";
import { publishDeadLetter } from "@/services/notification/deadLetter";
import type { NotificationStore } from "@/services/notification/notification.repository";
import type { Notification, NotificationStatus } from "@/types/notification";
import { logger } from "@/utils/logger";

export interface RetrySchedulerOptions {
  intervalSeconds: number;
  batchSize: number;
  /** A dispatch claim older than this is treated as lost and may be taken again. */
  claimTtlMs: number;
  now?: () => Date;
}

export interface ScanSummary {
  scanned: number;
  published: number;
  skipped: number;
  failed: number;
  deadLettered: number;
}

type DispatchResult = "published" | "skipped" | "failed" | "deadLettered";

export class RetryScheduler {
  private task: ScheduledTask | null = null;
  private scanInFlight: Promise<ScanSummary> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly store: NotificationStore,
    private readonly queue: Pick<NotificationQueue, "publish" | "publishDeadLetter">,
    private readonly options: RetrySchedulerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get cronExpression(): string {
    return `*/${this.options.intervalSeconds} * * * * *`;
  }

  start() {
    if (this.task) {
      logger.warn("Retry scheduler is already running");
      return;
    }

    this.task = cron.schedule(
      this.cronExpression,
      async () => {
        await this.tick();
      },
      {
        scheduled: true,
        timezone: "UTC",
      },
    );

    logger.info("Retry scheduler started", {
      schedule: this.cronExpression,
      batchSize: this.options.batchSize,
      claimTtlMs: this.options.claimTtlMs,
    });
  }

  stop() {
    if (!this.task) {
      logger.warn("Retry scheduler is not running");
      return;
    }

    this.task.stop();
    this.task = null;
    logger.info("Retry scheduler stopped");
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /** Runs one scan unless the previous one is still going, in which case that scan is returned. */
  runOnce(): Promise<ScanSummary> {
    if (this.scanInFlight) {
      logger.debug("Retry scan still in progress, not starting another");
      return this.scanInFlight;
    }

    this.scanInFlight = this.scan().finally(() => {
      this.scanInFlight = null;
    });
    return this.scanInFlight;
  }

  private async tick() {
    try {
      const summary = await this.runOnce();
      if (summary.scanned > 0) {
        logger.info("Retry scan completed", { ...summary });
      }
    } catch (error) {
      logger.error("Retry scan failed with unhandled error", { error });
    }
  }

  private async scan(): Promise<ScanSummary> {
    const now = this.now();
    const claimExpiredBefore = new Date(now.getTime() - this.options.claimTtlMs);

    const dueRetries = await this.store.find({
      status: "retry_scheduled",
      nextRetryBefore: now,
      claimExpiredBefore,
      limit: this.options.batchSize,
    });

    // Pending records whose publish failed, or whose message was lost before consumption.
    const strandedPending = await this.store.find({
      status: "pending",
      claimExpiredBefore,
      limit: this.options.batchSize,
    });

    // Exhausted records whose dead-letter publish never succeeded. The grace period
    // leaves the first attempt to the worker that recorded the failure.
    const undeadLettered = await this.store.find({
      status: "failed_permanently",
      deadLettered: false,
      updatedBefore: claimExpiredBefore,
      limit: this.options.batchSize,
    });

    const summary: ScanSummary = { scanned: 0, published: 0, skipped: 0, failed: 0, deadLettered: 0 };
    const seen = new Set<string>();

    for (const notification of [...dueRetries, ...strandedPending, ...undeadLettered]) {
      if (seen.has(notification.id)) {
        continue;
      }
      seen.add(notification.id);
      summary.scanned += 1;

      if (notification.status === "retry_scheduled" && !isDue(notification, now)) {
        summary.skipped += 1;
        continue;
      }

      const result =
        notification.status === "failed_permanently"
          ? await this.recoverDeadLetter(notification, now)
          : await this.dispatch(notification, now);
      summary[result] += 1;
    }

    return summary;
  }

  private async dispatch(notification: Notification, now: Date): Promise<DispatchResult> {
    const expectedStatus: NotificationStatus = notification.status;

    try {
      const claimed = await this.store.updateFields(
        notification.id,
        { dispatchedAt: now },
        {
          status: expectedStatus,
          retryCount: notification.retryCount,
          dispatchedAt: notification.dispatchedAt,
        },
      );

      if (!claimed) {
        return "skipped";
      }

      try {
        await this.queue.publish(toNotificationJob(claimed), { dedupeKey: dispatchJobId(claimed) });
      } catch (error) {
        logger.error("Failed to re-publish notification", { notificationId: notification.id, error });
        await this.releaseClaim(claimed, notification.dispatchedAt);
        return "failed";
      }

      logger.debug("Notification re-published", {
        notificationId: claimed.id,
        status: claimed.status,
        retryCount: claimed.retryCount,
      });
      return "published";
    } catch (error) {
      logger.error("Failed to claim notification for dispatch", { notificationId: notification.id, error });
      return "failed";
    }
  }

  private async recoverDeadLetter(notification: Notification, now: Date): Promise<DispatchResult> {
    try {
      const stamped = await publishDeadLetter(this.store, this.queue, notification, now);
      if (!stamped) {
        return "skipped";
      }

      logger.warn("Recovered missing dead-letter publish", {
        notificationId: notification.id,
        retryCount: notification.retryCount,
      });
      return "deadLettered";
    } catch (error) {
      logger.error("Failed to publish notification to the dead-letter queue", { notificationId: notification.id, error });
      return "failed";
    }
  }

  private async releaseClaim(claimed: Notification, previousClaim: Date | null) {
    try {
      await this.store.updateFields(
        claimed.id,
        { dispatchedAt: previousClaim },
        { status: claimed.status, dispatchedAt: claimed.dispatchedAt },
      );
    } catch (error) {
      // The claim expires on its own after the TTL.
      logger.error("Failed to release dispatch claim", { notificationId: claimed.id, error });
    }
  }
}

function isDue(notification: Notification, now: Date) {
  return notification.nextRetryTime !== null && notification.nextRetryTime.getTime() <= now.getTime();
}
