import { JobTypes } from "@/jobs/jobTypes";
import type { DeadLetterJob, NotificationJob } from "@/jobs/notificationJob";
import type { Notification } from "@/types/notification";
import { addJob } from "@/utils/queueHelpers";

export interface PublishOptions {
  /** Publishes sharing a key collapse into one queued message. */
  dedupeKey?: string;
}

export interface NotificationQueue {
  publish(job: NotificationJob, options?: PublishOptions): Promise<void>;
  publishDeadLetter(job: DeadLetterJob): Promise<void>;
}

export function dispatchJobId(notification: Notification): string | undefined {
  if (!notification.dispatchedAt) {
    return undefined;
  }

  return `${notification.id}-${notification.retryCount}-${notification.dispatchedAt.getTime()}`;
}

export function deadLetterJobId(job: DeadLetterJob): string {
  return `dlq-${job.notificationId}-${new Date(job.failedAt).getTime()}`;
}

export class BullNotificationQueue implements NotificationQueue {
  async publish(job: NotificationJob, options: PublishOptions = {}): Promise<void> {
    await addJob(JobTypes.NOTIFICATION, job, options.dedupeKey ? { jobId: options.dedupeKey } : undefined);
  }

  async publishDeadLetter(job: DeadLetterJob): Promise<void> {
    await addJob(JobTypes.NOTIFICATION_DEAD_LETTER, job, { jobId: deadLetterJobId(job) });
  }
}
