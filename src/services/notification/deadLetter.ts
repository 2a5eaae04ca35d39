import { toDeadLetterJob } from "@/jobs/notificationJob";
import type { NotificationQueue } from "@/queue/notificationQueue";
import type { NotificationStore } from "@/services/notification/notification.repository";
import type { Notification } from "@/types/notification";

/**
 * Publishes a permanently failed notification to the dead-letter queue, then
 * stamps `deadLetteredAt`. The job id is derived from the failure time, so a
 * repeated publish for the same failure collapses in the broker.
 *
 * Returns false when the stamp was not applied because the record changed
 * in the meantime (already stamped, or manually retried).
 */
export async function publishDeadLetter(
  store: NotificationStore,
  queue: Pick<NotificationQueue, "publishDeadLetter">,
  notification: Notification,
  now: Date,
): Promise<boolean> {
  await queue.publishDeadLetter(toDeadLetterJob(notification));

  const stamped = await store.updateFields(
    notification.id,
    { deadLetteredAt: now },
    { status: "failed_permanently", deadLetteredAt: null },
  );

  return stamped !== null;
}
