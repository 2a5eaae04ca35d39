import type { Job } from "bull";

import type { NotificationJob } from "@/jobs/notificationJob";
import type { DeliveryEngine } from "@/services/notification/deliveryEngine";
import { MalformedMessageError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export function createNotificationJobHandler(engine: Pick<DeliveryEngine, "process">) {
  return async function handleNotificationJob(job: Job<NotificationJob>): Promise<void> {
    logger.debug("Notification job started", {
      jobId: job.id,
      notificationId: job.data.notificationId,
      attemptsMade: job.attemptsMade,
    });

    try {
      const outcome = await engine.process(job.data);
      logger.debug("Notification job completed", {
        jobId: job.id,
        notificationId: job.data.notificationId,
        outcome: outcome.kind,
      });
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        // Redelivery cannot fix the payload; park it in the failed set.
        await job.discard();
        logger.error("Discarding malformed notification job", { jobId: job.id, error: error.message, details: error.details });
      } else {
        logger.warn("Notification job rejected for redelivery", {
          jobId: job.id,
          notificationId: job.data.notificationId,
          attemptsMade: job.attemptsMade,
          error,
        });
      }

      throw error;
    }
  };
}
