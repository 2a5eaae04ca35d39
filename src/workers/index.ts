import { JobTypes } from "@/jobs/jobTypes";
import { createNotificationJobHandler } from "@/queue/jobHandlers/notification.handler";
import { closeQueues, getQueue, initializeQueues } from "@/queue/queueManager";
import type { DeliveryEngine } from "@/services/notification/deliveryEngine";
import { logger } from "@/utils/logger";

let workersRunning = false;

export async function startWorkers(engine: Pick<DeliveryEngine, "process">, concurrency: number) {
  if (workersRunning) {
    return;
  }

  await initializeQueues();

  getQueue(JobTypes.NOTIFICATION)
    .process(JobTypes.NOTIFICATION, concurrency, createNotificationJobHandler(engine))
    .catch((error: unknown) => {
      logger.error("Notification worker stopped unexpectedly", { error });
    });

  workersRunning = true;
  logger.info("Bull workers initialized", { concurrency });
}

export async function stopWorkers() {
  if (!workersRunning) {
    return;
  }

  await closeQueues();
  workersRunning = false;
  logger.info("Bull workers stopped");
}

export function areWorkersRunning(): boolean {
  return workersRunning;
}
