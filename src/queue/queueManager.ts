import Bull from "bull";

import { config } from "@/config/config";
import { type JobPayloadMap, JobTypes } from "@/jobs/jobTypes";
import { logger } from "@/utils/logger";

type QueueRegistry = {
  [K in JobTypes]: Bull.Queue<JobPayloadMap[K]>;
};

let queues: QueueRegistry | null = null;

const QUEUE_NAMES: Record<JobTypes, string> = {
  [JobTypes.NOTIFICATION]: "notifications",
  [JobTypes.NOTIFICATION_DEAD_LETTER]: "notifications-dlq",
};

// Broker-level redelivery for jobs rejected by an infrastructure error; delivery retries live in the store.
const primaryJobOptions: Bull.JobOptions = {
  attempts: 5,
  backoff: {
    type: "exponential",
    delay: 2000,
  },
  removeOnComplete: true,
  removeOnFail: false,
};

// Dead-lettered jobs are kept for inspection and never processed.
const deadLetterJobOptions: Bull.JobOptions = {
  attempts: 1,
  removeOnComplete: false,
  removeOnFail: false,
};

function attachEventListeners<T>(queue: Bull.Queue<T>, jobType: JobTypes) {
  queue.on("completed", (job) => {
    logger.debug("Job completed", { jobType, jobId: job.id });
  });

  queue.on("failed", (job, error) => {
    logger.error("Job failed", { jobType, jobId: job?.id, attemptsMade: job?.attemptsMade, error });
  });

  queue.on("stalled", (job) => {
    logger.warn("Job stalled and will be reprocessed", { jobType, jobId: job.id });
  });

  queue.on("error", (error) => {
    logger.error("Queue error", { jobType, error });
  });
}

function createQueue<T>(jobType: JobTypes, defaultJobOptions: Bull.JobOptions): Bull.Queue<T> {
  const queue: Bull.Queue<T> = new Bull(QUEUE_NAMES[jobType], config.redis.url, {
    prefix: config.queue.prefix,
    defaultJobOptions: { ...defaultJobOptions },
  });
  attachEventListeners(queue, jobType);
  return queue;
}

export async function initializeQueues(): Promise<QueueRegistry> {
  if (queues) {
    return queues;
  }

  const created: QueueRegistry = {
    [JobTypes.NOTIFICATION]: createQueue<JobPayloadMap[JobTypes.NOTIFICATION]>(JobTypes.NOTIFICATION, primaryJobOptions),
    [JobTypes.NOTIFICATION_DEAD_LETTER]: createQueue<JobPayloadMap[JobTypes.NOTIFICATION_DEAD_LETTER]>(
      JobTypes.NOTIFICATION_DEAD_LETTER,
      deadLetterJobOptions,
    ),
  };
  queues = created;

  await Promise.all([created[JobTypes.NOTIFICATION].isReady(), created[JobTypes.NOTIFICATION_DEAD_LETTER].isReady()]);
  logger.info("Bull queues initialized", { prefix: config.queue.prefix, queues: Object.values(QUEUE_NAMES) });
  return created;
}

export function getQueue<T extends JobTypes>(jobType: T): Bull.Queue<JobPayloadMap[T]> {
  if (!queues) {
    throw new Error("Queues have not been initialized");
  }

  return queues[jobType];
}

export async function checkQueueHealth(): Promise<boolean> {
  try {
    const pong = await getQueue(JobTypes.NOTIFICATION).client.ping();
    return pong === "PONG";
  } catch (error) {
    logger.error("Queue health check failed", { error });
    return false;
  }
}

export async function closeQueues() {
  if (!queues) {
    return;
  }

  const queueEntries = [queues[JobTypes.NOTIFICATION], queues[JobTypes.NOTIFICATION_DEAD_LETTER]];
  await Promise.all(
    queueEntries.map(async (queue) => {
      try {
        await queue.close();
      } catch (error) {
        logger.error("Failed to close queue", { error });
      }
    }),
  );

  queues = null;
  logger.info("Bull queues shut down");
}
