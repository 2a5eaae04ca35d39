import type { JobOptions } from "bull";

import { type JobPayloadMap, JobTypes } from "@/jobs/jobTypes";
import { getQueue, initializeQueues } from "@/queue/queueManager";
import { logger } from "@/utils/logger";

export async function addJob<T extends JobTypes>(jobType: T, payload: JobPayloadMap[T], options?: JobOptions) {
  await initializeQueues();
  const queue = getQueue(jobType);
  const job = await queue.add(jobType, payload, options);
  logger.debug("Job added to queue", { jobType, jobId: job.id });
  return job;
}
