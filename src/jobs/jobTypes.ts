import type { DeadLetterJob, NotificationJob } from "@/jobs/notificationJob";

export enum JobTypes {
  NOTIFICATION = "notification",
  NOTIFICATION_DEAD_LETTER = "notification-dead-letter",
}

export type JobPayloadMap = {
  [JobTypes.NOTIFICATION]: NotificationJob;
  [JobTypes.NOTIFICATION_DEAD_LETTER]: DeadLetterJob;
};

export type JobPayload<T extends JobTypes> = JobPayloadMap[T];
