import { decideNextRetry, MAX_RETRIES } from "@/services/notification/backoffPolicy";
import type { DeliveryResult } from "@/services/delivery/adapter.types";
import type { Notification, NotificationPatch, NotificationStatus } from "@/types/notification";
import { InvalidTransitionError } from "@/utils/errors";

const ALLOWED_TRANSITIONS: Record<NotificationStatus, readonly NotificationStatus[]> = {
  pending: ["sent", "retry_scheduled"],
  retry_scheduled: ["sent", "retry_scheduled", "failed_permanently", "pending"],
  sent: [],
  failed_permanently: ["pending"],
};

export const TERMINAL_STATUSES: ReadonlySet<NotificationStatus> = new Set<NotificationStatus>(["sent", "failed_permanently"]);

export interface DeliveryTransition {
  status: NotificationStatus;
  patch: NotificationPatch;
  deadLetter: boolean;
}

export interface ManualRetryOptions {
  allowFromRetryScheduled: boolean;
}

export function isTransitionAllowed(from: NotificationStatus, to: NotificationStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: NotificationStatus, to: NotificationStatus) {
  if (!isTransitionAllowed(from, to)) {
    throw new InvalidTransitionError(`Cannot move notification from ${from} to ${to}`, { from, to });
  }
}

export function isTerminal(status: NotificationStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * A queued message may only act on a pending record, or on a scheduled retry
 * that the scheduler has claimed for dispatch.
 */
export function isDispatchable(notification: Notification): boolean {
  if (notification.status === "pending") {
    return true;
  }

  return notification.status === "retry_scheduled" && notification.dispatchedAt !== null;
}

export function resolveDeliveryOutcome(notification: Notification, result: DeliveryResult, now: Date): DeliveryTransition {
  if (result.ok) {
    assertTransition(notification.status, "sent");
    return {
      status: "sent",
      deadLetter: false,
      patch: {
        status: "sent",
        lastError: null,
        nextRetryTime: null,
        dispatchedAt: null,
      },
    };
  }

  const retryCount = notification.retryCount + 1;
  if (retryCount > MAX_RETRIES) {
    throw new Error(`Notification ${notification.id} has no retries left (retryCount ${notification.retryCount})`);
  }

  const decision = decideNextRetry(retryCount, now);

  if (decision.exhausted) {
    assertTransition(notification.status, "failed_permanently");
    return {
      status: "failed_permanently",
      deadLetter: true,
      patch: {
        status: "failed_permanently",
        retryCount,
        lastError: result.reason,
        nextRetryTime: null,
        dispatchedAt: null,
      },
    };
  }

  assertTransition(notification.status, "retry_scheduled");
  return {
    status: "retry_scheduled",
    deadLetter: false,
    patch: {
      status: "retry_scheduled",
      retryCount,
      lastError: result.reason,
      nextRetryTime: decision.nextRetryTime,
      dispatchedAt: null,
    },
  };
}

export function planManualRetry(notification: Notification, options: ManualRetryOptions, now: Date): NotificationPatch {
  const permitted =
    notification.status === "failed_permanently" ||
    (notification.status === "retry_scheduled" && options.allowFromRetryScheduled);

  if (!permitted) {
    throw new InvalidTransitionError(`Notification in status ${notification.status} cannot be retried manually`, {
      status: notification.status,
    });
  }

  assertTransition(notification.status, "pending");
  return {
    status: "pending",
    retryCount: 0,
    nextRetryTime: null,
    deadLetteredAt: null,
    dispatchedAt: now,
  };
}
