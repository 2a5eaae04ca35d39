import type {
  NotificationFilter,
  NotificationStore,
  UpdateExpectation,
  UserNotificationFilter,
} from "@/services/notification/notification.repository";
import {
  emptyStatusCounts,
  type Notification,
  type NotificationPatch,
  type NotificationStatusCounts,
} from "@/types/notification";

function sameInstant(left: Date | null, right: Date | null) {
  if (left === null || right === null) {
    return left === right;
  }

  return left.getTime() === right.getTime();
}

function clone(notification: Notification): Notification {
  return {
    ...notification,
    nextRetryTime: notification.nextRetryTime ? new Date(notification.nextRetryTime) : null,
    dispatchedAt: notification.dispatchedAt ? new Date(notification.dispatchedAt) : null,
    deadLetteredAt: notification.deadLetteredAt ? new Date(notification.deadLetteredAt) : null,
    createdAt: new Date(notification.createdAt),
    updatedAt: new Date(notification.updatedAt),
  };
}

/** Mirrors the conditional-update semantics of the PostgreSQL store. */
export class InMemoryNotificationStore implements NotificationStore {
  private readonly records = new Map<string, Notification>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(id: string): Promise<Notification | null> {
    const record = this.records.get(id);
    return record ? clone(record) : null;
  }

  async insert(notification: Notification): Promise<Notification> {
    if (this.records.has(notification.id)) {
      throw new Error(`duplicate key value violates unique constraint: ${notification.id}`);
    }

    this.records.set(notification.id, clone(notification));
    return clone(notification);
  }

  async updateFields(id: string, patch: NotificationPatch, expected: UpdateExpectation = {}): Promise<Notification | null> {
    const current = this.records.get(id);
    if (!current) {
      return null;
    }

    if (expected.status !== undefined && current.status !== expected.status) {
      return null;
    }
    if (expected.retryCount !== undefined && current.retryCount !== expected.retryCount) {
      return null;
    }
    if (expected.dispatchedAt !== undefined && !sameInstant(current.dispatchedAt, expected.dispatchedAt)) {
      return null;
    }
    if (expected.deadLetteredAt !== undefined && !sameInstant(current.deadLetteredAt, expected.deadLetteredAt)) {
      return null;
    }

    const updated: Notification = {
      ...current,
      status: patch.status ?? current.status,
      retryCount: patch.retryCount ?? current.retryCount,
      nextRetryTime: patch.nextRetryTime === undefined ? current.nextRetryTime : patch.nextRetryTime,
      lastError: patch.lastError === undefined ? current.lastError : patch.lastError,
      dispatchedAt: patch.dispatchedAt === undefined ? current.dispatchedAt : patch.dispatchedAt,
      deadLetteredAt: patch.deadLetteredAt === undefined ? current.deadLetteredAt : patch.deadLetteredAt,
      updatedAt: this.now(),
    };
    this.records.set(id, updated);
    return clone(updated);
  }

  async find(filter: NotificationFilter): Promise<Notification[]> {
    const { nextRetryBefore, claimExpiredBefore, updatedBefore, deadLettered } = filter;
    const matches = [...this.records.values()]
      .filter((record) => record.status === filter.status)
      .filter(
        (record) =>
          !nextRetryBefore ||
          (record.nextRetryTime !== null && record.nextRetryTime.getTime() <= nextRetryBefore.getTime()),
      )
      .filter(
        (record) =>
          !claimExpiredBefore ||
          record.dispatchedAt === null ||
          record.dispatchedAt.getTime() <= claimExpiredBefore.getTime(),
      )
      .filter((record) => !updatedBefore || record.updatedAt.getTime() <= updatedBefore.getTime())
      .filter((record) => deadLettered === undefined || (record.deadLetteredAt !== null) === deadLettered)
      .sort((left, right) => (left.nextRetryTime?.getTime() ?? Infinity) - (right.nextRetryTime?.getTime() ?? Infinity));

    return matches.slice(0, filter.limit ?? matches.length).map(clone);
  }

  async listByUser(userId: string, filter: UserNotificationFilter = {}): Promise<Notification[]> {
    return [...this.records.values()]
      .filter((record) => record.userId === userId)
      .filter((record) => !filter.channel || record.channel === filter.channel)
      .filter((record) => !filter.status || record.status === filter.status)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .slice(0, filter.limit ?? 100)
      .map(clone);
  }

  async countByStatus(): Promise<NotificationStatusCounts> {
    const counts = emptyStatusCounts();
    for (const record of this.records.values()) {
      counts[record.status] += 1;
    }
    return counts;
  }

  all(): Notification[] {
    return [...this.records.values()].map(clone);
  }
}
