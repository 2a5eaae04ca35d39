import type { SqlClient } from "@/database/connection";
import {
  emptyStatusCounts,
  isNotificationChannel,
  isNotificationStatus,
  type Notification,
  type NotificationChannel,
  type NotificationPatch,
  type NotificationStatus,
  type NotificationStatusCounts,
} from "@/types/notification";

/** Values a conditional update expects to find before it writes. */
export interface UpdateExpectation {
  status?: NotificationStatus;
  retryCount?: number;
  dispatchedAt?: Date | null;
  deadLetteredAt?: Date | null;
}

export interface NotificationFilter {
  status: NotificationStatus;
  /** Only records whose `nextRetryTime` is at or before this instant. */
  nextRetryBefore?: Date;
  /** Only records with no dispatch claim, or a claim taken at or before this instant. */
  claimExpiredBefore?: Date;
  /** Only records last updated at or before this instant. */
  updatedBefore?: Date;
  /** Filters on whether the dead-letter publish has been recorded. */
  deadLettered?: boolean;
  limit?: number;
}

export interface UserNotificationFilter {
  channel?: NotificationChannel;
  status?: NotificationStatus;
  limit?: number;
}

export interface NotificationStore {
  get(id: string): Promise<Notification | null>;
  insert(notification: Notification): Promise<Notification>;
  /** Returns the updated record, or null when the record is missing or an expectation no longer holds. */
  updateFields(id: string, patch: NotificationPatch, expected?: UpdateExpectation): Promise<Notification | null>;
  find(filter: NotificationFilter): Promise<Notification[]>;
  listByUser(userId: string, filter?: UserNotificationFilter): Promise<Notification[]>;
  countByStatus(): Promise<NotificationStatusCounts>;
}

interface NotificationRow {
  id: string;
  user_id: string;
  channel: string;
  message: string;
  destination: string | null;
  status: string;
  retry_count: number;
  next_retry_time: Date | null;
  last_error: string | null;
  dispatched_at: Date | null;
  dead_lettered_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface StatusCountRow {
  status: string;
  total: number;
}

const NOTIFICATION_COLUMNS = `id, user_id, channel, message, destination, status, retry_count, next_retry_time,
  last_error, dispatched_at, dead_lettered_at, created_at, updated_at`;

const PATCH_COLUMNS = {
  status: "status",
  retryCount: "retry_count",
  nextRetryTime: "next_retry_time",
  lastError: "last_error",
  dispatchedAt: "dispatched_at",
  deadLetteredAt: "dead_lettered_at",
} as const satisfies Record<keyof NotificationPatch, string>;

const PATCH_FIELDS = ["status", "retryCount", "nextRetryTime", "lastError", "dispatchedAt", "deadLetteredAt"] as const;
const EXPECTATION_FIELDS = ["status", "retryCount", "dispatchedAt", "deadLetteredAt"] as const;

const DEFAULT_USER_LIST_LIMIT = 100;

export function mapRowToNotification(row: NotificationRow): Notification {
  if (!isNotificationChannel(row.channel)) {
    throw new Error(`Notification ${row.id} has unknown channel ${row.channel}`);
  }

  if (!isNotificationStatus(row.status)) {
    throw new Error(`Notification ${row.id} has unknown status ${row.status}`);
  }

  return {
    id: row.id,
    userId: row.user_id,
    channel: row.channel,
    message: row.message,
    destination: row.destination,
    status: row.status,
    retryCount: row.retry_count,
    nextRetryTime: row.next_retry_time,
    lastError: row.last_error,
    dispatchedAt: row.dispatched_at,
    deadLetteredAt: row.dead_lettered_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgNotificationStore implements NotificationStore {
  constructor(private readonly db: SqlClient) {}

  async get(id: string): Promise<Notification | null> {
    const result = await this.db.query<NotificationRow>(
      `SELECT ${NOTIFICATION_COLUMNS} FROM notifications WHERE id = $1`,
      [id],
    );

    return result.rows.length > 0 ? mapRowToNotification(result.rows[0]) : null;
  }

  async insert(notification: Notification): Promise<Notification> {
    const result = await this.db.query<NotificationRow>(
      `INSERT INTO notifications (${NOTIFICATION_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       RETURNING ${NOTIFICATION_COLUMNS}`,
      [
        notification.id,
        notification.userId,
        notification.channel,
        notification.message,
        notification.destination,
        notification.status,
        notification.retryCount,
        notification.nextRetryTime,
        notification.lastError,
        notification.dispatchedAt,
        notification.deadLetteredAt,
        notification.createdAt,
        notification.updatedAt,
      ],
    );

    if (result.rows.length === 0) {
      throw new Error("Failed to insert notification");
    }

    return mapRowToNotification(result.rows[0]);
  }

  async updateFields(id: string, patch: NotificationPatch, expected: UpdateExpectation = {}): Promise<Notification | null> {
    const values: unknown[] = [id];
    const assignments: string[] = [];

    for (const field of PATCH_FIELDS) {
      const value = patch[field];
      if (value === undefined) {
        continue;
      }
      values.push(value);
      assignments.push(`${PATCH_COLUMNS[field]} = $${values.length}`);
    }

    assignments.push("updated_at = NOW()");

    const conditions = ["id = $1"];
    for (const field of EXPECTATION_FIELDS) {
      const value = expected[field];
      if (value === undefined) {
        continue;
      }
      values.push(value);
      conditions.push(`${PATCH_COLUMNS[field]} IS NOT DISTINCT FROM $${values.length}`);
    }

    const result = await this.db.query<NotificationRow>(
      `UPDATE notifications
       SET ${assignments.join(", ")}
       WHERE ${conditions.join(" AND ")}
       RETURNING ${NOTIFICATION_COLUMNS}`,
      values,
    );

    return result.rows.length > 0 ? mapRowToNotification(result.rows[0]) : null;
  }

  async find(filter: NotificationFilter): Promise<Notification[]> {
    const values: unknown[] = [filter.status];
    const conditions = ["status = $1"];

    if (filter.nextRetryBefore) {
      values.push(filter.nextRetryBefore);
      conditions.push(`next_retry_time <= $${values.length}`);
    }

    if (filter.claimExpiredBefore) {
      values.push(filter.claimExpiredBefore);
      conditions.push(`(dispatched_at IS NULL OR dispatched_at <= $${values.length})`);
    }

    if (filter.updatedBefore) {
      values.push(filter.updatedBefore);
      conditions.push(`updated_at <= $${values.length}`);
    }

    if (filter.deadLettered !== undefined) {
      conditions.push(filter.deadLettered ? "dead_lettered_at IS NOT NULL" : "dead_lettered_at IS NULL");
    }

    let limitClause = "";
    if (filter.limit !== undefined) {
      values.push(filter.limit);
      limitClause = `LIMIT $${values.length}`;
    }

    const result = await this.db.query<NotificationRow>(
      `SELECT ${NOTIFICATION_COLUMNS}
       FROM notifications
       WHERE ${conditions.join(" AND ")}
       ORDER BY next_retry_time ASC NULLS LAST, created_at ASC
       ${limitClause}`,
      values,
    );

    return result.rows.map(mapRowToNotification);
  }

  async listByUser(userId: string, filter: UserNotificationFilter = {}): Promise<Notification[]> {
    const values: unknown[] = [userId];
    const conditions = ["user_id = $1"];

    if (filter.channel) {
      values.push(filter.channel);
      conditions.push(`channel = $${values.length}`);
    }

    if (filter.status) {
      values.push(filter.status);
      conditions.push(`status = $${values.length}`);
    }

    values.push(filter.limit ?? DEFAULT_USER_LIST_LIMIT);

    const result = await this.db.query<NotificationRow>(
      `SELECT ${NOTIFICATION_COLUMNS}
       FROM notifications
       WHERE ${conditions.join(" AND ")}
       ORDER BY created_at DESC
       LIMIT $${values.length}`,
      values,
    );

    return result.rows.map(mapRowToNotification);
  }

  async countByStatus(): Promise<NotificationStatusCounts> {
    const result = await this.db.query<StatusCountRow>(
      `SELECT status, COUNT(*)::int AS total FROM notifications GROUP BY status`,
    );

    const counts = emptyStatusCounts();
    for (const row of result.rows) {
      if (isNotificationStatus(row.status)) {
        counts[row.status] = Number(row.total);
      }
    }

    return counts;
  }
}
