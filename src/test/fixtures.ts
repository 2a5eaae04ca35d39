import type { DeliveryAdapter, DeliveryResult } from "@/services/delivery/adapter.types";
import type { Notification, NotificationChannel } from "@/types/notification";

export const BASE_TIME = new Date("2025-01-15T10:00:00.000Z");
export const NOTIFICATION_ID = "0b8f1c7e-5d6a-4f3b-9a2e-1c4d5e6f7a8b";

export class TestClock {
  private current: number;

  constructor(start: Date = BASE_TIME) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advanceBy(ms: number) {
    this.current += ms;
  }

  set(date: Date) {
    this.current = date.getTime();
  }
}

export function buildNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    id: NOTIFICATION_ID,
    userId: "user-1",
    channel: "email",
    message: "hi",
    destination: "a@b.com",
    status: "pending",
    retryCount: 0,
    nextRetryTime: null,
    lastError: null,
    dispatchedAt: null,
    deadLetteredAt: null,
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    ...overrides,
  };
}

/** Returns the scripted results in order, repeating the last one. */
export class ScriptedAdapter implements DeliveryAdapter {
  readonly calls: Array<{ destination: string | null; message: string }> = [];
  private readonly script: DeliveryResult[];

  constructor(
    readonly channel: NotificationChannel,
    script: DeliveryResult[],
  ) {
    this.script = [...script];
  }

  async deliver(destination: string | null, message: string): Promise<DeliveryResult> {
    this.calls.push({ destination, message });
    const next = this.script.length > 1 ? this.script.shift() : this.script[0];
    return next ?? { ok: true };
  }
}

export const failure = (reason: string): DeliveryResult => ({ ok: false, reason });
export const success: DeliveryResult = { ok: true };
