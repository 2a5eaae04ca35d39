import { beforeEach, describe, expect, it } from "vitest";

import { toNotificationJob } from "@/jobs/notificationJob";
import type { AdapterRegistry } from "@/services/delivery/adapter.types";
import { InAppAdapter } from "@/services/delivery/inApp.adapter";
import { FakeNotificationQueue } from "@/test/fakeNotificationQueue";
import { BASE_TIME, buildNotification, failure, ScriptedAdapter, success, TestClock } from "@/test/fixtures";
import { InMemoryNotificationStore } from "@/test/inMemoryNotificationStore";

import { DeliveryEngine } from "./deliveryEngine";
import { NotificationService } from "./notification.service";
import { RetryScheduler } from "./retryScheduler";

describe("notification delivery pipeline", () => {
  let clock: TestClock;
  let store: InMemoryNotificationStore;
  let queue: FakeNotificationQueue;

  const buildPipeline = (adapters: AdapterRegistry) => ({
    service: new NotificationService(store, queue, { allowRetryFromScheduled: false, now: clock.now }),
    engine: new DeliveryEngine({ store, queue, adapters, deliveryTimeoutMs: 1_000, now: clock.now }),
    scheduler: new RetryScheduler(store, queue, {
      intervalSeconds: 30,
      batchSize: 100,
      claimTtlMs: 300_000,
      now: clock.now,
    }),
  });

  beforeEach(() => {
    clock = new TestClock();
    store = new InMemoryNotificationStore(clock.now);
    queue = new FakeNotificationQueue();
  });

  it("should walk an always-failing email through every backoff step into the dead-letter queue", async () => {
    const email = new ScriptedAdapter("email", [failure("SMTP 550 mailbox unavailable")]);
    const { service, engine, scheduler } = buildPipeline({
      email,
      sms: new ScriptedAdapter("sms", [success]),
      in_app: new InAppAdapter(),
    });

    const created = await service.createNotification({
      userId: "user-1",
      channel: "email",
      message: "Your report is ready",
      destination: "a@b.com",
    });

    const delays: number[] = [];
    await engine.process(queue.lastPublished());

    for (;;) {
      const record = await store.get(created.id);
      if (!record || record.status !== "retry_scheduled" || !record.nextRetryTime) {
        break;
      }

      delays.push(record.nextRetryTime.getTime() - clock.now().getTime());
      clock.set(record.nextRetryTime);
      await scheduler.runOnce();
      await engine.process(queue.lastPublished());
    }

    expect(delays).toEqual([30_000, 120_000, 600_000, 1_800_000]);
    expect(email.calls).toHaveLength(5);
    expect(queue.published).toHaveLength(5);
    expect(await store.get(created.id)).toMatchObject({
      status: "failed_permanently",
      retryCount: 5,
      lastError: "SMTP 550 mailbox unavailable",
      nextRetryTime: null,
    });
    expect(queue.deadLetters).toHaveLength(1);
    expect(queue.deadLetters[0]).toMatchObject({ notificationId: created.id, retryCount: 5 });
  });

  it("should deliver an SMS on its first retry", async () => {
    const sms = new ScriptedAdapter("sms", [failure("carrier timeout"), success]);
    const { service, engine, scheduler } = buildPipeline({
      email: new ScriptedAdapter("email", [success]),
      sms,
      in_app: new InAppAdapter(),
    });

    const created = await service.createNotification({
      userId: "user-2",
      channel: "sms",
      message: "Your code is 1234",
      destination: "+15551234567",
    });

    await engine.process(queue.lastPublished());
    clock.advanceBy(30_000);
    await scheduler.runOnce();
    await engine.process(queue.lastPublished());

    expect(sms.calls).toHaveLength(2);
    expect(await store.get(created.id)).toMatchObject({
      status: "sent",
      retryCount: 1,
      lastError: null,
      nextRetryTime: null,
    });
    expect(queue.deadLetters).toHaveLength(0);
  });

  it("should give a manually retried notification a fresh retry budget", async () => {
    const email = new ScriptedAdapter("email", [failure("x"), failure("x"), failure("x"), failure("x"), failure("x"), success]);
    const { service, engine, scheduler } = buildPipeline({
      email,
      sms: new ScriptedAdapter("sms", [success]),
      in_app: new InAppAdapter(),
    });

    const created = await service.createNotification({
      userId: "user-3",
      channel: "email",
      message: "hello",
      destination: "c@d.com",
    });
    await engine.process(queue.lastPublished());
    for (let attempt = 0; attempt < 4; attempt += 1) {
      const record = await store.get(created.id);
      if (record?.nextRetryTime) {
        clock.set(record.nextRetryTime);
      }
      await scheduler.runOnce();
      await engine.process(queue.lastPublished());
    }
    expect((await store.get(created.id))?.status).toBe("failed_permanently");

    await service.retryNotification(created.id);
    const outcome = await engine.process(queue.lastPublished());

    expect(outcome.kind).toBe("sent");
    expect(await store.get(created.id)).toMatchObject({ status: "sent", retryCount: 0, deadLetteredAt: null });
    expect(queue.deadLetters).toHaveLength(1);
  });

  it("should dead-letter an exhausted notification after the broker gives up on its job", async () => {
    const { engine, scheduler } = buildPipeline({
      email: new ScriptedAdapter("email", [failure("mailbox full")]),
      sms: new ScriptedAdapter("sms", [success]),
      in_app: new InAppAdapter(),
    });
    const notification = await store.insert(
      buildNotification({ status: "retry_scheduled", retryCount: 4, nextRetryTime: BASE_TIME, dispatchedAt: BASE_TIME }),
    );
    const job = toNotificationJob(notification);
    queue.deadLetterFailures = 5;

    for (let attempt = 0; attempt < 5; attempt += 1) {
      await expect(engine.process(job)).rejects.toThrow("dead-letter queue unavailable");
    }
    expect(await store.get(notification.id)).toMatchObject({ status: "failed_permanently", deadLetteredAt: null });

    clock.advanceBy(24 * 60 * 60 * 1000);
    await scheduler.runOnce();

    expect(queue.deadLetters).toHaveLength(1);
    expect(queue.deadLetters[0]).toMatchObject({ notificationId: notification.id, retryCount: 5 });
    expect((await store.get(notification.id))?.deadLetteredAt).not.toBeNull();
    expect(await engine.process(job)).toMatchObject({ kind: "skipped", reason: "already_failed" });
    expect(queue.deadLetters).toHaveLength(1);
  });
});
