import { beforeEach, describe, expect, it } from "vitest";

import { FakeNotificationQueue } from "@/test/fakeNotificationQueue";
import { BASE_TIME, buildNotification, NOTIFICATION_ID, TestClock } from "@/test/fixtures";
import { InMemoryNotificationStore } from "@/test/inMemoryNotificationStore";
import {
  ConcurrentUpdateError,
  InvalidTransitionError,
  NotFoundError,
  ServiceUnavailableError,
  ValidationError,
} from "@/utils/errors";

import { NotificationService } from "./notification.service";

describe("NotificationService", () => {
  let clock: TestClock;
  let store: InMemoryNotificationStore;
  let queue: FakeNotificationQueue;

  const buildService = (allowRetryFromScheduled = false) =>
    new NotificationService(store, queue, {
      allowRetryFromScheduled,
      now: clock.now,
      generateId: () => NOTIFICATION_ID,
    });

  beforeEach(() => {
    clock = new TestClock();
    store = new InMemoryNotificationStore(clock.now);
    queue = new FakeNotificationQueue();
  });

  describe("createNotification", () => {
    it("should persist a pending notification and queue its first attempt", async () => {
      const created = await buildService().createNotification({
        userId: " user-1 ",
        channel: "email",
        message: "Welcome aboard",
        destination: "new.user@example.com",
      });

      expect(created).toMatchObject({
        id: NOTIFICATION_ID,
        userId: "user-1",
        status: "pending",
        retryCount: 0,
        destination: "new.user@example.com",
        dispatchedAt: BASE_TIME,
      });
      expect(queue.published).toEqual([
        {
          job: {
            notificationId: NOTIFICATION_ID,
            userId: "user-1",
            channel: "email",
            message: "Welcome aboard",
            destination: "new.user@example.com",
            retryCount: 0,
          },
          dedupeKey: `${NOTIFICATION_ID}-0-${BASE_TIME.getTime()}`,
        },
      ]);
    });

    it("should drop the destination of in-app notifications", async () => {
      const created = await buildService().createNotification({
        userId: "user-1",
        channel: "in_app",
        message: "You have a new follower",
        destination: "ignored@example.com",
      });

      expect(created.destination).toBeNull();
    });

    it("should reject invalid destinations before persisting anything", async () => {
      const service = buildService();

      await expect(
        service.createNotification({ userId: "user-1", channel: "email", message: "hi", destination: "not-an-email" }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        service.createNotification({ userId: "user-1", channel: "sms", message: "hi", destination: "5551234" }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        service.createNotification({ userId: "user-1", channel: "in_app", message: "   " }),
      ).rejects.toBeInstanceOf(ValidationError);

      expect(store.all()).toHaveLength(0);
      expect(queue.published).toHaveLength(0);
    });

    it("should release the dispatch claim when the queue is unavailable", async () => {
      queue.publishFailures = 1;

      await expect(
        buildService().createNotification({ userId: "user-1", channel: "in_app", message: "hi" }),
      ).rejects.toBeInstanceOf(ServiceUnavailableError);

      expect(await store.get(NOTIFICATION_ID)).toMatchObject({ status: "pending", dispatchedAt: null });
    });
  });

  describe("getNotification", () => {
    it("should throw NotFoundError for unknown ids", async () => {
      await expect(buildService().getNotification(NOTIFICATION_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("retryNotification", () => {
    it("should reset a permanently failed notification and queue it", async () => {
      await store.insert(
        buildNotification({
          status: "failed_permanently",
          retryCount: 5,
          lastError: "mailbox full",
          deadLetteredAt: BASE_TIME,
        }),
      );
      clock.advanceBy(60_000);

      const updated = await buildService().retryNotification(NOTIFICATION_ID);

      const retriedAt = new Date(BASE_TIME.getTime() + 60_000);
      expect(updated).toMatchObject({
        status: "pending",
        retryCount: 0,
        nextRetryTime: null,
        deadLetteredAt: null,
        dispatchedAt: retriedAt,
        lastError: "mailbox full",
      });
      expect(queue.published).toHaveLength(1);
      expect(queue.published[0].dedupeKey).toBe(`${NOTIFICATION_ID}-0-${retriedAt.getTime()}`);
    });

    it("should refuse scheduled retries unless configured to allow them", async () => {
      await store.insert(buildNotification({ status: "retry_scheduled", retryCount: 2, nextRetryTime: BASE_TIME }));

      await expect(buildService().retryNotification(NOTIFICATION_ID)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect((await buildService(true).retryNotification(NOTIFICATION_ID)).status).toBe("pending");
    });

    it("should refuse sent notifications", async () => {
      await store.insert(buildNotification({ status: "sent" }));

      await expect(buildService().retryNotification(NOTIFICATION_ID)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(queue.published).toHaveLength(0);
    });

    it("should report a concurrent change instead of overwriting it", async () => {
      await store.insert(buildNotification({ status: "failed_permanently", retryCount: 5 }));
      const service = buildService();
      const original = store.get.bind(store);
      store.get = async (id: string) => {
        const snapshot = await original(id);
        await store.updateFields(id, { status: "pending", retryCount: 0 });
        return snapshot;
      };

      await expect(service.retryNotification(NOTIFICATION_ID)).rejects.toBeInstanceOf(ConcurrentUpdateError);
      expect(queue.published).toHaveLength(0);
    });

    it("should throw NotFoundError for unknown ids", async () => {
      await expect(buildService().retryNotification(NOTIFICATION_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("getStats", () => {
    it("should count notifications per status", async () => {
      await store.insert(buildNotification({ id: "6a1d9f0e-2b3c-4d5e-8f70-8192a3b4c5d6", status: "sent" }));
      await store.insert(buildNotification({ id: "7b2e0a1f-3c4d-4e5f-9a81-92a3b4c5d6e7", status: "sent" }));
      await store.insert(buildNotification({ id: "8c3f1b20-4d5e-4f60-8b92-a3b4c5d6e7f8", status: "pending" }));

      expect(await buildService().getStats()).toEqual({
        statuses: { pending: 1, sent: 2, retry_scheduled: 0, failed_permanently: 0 },
        total: 3,
      });
    });
  });

  describe("listUserNotifications", () => {
    it("should filter by channel", async () => {
      await store.insert(buildNotification({ id: "6a1d9f0e-2b3c-4d5e-8f70-8192a3b4c5d6", channel: "email" }));
      await store.insert(
        buildNotification({ id: "7b2e0a1f-3c4d-4e5f-9a81-92a3b4c5d6e7", channel: "sms", destination: "+15551234567" }),
      );

      const results = await buildService().listUserNotifications("user-1", { channel: "sms" });

      expect(results.map((notification) => notification.id)).toEqual(["7b2e0a1f-3c4d-4e5f-9a81-92a3b4c5d6e7"]);
    });
  });
});
