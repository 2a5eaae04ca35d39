import { createServer } from "./server";

import { config } from "@/config/config";
import { checkDatabaseHealth, createSqlClient } from "@/database/connection";
import { BullNotificationQueue } from "@/queue/notificationQueue";
import { checkQueueHealth } from "@/queue/queueManager";
import { createAdapterRegistry } from "@/services/delivery/adapterRegistry";
import { DeliveryEngine } from "@/services/notification/deliveryEngine";
import { PgNotificationStore } from "@/services/notification/notification.repository";
import { NotificationService } from "@/services/notification/notification.service";
import { RetryScheduler } from "@/services/notification/retryScheduler";
import { connectDatastores, disconnectDatastores } from "@/utils/clients";
import { logger } from "@/utils/logger";
import { startWorkers, stopWorkers } from "@/workers";

async function start() {
  let scheduler: RetryScheduler | null = null;

  try {
    // Misconfigured transports abort startup before anything connects.
    const adapters = createAdapterRegistry(config);

    await connectDatastores();

    const store = new PgNotificationStore(createSqlClient());
    const queue = new BullNotificationQueue();

    const engine = new DeliveryEngine({
      store,
      queue,
      adapters,
      deliveryTimeoutMs: config.delivery.timeoutMs,
    });
    await startWorkers(engine, config.queue.workerConcurrency);

    const activeScheduler = new RetryScheduler(store, queue, config.scheduler);
    activeScheduler.start();
    scheduler = activeScheduler;

    const notificationService = new NotificationService(store, queue, {
      allowRetryFromScheduled: config.delivery.allowRetryFromScheduled,
    });

    const server = await createServer({
      notificationService,
      healthChecks: {
        database: checkDatabaseHealth,
        queue: checkQueueHealth,
      },
    });

    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Notification service listening on http://${config.server.host}:${config.server.port}`);

    const shutdown = async (signal?: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        await server.close();
        activeScheduler.stop();
        await stopWorkers();
        await disconnectDatastores();
        logger.info("Cleanup complete, exiting process");
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down", { error });
        process.exit(1);
      }
    };

    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
  } catch (error) {
    logger.error("Failed to start notification service", { error });
    if (scheduler?.isRunning()) {
      scheduler.stop();
    }
    await stopWorkers().catch((workerError: unknown) => {
      logger.error("Failed to stop workers after startup failure", { workerError });
    });
    await disconnectDatastores().catch((disconnectError: unknown) => {
      logger.error("Failed to clean up resources after startup failure", { disconnectError });
    });
    process.exit(1);
  }
}

void start();
