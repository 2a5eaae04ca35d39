import { closeDatabasePool, initializeDatabase } from "@/database/connection";
import { closeQueues, initializeQueues } from "@/queue/queueManager";

export async function connectDatastores() {
  await initializeDatabase();
  await initializeQueues();
}

export async function disconnectDatastores() {
  await closeQueues();
  await closeDatabasePool();
}
