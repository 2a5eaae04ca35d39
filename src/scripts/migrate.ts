import { readFile } from "node:fs/promises";

import { closeDatabasePool, getDatabasePool } from "@/database/connection";
import { logger } from "@/utils/logger";

const SCHEMA_PATH = new URL("../database/schema.sql", import.meta.url);

async function migrate() {
  const schema = await readFile(SCHEMA_PATH, "utf8");
  const pool = getDatabasePool();

  try {
    await pool.query(schema);
    logger.info("Database schema applied", { schema: SCHEMA_PATH.pathname });
  } finally {
    await closeDatabasePool();
  }
}

migrate().catch((error: unknown) => {
  logger.error("Migration failed", { error });
  process.exit(1);
});
