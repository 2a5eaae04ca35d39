import type { FastifyInstance } from "fastify";

import { ServiceUnavailableError } from "@/utils/errors";

export interface HealthChecks {
  database: () => Promise<boolean>;
  queue: () => Promise<boolean>;
}

const now = () => new Date().toISOString();

export function buildHealthRoutes(checks: HealthChecks) {
  return async function registerHealthRoutes(app: FastifyInstance) {
    app.get("/health", async () => ({
      status: "ok",
      timestamp: now(),
    }));

    app.get("/health/db", async () => {
      if (!(await checks.database())) {
        throw new ServiceUnavailableError("PostgreSQL is unavailable");
      }

      return {
        status: "ok",
        service: "postgres",
        timestamp: now(),
      };
    });

    app.get("/health/queue", async () => {
      if (!(await checks.queue())) {
        throw new ServiceUnavailableError("Redis queue is unavailable");
      }

      return {
        status: "ok",
        service: "redis",
        timestamp: now(),
      };
    });
  };
}
