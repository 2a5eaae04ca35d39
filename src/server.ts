import { randomUUID } from "node:crypto";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";

import { config } from "@/config/config";
import { errorHandler } from "@/middleware/errorHandler";
import { registerRequestLogger } from "@/middleware/requestLogger";
import { buildHealthRoutes, type HealthChecks } from "@/routes/health";
import { buildNotificationRoutes } from "@/routes/notifications";
import type { NotificationService } from "@/services/notification/notification.service";

export interface ServerDependencies {
  notificationService: NotificationService;
  healthChecks: HealthChecks;
}

function getRequestId(headers: Record<string, string | string[] | undefined>) {
  const headerValue = headers[config.server.requestIdHeader];
  if (typeof headerValue === "string" && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return randomUUID();
}

export async function createServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: config.server.bodyLimit,
    requestIdHeader: config.server.requestIdHeader,
    genReqId: (request) => getRequestId(request.headers),
  });

  await app.register(cors, {
    origin: config.server.corsOrigins,
  });

  await app.register(helmet);

  registerRequestLogger(app);
  app.setErrorHandler(errorHandler);

  await app.register(buildHealthRoutes(deps.healthChecks), { prefix: "/api" });
  await app.register(buildNotificationRoutes(deps.notificationService), { prefix: "/api/v1" });

  return app;
}
