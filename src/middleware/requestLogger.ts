import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { config } from "@/config/config";
import type { RequestContext } from "@/types/request";
import { logger } from "@/utils/logger";

const HEALTH_PATH_PREFIX = "/api/health";

const getDurationMs = (start: bigint) => Math.round((Number(process.hrtime.bigint() - start) / 1_000_000) * 100) / 100;

function completionLevel(context: RequestContext | undefined, statusCode: number) {
  if (statusCode >= 500) {
    return "error";
  }
  if (statusCode >= 400) {
    return "warn";
  }
  return context?.probe ? "debug" : "info";
}

function notificationIdOf(request: FastifyRequest): string | undefined {
  const { params } = request;
  if (typeof params === "object" && params !== null && "id" in params && typeof params.id === "string") {
    return params.id;
  }
  return undefined;
}

export function registerRequestLogger(app: FastifyInstance) {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const context: RequestContext = {
      startTime: process.hrtime.bigint(),
      probe: request.url.startsWith(HEALTH_PATH_PREFIX),
    };
    request.requestContext = context;
    reply.header(config.server.requestIdHeader, request.id);

    logger.log(context.probe ? "debug" : "info", "Incoming request", {
      requestId: request.id,
      method: request.method,
      url: request.url,
      ip: request.ip,
    });
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const context = request.requestContext;

    logger.log(completionLevel(context, reply.statusCode), "Request completed", {
      requestId: request.id,
      method: request.method,
      url: request.url,
      notificationId: notificationIdOf(request),
      statusCode: reply.statusCode,
      durationMs: context ? getDurationMs(context.startTime) : 0,
    });
  });
}
