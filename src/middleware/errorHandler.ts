import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";

import { formatError, HTTP_STATUS, type ApiErrorResponse } from "@/utils/errors";
import { logger } from "@/utils/logger";

// Fastify's own errors (unparseable body, oversized payload) carry a 4xx status code.
function formatFrameworkError(error: FastifyError, requestId: string): ApiErrorResponse | null {
  const { statusCode } = error;
  if (statusCode === undefined || statusCode < 400 || statusCode >= 500) {
    return null;
  }

  return {
    error: {
      message: error.message,
      code: "VALIDATION_ERROR",
      statusCode: statusCode === HTTP_STATUS.UNPROCESSABLE_ENTITY ? statusCode : HTTP_STATUS.BAD_REQUEST,
      requestId,
    },
  };
}

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  const formatted = formatError(error, request.id);
  const response =
    formatted.error.code === "INTERNAL_SERVER_ERROR" ? formatFrameworkError(error, request.id) ?? formatted : formatted;
  const statusCode = response.error.statusCode;

  if (statusCode >= 500) {
    logger.error("Unhandled server error", {
      error,
      requestId: request.id,
      method: request.method,
      url: request.url,
    });
  } else {
    logger.warn("Request failed", {
      error: response.error,
      requestId: request.id,
      method: request.method,
      url: request.url,
    });
  }

  if (!reply.sent) {
    void reply.status(statusCode).send(response);
  }
}
