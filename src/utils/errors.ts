import { ZodError } from "zod";

export const HTTP_STATUS = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "CONCURRENT_UPDATE"
  | "MALFORMED_MESSAGE"
  | "ADAPTER_CONFIGURATION"
  | "SERVICE_UNAVAILABLE"
  | "INTERNAL_SERVER_ERROR";

interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options?: AppErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    this.code = options?.code ?? "INTERNAL_SERVER_ERROR";
    this.details = options?.details;
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation error", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY, code: "VALIDATION_ERROR", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.NOT_FOUND, code: "NOT_FOUND", details });
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message = "Illegal status transition", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.CONFLICT, code: "INVALID_TRANSITION", details });
  }
}

export class ConcurrentUpdateError extends AppError {
  constructor(message = "Record was modified concurrently", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.CONFLICT, code: "CONCURRENT_UPDATE", details });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "SERVICE_UNAVAILABLE", details });
  }
}

/** Queue payload that can never be processed, however often it is redelivered. */
export class MalformedMessageError extends AppError {
  constructor(message = "Malformed queue message", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.BAD_REQUEST, code: "MALFORMED_MESSAGE", details });
  }
}

export class AdapterConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { code: "ADAPTER_CONFIGURATION", details });
  }
}

export interface ApiErrorResponse {
  error: {
    message: string;
    code: ErrorCode;
    statusCode: number;
    details?: unknown;
    requestId?: string;
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}

export function formatError(error: unknown, requestId?: string): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        details: error.details,
        requestId,
      },
    };
  }

  if (error instanceof ZodError) {
    const details = error.flatten();
    return {
      error: {
        message: "Validation error",
        code: "VALIDATION_ERROR",
        statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY,
        details,
        requestId,
      },
    };
  }

  const fallbackMessage = error instanceof Error ? error.message : "Internal Server Error";

  return {
    error: {
      message: fallbackMessage || "Internal Server Error",
      code: "INTERNAL_SERVER_ERROR",
      statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      requestId,
    },
  };
}
