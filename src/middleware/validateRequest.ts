import type { FastifyRequest } from "fastify";
import type { ZodTypeAny } from "zod";

import { ValidationError } from "@/utils/errors";

export type RequestSchema = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

const LOCATIONS = ["params", "query", "body"] as const;

/**
 * Replaces each validated part of the request with its parsed value, so
 * handlers see trimmed strings and applied defaults.
 */
export function validateRequest(schema: RequestSchema) {
  return async (request: FastifyRequest) => {
    for (const location of LOCATIONS) {
      const locationSchema = schema[location];
      if (!locationSchema) {
        continue;
      }

      const result = locationSchema.safeParse(request[location]);
      if (!result.success) {
        throw new ValidationError(`Invalid request ${location}`, { location, ...result.error.flatten() });
      }

      request[location] = result.data;
    }
  };
}
