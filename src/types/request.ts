export interface RequestContext {
  startTime: bigint;
  /** Health probes are logged at debug level. */
  probe: boolean;
}

declare module "fastify" {
  interface FastifyRequest {
    requestContext?: RequestContext;
  }
}
