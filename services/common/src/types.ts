export interface RequestContext {
  requestId: string;
  trace?: TraceContext;
  admin?: boolean;
}

export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface TraceContext {
  traceId?: string;
  spanId?: string;
  sampled?: boolean;
  raw?: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}
