import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger';
import type { ErrorResponse } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');
export const unauthorizedError = errorFactory(401, 'unauthorized');
export const forbiddenError = errorFactory(403, 'forbidden');
export const notFoundError = errorFactory(404, 'not_found');
export const serviceUnavailableError = errorFactory(503, 'unavailable');
export const internalError = errorFactory(500, 'internal');

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

interface FastifyValidationLike {
  validation: unknown[];
  message: string;
}

function isValidationError(err: unknown): err is FastifyValidationLike {
  return (
    typeof err === 'object' &&
    err !== null &&
    'validation' in err &&
    Array.isArray(err.validation) &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        details: err.details
      }
    };
  }

  if (isValidationError(err)) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: err.message
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        code: 'internal',
        message: 'An unexpected error occurred.'
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: 'Unknown error.'
    }
  };
}

function shouldLogError(statusCode: number): boolean {
  return statusCode >= 500;
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (shouldLogError(sanitized.statusCode)) {
      logger.error({ err, requestId }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      await reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});

export interface CircuitBreakerOptions {
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
}

export type CircuitBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitOpenError extends ServiceError {
  constructor(name: string) {
    super(`Circuit breaker for ${name} is open.`, { statusCode: 503, code: 'circuit_open', details: { dependency: name } });
    this.name = 'CircuitOpenError';
  }
}

/**
 * Fails fast once a dependency has failed `failureThreshold` times in a row,
 * then lets calls through again after `timeoutMs`. It never retries a call.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private nextAttempt = Date.now();

  constructor(private readonly name: string, private readonly options: CircuitBreakerOptions) {}

  getState(): CircuitBreakerState {
    return this.state;
  }

  /**
   * Runs `action` through the breaker. Errors for which `isFailure` returns
   * false are rethrown without counting against the dependency.
   */
  public async exec<T>(action: () => Promise<T>, isFailure: (error: unknown) => boolean = () => true): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() >= this.nextAttempt) {
        this.state = 'HALF_OPEN';
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await action();
      this.onSuccess();
      return result;
    } catch (error) {
      if (isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount += 1;
      if (this.successCount >= this.options.successThreshold) {
        this.reset();
      }
    } else {
      this.reset();
    }
  }

  private onFailure(): void {
    this.failureCount += 1;

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.options.failureThreshold) {
      this.trip();
    }
  }

  private reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.state = 'CLOSED';
  }

  private trip(): void {
    this.state = 'OPEN';
    this.successCount = 0;
    this.nextAttempt = Date.now() + this.options.timeoutMs;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
}
