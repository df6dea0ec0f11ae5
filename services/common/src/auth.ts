import { createHash, timingSafeEqual } from 'crypto';

import type { FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';

import { getConfig } from './config';
import { forbiddenError, unauthorizedError } from './errors';
import { getLogger } from './logger';

export const ADMIN_KEY_HEADER = 'x-api-key';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Compares two secrets in constant time. Both sides are hashed first so the
 * comparison does not leak the configured key's length.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

function readAdminKey(request: FastifyRequest): string | undefined {
  const header = request.headers[ADMIN_KEY_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createAdminGuard(expectedKey: string | undefined = getConfig().admin.apiKey): preHandlerAsyncHookHandler {
  const logger = getLogger({ module: 'admin-guard' });

  if (!expectedKey) {
    logger.warn('ADMIN_API_KEY is not configured; admin endpoints will reject every request.');
  }

  return async (request) => {
    const provided = readAdminKey(request);

    if (!provided) {
      throw unauthorizedError('Missing admin API key.');
    }

    if (!expectedKey || !secretsMatch(provided, expectedKey)) {
      logger.warn({ requestId: request.requestContext?.requestId, path: request.url }, 'Rejected admin request.');
      throw forbiddenError('Invalid or missing API key.');
    }

    request.requestContext = { ...request.requestContext, admin: true };
  };
}
