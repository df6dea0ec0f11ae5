import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resetConfigForTesting } from '../config';
import { badRequestError } from '../errors';
import { parseTraceContext, resetLoggerForTesting } from '../logger';
import { buildServer } from '../server';

describe('health endpoints', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    process.env.SERVICE_NAME = 'common-test';
    process.env.LOG_LEVEL = 'silent';
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    resetConfigForTesting();
    resetLoggerForTesting();

    server = await buildServer({ logger: false });
  });

  afterEach(async () => {
    await server.close();
    resetConfigForTesting();
    resetLoggerForTesting();

    delete process.env.SERVICE_NAME;
    delete process.env.LOG_LEVEL;
    delete process.env.ENABLE_REQUEST_LOGGING;
  });

  it('responds to /health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', service: 'common-test' });
  });

  it('echoes an incoming request id', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'req-123' }
    });

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('generates a request id when none is sent', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('echoes the trace header', async () => {
    const traceparent = '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01';
    const response = await server.inject({ method: 'GET', url: '/health', headers: { traceparent } });

    expect(response.headers.traceparent).toBe(traceparent);
  });
});

describe('error handler', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    process.env.LOG_LEVEL = 'silent';
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    resetConfigForTesting();
    resetLoggerForTesting();

    server = await buildServer({ logger: false, disableDefaultHealthRoute: true });
    server.get('/bad', async () => {
      throw badRequestError('Filter is invalid.', { field: 'location' });
    });
    server.get('/boom', async () => {
      throw new Error('database password leaked here');
    });
    server.post(
      '/validated',
      {
        schema: {
          body: {
            type: 'object',
            required: ['name'],
            properties: { name: { type: 'string' } }
          }
        }
      },
      async () => ({ ok: true })
    );
  });

  afterEach(async () => {
    await server.close();
    resetConfigForTesting();
    resetLoggerForTesting();
    delete process.env.LOG_LEVEL;
    delete process.env.ENABLE_REQUEST_LOGGING;
  });

  it('returns service errors with their status and code', async () => {
    const response = await server.inject({ method: 'GET', url: '/bad' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'bad_request',
      message: 'Filter is invalid.',
      details: { field: 'location' }
    });
  });

  it('hides the message of unexpected errors', async () => {
    const response = await server.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ code: 'internal', message: 'An unexpected error occurred.' });
  });

  it('maps schema validation failures to bad_request', async () => {
    const response = await server.inject({ method: 'POST', url: '/validated', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('bad_request');
  });
});

describe('parseTraceContext', () => {
  it('reads ids and the sampled flag from a traceparent header', () => {
    expect(parseTraceContext('00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01')).toEqual({
      traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
      spanId: '00f067aa0ba902b7',
      sampled: true,
      raw: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01'
    });
  });

  it('keeps only the raw value when the header is malformed', () => {
    expect(parseTraceContext('garbage')).toEqual({ raw: 'garbage' });
  });

  it('returns undefined without a header', () => {
    expect(parseTraceContext(undefined)).toBeUndefined();
  });
});
