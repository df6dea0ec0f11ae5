import type { FastifyInstance } from 'fastify';
import { buildServer, createAdminGuard, resetConfigForTesting, resetLoggerForTesting } from '@tr/common';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { PgVectorHealth } from '../pgvector-client';
import { registerRoutes, type HealthProbes } from '../routes';
import { createHarness } from './support/harness';

vi.mock('pgvector/pg', () => ({
  registerType: vi.fn(),
  toSql: vi.fn((value: number[]) => JSON.stringify(value))
}));

const ADMIN_HEADERS = { 'x-api-key': 'test-secret' };

describe('search routes', () => {
  let app: FastifyInstance;
  let harness: ReturnType<typeof createHarness>;
  let state: { isReady: boolean };
  let pgHealth: PgVectorHealth;

  beforeEach(async () => {
    process.env.LOG_LEVEL = 'silent';
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    resetConfigForTesting();
    resetLoggerForTesting();

    harness = createHarness();
    state = { isReady: true };
    pgHealth = { status: 'healthy', totalCandidates: 5, poolSize: 1 };

    const probes: HealthProbes = {
      pgvector: async () => pgHealth,
      cache: () => harness.cache.healthCheck(),
      embeddings: () => ({ status: 'healthy' })
    };

    app = await buildServer({ logger: false, disableDefaultHealthRoute: true });
    await registerRoutes(app, {
      serviceName: 'tr-search-svc',
      service: harness.service,
      probes,
      performanceTracker: harness.performanceTracker,
      adminGuard: createAdminGuard('test-secret'),
      state
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    resetConfigForTesting();
    resetLoggerForTesting();
    delete process.env.LOG_LEVEL;
    delete process.env.ENABLE_REQUEST_LOGGING;
  });

  it('answers liveness checks', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.json()).toEqual({ status: 'ok', service: 'tr-search-svc' });
  });

  it('runs a search and echoes the request id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/search',
      headers: { 'x-request-id': 'req-42' },
      payload: { query: 'go engineer', location: 'Lisbon', topK: 2 }
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.requestId).toBe('req-42');
    expect(body.cached).toBe(false);
    expect(body.results.map((candidate: { id: string }) => candidate.id)).toEqual(['cand-2', 'cand-4']);
    expect(harness.store.queries[0]?.values).toEqual(['Lisbon', '[0.1,0.2]', 8]);
  });

  it('lists candidates when no query or filters are given', async () => {
    const response = await app.inject({ method: 'POST', url: '/v1/search', payload: {} });

    expect(response.statusCode).toBe(200);
    expect(response.json().results).toHaveLength(5);
  });

  it('rejects out-of-range parameters', async () => {
    const topK = await app.inject({ method: 'POST', url: '/v1/search', payload: { topK: 0 } });
    const experience = await app.inject({ method: 'POST', url: '/v1/search', payload: { minExperience: -1 } });

    expect(topK.statusCode).toBe(400);
    expect(topK.json().code).toBe('bad_request');
    expect(experience.statusCode).toBe(400);
  });

  it('refuses searches until the service is ready', async () => {
    state.isReady = false;

    const response = await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go' } });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ code: 'unavailable', message: 'Search service is initializing.' });
  });

  it('requires the admin key for cache invalidation', async () => {
    const missing = await app.inject({ method: 'POST', url: '/v1/cache/invalidate', payload: {} });
    const wrong = await app.inject({
      method: 'POST',
      url: '/v1/cache/invalidate',
      headers: { 'x-api-key': 'wrong-secret' },
      payload: {}
    });

    expect(missing.statusCode).toBe(401);
    expect(wrong.statusCode).toBe(403);
  });

  it('invalidates cached searches', async () => {
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go engineer' } });
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'rust' } });

    const response = await app.inject({ method: 'POST', url: '/v1/cache/invalidate', headers: ADMIN_HEADERS, payload: {} });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', deleted: 2 });
    expect(harness.cacheStore.entries.size).toBe(0);
  });

  it('refuses to invalidate outside the cache namespace', async () => {
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go engineer' } });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/cache/invalidate',
      headers: ADMIN_HEADERS,
      payload: { pattern: '*' }
    });

    expect(response.json()).toEqual({ status: 'ok', deleted: 0 });
    expect(harness.cacheStore.entries.size).toBe(1);
  });

  it('reports cache statistics to admins', async () => {
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go engineer' } });
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go engineer' } });

    const unauthorized = await app.inject({ method: 'GET', url: '/v1/cache/stats' });
    const response = await app.inject({ method: 'GET', url: '/v1/cache/stats', headers: ADMIN_HEADERS });

    expect(unauthorized.statusCode).toBe(401);
    expect(response.json()).toEqual({
      status: 'ok',
      stats: { hits: 1, misses: 1, keyCount: 1, hitRate: 0.5, available: true }
    });
  });

  it('reports readiness with component health and metrics', async () => {
    await app.inject({ method: 'POST', url: '/v1/search', payload: { query: 'go engineer' } });

    const response = await app.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.components.rerank).toEqual({ status: 'disabled' });
    expect(body.metrics.totalCount).toBe(1);
  });

  it('reports not ready while initializing or degraded', async () => {
    state.isReady = false;
    const initializing = await app.inject({ method: 'GET', url: '/ready' });

    state.isReady = true;
    pgHealth = { status: 'unhealthy', totalCandidates: 0, poolSize: 0, message: 'connection refused' };
    const degraded = await app.inject({ method: 'GET', url: '/ready' });

    expect(initializing.statusCode).toBe(503);
    expect(initializing.json()).toEqual({ status: 'initializing', service: 'tr-search-svc' });
    expect(degraded.statusCode).toBe(503);
    expect(degraded.json().degraded).toEqual(['pgvector']);
  });
});
