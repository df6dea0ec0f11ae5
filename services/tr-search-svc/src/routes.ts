import type { FastifyInstance, FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { serviceUnavailableError } from '@tr/common';

import type { EmbedHealthStatus } from './embed-client';
import type { RerankHealthStatus } from './cross-encoder-client';
import type { PerformanceTracker } from './performance-tracker';
import type { PgVectorHealth } from './pgvector-client';
import { cacheStatsSchema, invalidateCacheSchema, searchSchema } from './schemas';
import type { SearchService } from './search-service';
import type { CacheHealthStatus, FilterSet, InvalidateCacheRequest, SearchHttpRequest } from './types';

export interface HealthProbes {
  pgvector(): Promise<PgVectorHealth>;
  cache(): Promise<CacheHealthStatus>;
  embeddings(): EmbedHealthStatus;
  rerank?(): Promise<RerankHealthStatus>;
}

export interface RegisterRoutesOptions {
  serviceName: string;
  service: SearchService;
  probes: HealthProbes;
  performanceTracker: PerformanceTracker;
  adminGuard: preHandlerAsyncHookHandler;
  state: { isReady: boolean };
}

function toFilterSet(body: SearchHttpRequest): FilterSet {
  const filters: FilterSet = {};
  if (body.location !== undefined) {
    filters.location = body.location;
  }
  if (body.minExperience !== undefined) {
    filters.minExperience = body.minExperience;
  }
  return filters;
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const { service, probes, state } = dependencies;

  app.get('/health', async () => ({
    status: 'ok',
    service: dependencies.serviceName
  }));

  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!state.isReady) {
      reply.status(503);
      return { status: 'initializing', service: dependencies.serviceName };
    }

    const [pgHealth, cacheHealth, rerankHealth] = await Promise.all([
      probes.pgvector(),
      probes.cache(),
      probes.rerank ? probes.rerank() : Promise.resolve(undefined)
    ]);
    const embedHealth = probes.embeddings();

    const degraded: string[] = [];
    if (pgHealth.status !== 'healthy') {
      degraded.push('pgvector');
    }
    if (cacheHealth.status !== 'healthy' && cacheHealth.status !== 'disabled') {
      degraded.push('redis');
    }
    if (embedHealth.status !== 'healthy') {
      degraded.push('embeddings');
    }
    if (rerankHealth && rerankHealth.status !== 'healthy' && rerankHealth.status !== 'disabled') {
      degraded.push('rerank');
    }

    const components = {
      pgvector: pgHealth,
      redis: cacheHealth,
      embeddings: embedHealth,
      rerank: rerankHealth ?? { status: 'disabled' }
    };

    if (degraded.length > 0) {
      reply.status(503);
      return { status: 'degraded', degraded, components };
    }

    return {
      status: 'ok',
      components,
      metrics: dependencies.performanceTracker.getSnapshot()
    } satisfies Record<string, unknown>;
  });

  app.post<{ Body: SearchHttpRequest | undefined }>(
    '/v1/search',
    { schema: searchSchema },
    async (request, reply) => {
      if (!state.isReady) {
        throw serviceUnavailableError('Search service is initializing.');
      }

      const body: SearchHttpRequest = request.body ?? {};

      // A client that disconnects mid-search aborts the in-flight work.
      const controller = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableFinished) {
          controller.abort();
        }
      };
      reply.raw.on('close', onClose);

      try {
        return await service.search(
          { query: body.query, filters: toFilterSet(body), topK: body.topK },
          { requestId: request.requestContext.requestId, signal: controller.signal }
        );
      } finally {
        reply.raw.off('close', onClose);
      }
    }
  );

  app.post<{ Body: InvalidateCacheRequest | undefined }>(
    '/v1/cache/invalidate',
    { schema: invalidateCacheSchema, preHandler: dependencies.adminGuard },
    async (request) => {
      const { deleted } = await service.invalidateCache(request.body?.pattern);
      return { status: 'ok', deleted };
    }
  );

  app.get('/v1/cache/stats', { schema: cacheStatsSchema, preHandler: dependencies.adminGuard }, async () => {
    const stats = await service.cacheStats();
    return { status: 'ok', stats };
  });
}
