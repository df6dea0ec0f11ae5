import { getLogger } from '@tr/common';

import type { SearchServiceConfig } from './config';
import { CrossEncoderClient } from './cross-encoder-client';
import { EmbeddingClient } from './embed-client';
import { PerformanceTracker } from './performance-tracker';
import { PgVectorClient } from './pgvector-client';
import { SearchRedisClient } from './redis-client';
import { Reranker } from './reranker';
import { Retriever } from './retriever';
import type { HealthProbes } from './routes';
import { SearchCache } from './search-cache';
import { SearchService } from './search-service';

export interface SearchComponentOverrides {
  enableRerank?: boolean;
  disableCache?: boolean;
}

export interface SearchComponents {
  service: SearchService;
  pgClient: PgVectorClient;
  performanceTracker: PerformanceTracker;
  probes: HealthProbes;
}

/** Builds every pipeline dependency explicitly and hands them to the service. */
export function createSearchComponents(
  config: SearchServiceConfig,
  overrides: SearchComponentOverrides = {}
): SearchComponents {
  const enableRerank = overrides.enableRerank ?? config.rerank.enabled;
  const disableCache = overrides.disableCache ?? config.redis.disable;

  const pgClient = new PgVectorClient(config.pgvector, getLogger({ module: 'pgvector-client' }));
  const redisClient = new SearchRedisClient(
    { ...config.redis, disable: disableCache },
    getLogger({ module: 'redis-client' })
  );
  const embedClient = new EmbeddingClient(config.embed, getLogger({ module: 'embed-client' }));
  const rerankClient = enableRerank
    ? new CrossEncoderClient({ ...config.rerank, enabled: true }, getLogger({ module: 'cross-encoder-client' }))
    : null;

  const cache = new SearchCache({
    store: redisClient,
    namespace: config.redis.keyPrefix,
    ttlSeconds: config.redis.ttlSeconds,
    disabled: disableCache
  });
  const retriever = new Retriever({
    embeddings: embedClient,
    store: pgClient,
    table: pgClient.candidatesTable,
    overfetchFactor: config.search.overfetchFactor
  });
  const reranker = rerankClient
    ? new Reranker({ model: rerankClient, minSegmentLength: config.rerank.minSegmentLength })
    : null;
  const performanceTracker = new PerformanceTracker();

  const service = new SearchService({
    config: config.search,
    retriever,
    cache,
    reranker,
    performanceTracker,
    closeables: [pgClient]
  });

  return {
    service,
    pgClient,
    performanceTracker,
    probes: {
      pgvector: () => pgClient.healthCheck(),
      cache: () => cache.healthCheck(),
      embeddings: () => embedClient.healthCheck(),
      rerank: rerankClient ? () => rerankClient.healthCheck() : undefined
    }
  };
}
