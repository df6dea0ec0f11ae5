import type { Logger } from 'pino';
import { getLogger } from '@tr/common';

import type { SearchRuntimeConfig } from './config';
import type { PerformanceTracker } from './performance-tracker';
import { normalizeFilters } from './query-builder';
import type { Reranker } from './reranker';
import type { Retriever } from './retriever';
import type { SearchCache } from './search-cache';
import type {
  CacheStats,
  CandidateRecord,
  SearchContext,
  SearchRequest,
  SearchResponse,
  SearchTimings
} from './types';

export interface Closeable {
  close(): Promise<void>;
}

export interface SearchServiceDependencies {
  config: SearchRuntimeConfig;
  retriever: Retriever;
  cache: SearchCache;
  /** Null when reranking is disabled; query results then keep vector order. */
  reranker?: Reranker | null;
  performanceTracker?: PerformanceTracker;
  /** Extra resources released by `close()`, such as the pg pool. */
  closeables?: Closeable[];
  logger?: Logger;
}

export class SearchService {
  private readonly config: SearchRuntimeConfig;
  private readonly retriever: Retriever;
  private readonly cache: SearchCache;
  private readonly reranker: Reranker | null;
  private readonly performanceTracker?: PerformanceTracker;
  private readonly closeables: Closeable[];
  private readonly logger: Logger;

  constructor(deps: SearchServiceDependencies) {
    this.config = deps.config;
    this.retriever = deps.retriever;
    this.cache = deps.cache;
    this.reranker = deps.reranker ?? null;
    this.performanceTracker = deps.performanceTracker;
    this.closeables = deps.closeables ?? [];
    this.logger = (deps.logger ?? getLogger()).child({ module: 'search-service' });
  }

  resolveTopK(topK?: number): number {
    const requested = typeof topK === 'number' && Number.isFinite(topK) ? Math.floor(topK) : this.config.defaultTopK;
    return Math.min(Math.max(1, requested), this.config.maxResults);
  }

  /**
   * Cache lookup, then on a miss retrieval, reranking when there is a query,
   * and population of the cache with the list actually served.
   */
  async search(request: SearchRequest, context: SearchContext): Promise<SearchResponse> {
    const totalStart = Date.now();
    const query = request.query?.trim() || undefined;
    const filters = normalizeFilters(request.filters);
    const topK = this.resolveTopK(request.topK);
    const timings: SearchTimings = { totalMs: 0 };
    const degraded: string[] = [];
    const log = this.logger.child({ requestId: context.requestId });

    const cacheStart = Date.now();
    const lookup = await this.cache.get(query, filters);
    timings.cacheMs = Date.now() - cacheStart;

    if (lookup.status === 'hit') {
      log.info({ results: lookup.results.length }, 'Search cache hit.');
      // Keys ignore topK, so a cached list may be longer than this request allows.
      return this.finish(context, lookup.results.slice(0, topK), true, timings, degraded, totalStart);
    }

    if (lookup.reason === 'unavailable' || lookup.reason === 'corrupt') {
      degraded.push(`cache_${lookup.reason}`);
    }
    log.debug({ reason: lookup.reason }, 'Search cache miss.');

    const retrieval = await this.retriever.retrieve(query, filters, topK, { signal: context.signal });
    timings.embeddingMs = retrieval.timings.embeddingMs;
    timings.retrievalMs = retrieval.timings.storeMs;

    if (retrieval.status === 'empty') {
      if (retrieval.reason !== 'no_rows') {
        degraded.push(retrieval.reason);
      }
      return this.finish(context, [], false, timings, degraded, totalStart);
    }

    let results: CandidateRecord[];
    if (query && this.reranker) {
      const rerankStart = Date.now();
      const outcome = await this.reranker.rerank(query, retrieval.candidates, topK, { signal: context.signal });
      timings.rerankMs = Date.now() - rerankStart;
      if (outcome.status === 'fallback') {
        degraded.push(`rerank_${outcome.reason}`);
      }
      results = outcome.candidates;
    } else {
      results = retrieval.candidates.slice(0, topK);
    }

    if (context.signal?.aborted) {
      log.info('Search aborted by the caller; skipping cache population.');
      return this.finish(context, results, false, timings, degraded, totalStart);
    }

    // Empty lists are never cached.
    if (results.length > 0) {
      await this.cache.set(query, filters, results);
    }

    return this.finish(context, results, false, timings, degraded, totalStart);
  }

  async invalidateCache(pattern?: string): Promise<{ deleted: number }> {
    const deleted = await this.cache.invalidate(pattern);
    return { deleted };
  }

  cacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  async close(): Promise<void> {
    await Promise.all([this.cache.close(), ...this.closeables.map((resource) => resource.close())]);
  }

  private finish(
    context: SearchContext,
    results: CandidateRecord[],
    cached: boolean,
    timings: SearchTimings,
    degraded: string[],
    totalStart: number
  ): SearchResponse {
    timings.totalMs = Date.now() - totalStart;

    this.performanceTracker?.record({
      totalMs: timings.totalMs,
      embeddingMs: timings.embeddingMs,
      retrievalMs: timings.retrievalMs,
      rerankMs: timings.rerankMs,
      cacheHit: cached,
      degraded: degraded.length > 0
    });

    this.logger.info(
      { requestId: context.requestId, results: results.length, cached, degraded, timings },
      'Search completed.'
    );

    return {
      results,
      cached,
      requestId: context.requestId,
      timings,
      degraded
    };
  }
}
