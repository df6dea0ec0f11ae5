import type { Logger } from 'pino';
import { describeError, getLogger } from '@tr/common';

import { decodeCandidateRow } from './candidate-decoder';
import { buildCandidateQuery } from './query-builder';
import type {
  CallOptions,
  CandidateRow,
  CandidateStore,
  EmbeddingProvider,
  EmbeddingVector,
  FilterSet,
  RetrievalOutcome,
  RetrievalTimings
} from './types';

export const DEFAULT_OVERFETCH_FACTOR = 4;

export interface RetrieverDependencies {
  embeddings: EmbeddingProvider;
  store: CandidateStore;
  table: string;
  overfetchFactor?: number;
  logger?: Logger;
}

export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly store: CandidateStore;
  private readonly table: string;
  private readonly overfetchFactor: number;
  private readonly logger: Logger;

  constructor(deps: RetrieverDependencies) {
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.table = deps.table;
    this.overfetchFactor = Math.max(1, Math.floor(deps.overfetchFactor ?? DEFAULT_OVERFETCH_FACTOR));
    this.logger = (deps.logger ?? getLogger()).child({ module: 'retriever' });
  }

  /**
   * Fetches candidates for a query and filter set. With a query the store is
   * asked for `topK * overfetchFactor` rows so reranking has a pool to pick
   * from; without one exactly `topK` rows come back, newest first.
   */
  async retrieve(
    query: string | null | undefined,
    filters: FilterSet,
    topK: number,
    options: CallOptions = {}
  ): Promise<RetrievalOutcome> {
    const trimmedQuery = query?.trim() ?? '';
    const baseLimit = Math.max(1, Math.floor(topK));
    const requestedLimit = trimmedQuery ? baseLimit * this.overfetchFactor : baseLimit;
    const timings: RetrievalTimings = {};

    let queryVector: EmbeddingVector | null = null;
    if (trimmedQuery) {
      const embeddingStart = Date.now();
      try {
        const [vector] = await this.embeddings.embedBatch([trimmedQuery], options);
        if (!vector || vector.length === 0) {
          throw new Error('Embedding provider returned no vector.');
        }
        queryVector = vector;
      } catch (error) {
        timings.embeddingMs = Date.now() - embeddingStart;
        if (options.signal?.aborted) {
          return { status: 'empty', reason: 'aborted', requestedLimit, timings };
        }
        this.logger.error({ error: describeError(error) }, 'Embedding generation failed; returning no candidates.');
        return { status: 'empty', reason: 'embedding_unavailable', requestedLimit, timings };
      }
      timings.embeddingMs = Date.now() - embeddingStart;
    }

    const sql = buildCandidateQuery({ filters, queryVector, limit: requestedLimit, table: this.table });

    const storeStart = Date.now();
    let rows: CandidateRow[];
    try {
      rows = await this.store.queryCandidates(sql, options);
    } catch (error) {
      timings.storeMs = Date.now() - storeStart;
      if (options.signal?.aborted) {
        return { status: 'empty', reason: 'aborted', requestedLimit, timings };
      }
      this.logger.error({ error: describeError(error) }, 'Candidate store query failed; returning no candidates.');
      return { status: 'empty', reason: 'store_unavailable', requestedLimit, timings };
    }
    timings.storeMs = Date.now() - storeStart;

    if (rows.length === 0) {
      return { status: 'empty', reason: 'no_rows', requestedLimit, timings };
    }

    return { status: 'ok', candidates: rows.map(decodeCandidateRow), requestedLimit, timings };
  }
}
