import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { CircuitBreaker, describeError } from '@tr/common';

import type { EmbeddingServiceConfig } from './config';
import type { CallOptions, EmbeddingProvider, EmbeddingVector } from './types';

export interface EmbedHealthStatus {
  status: 'healthy' | 'degraded' | 'unavailable';
  message?: string;
}

interface EmbeddingItem {
  index?: number;
  embedding: EmbeddingVector;
}

function isEmbeddingItem(value: unknown): value is EmbeddingItem {
  if (typeof value !== 'object' || value === null || !('embedding' in value)) {
    return false;
  }

  const { embedding } = value;
  if (!Array.isArray(embedding) || !embedding.every((entry) => typeof entry === 'number' && Number.isFinite(entry))) {
    return false;
  }

  return !('index' in value) || typeof value.index === 'number';
}

function readItems(payload: unknown): unknown[] {
  if (typeof payload === 'object' && payload !== null && 'data' in payload && Array.isArray(payload.data)) {
    return payload.data;
  }
  throw new Error('Embedding response is missing the data array.');
}

/**
 * Parses an OpenAI-compatible `/v1/embeddings` response into vectors in
 * input order.
 */
export function parseEmbeddingResponse(payload: unknown, expectedCount: number, dimensions: number): EmbeddingVector[] {
  const items = readItems(payload);

  if (items.length !== expectedCount) {
    throw new Error(`Embedding response returned ${items.length} vectors for ${expectedCount} inputs.`);
  }

  const ordered = items.map((item, position) => {
    if (!isEmbeddingItem(item)) {
      throw new Error(`Embedding response item ${position} is malformed.`);
    }
    return { index: item.index ?? position, embedding: item.embedding };
  });

  ordered.sort((left, right) => left.index - right.index);

  return ordered.map(({ embedding }, position) => {
    if (embedding.length !== dimensions) {
      throw new Error(`Embedding ${position} has ${embedding.length} dimensions, expected ${dimensions}.`);
    }
    return embedding;
  });
}

export class EmbeddingClient implements EmbeddingProvider {
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: EmbeddingServiceConfig, private readonly logger: Logger) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json'
      }
    });
    this.breaker = new CircuitBreaker('embeddings', {
      failureThreshold: config.circuitBreakerFailures,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });
  }

  async embedBatch(texts: string[], options: CallOptions = {}): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: EmbeddingVector[] = [];
    for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
      options.signal?.throwIfAborted();
      const batch = texts.slice(offset, offset + this.config.batchSize);
      const embeddings = await this.breaker.exec(
        () => this.requestBatch(batch, options),
        // Cancelled by the caller, not a dependency failure.
        () => !options.signal?.aborted
      );
      vectors.push(...embeddings);
    }

    return vectors;
  }

  healthCheck(): EmbedHealthStatus {
    const state = this.breaker.getState();
    if (state === 'CLOSED') {
      return { status: 'healthy' } satisfies EmbedHealthStatus;
    }

    return {
      status: state === 'OPEN' ? 'unavailable' : 'degraded',
      message: `Circuit breaker is ${state}.`
    } satisfies EmbedHealthStatus;
  }

  private async requestBatch(batch: string[], options: CallOptions): Promise<EmbeddingVector[]> {
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const started = Date.now();
    try {
      const response = await this.http.post(
        '/v1/embeddings',
        { model: this.config.model, input: batch },
        { headers, signal: options.signal }
      );
      const vectors = parseEmbeddingResponse(response.data, batch.length, this.config.dimensions);
      this.logger.debug({ batchSize: batch.length, latencyMs: Date.now() - started }, 'Embedding batch generated.');
      return vectors;
    } catch (error) {
      this.logger.warn(
        { batchSize: batch.length, latencyMs: Date.now() - started, error: describeError(error) },
        'Embedding batch failed.'
      );
      throw error;
    }
  }
}
