import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { CircuitBreaker, describeError } from '@tr/common';

import type { RerankServiceConfig } from './config';
import type { CallOptions, RerankModel } from './types';

export interface RerankHealthStatus {
  status: 'healthy' | 'degraded' | 'disabled' | 'unavailable';
  message?: string;
  latencyMs?: number;
}

function readScore(entry: unknown): number | undefined {
  if (typeof entry === 'number') {
    return entry;
  }

  if (Array.isArray(entry)) {
    return entry.length > 0 ? readScore(entry[0]) : undefined;
  }

  if (typeof entry === 'object' && entry !== null && 'score' in entry && typeof entry.score === 'number') {
    return entry.score;
  }

  return undefined;
}

/**
 * Reads one score per pair from a `/predict` response. Entries may be bare
 * numbers, `{ score }` objects or single-element `[{ score }]` lists.
 */
export function parsePredictResponse(payload: unknown, expectedCount: number): number[] {
  if (!Array.isArray(payload)) {
    throw new Error('Rerank response is not an array.');
  }

  if (payload.length !== expectedCount) {
    throw new Error(`Rerank response returned ${payload.length} scores for ${expectedCount} pairs.`);
  }

  return payload.map((entry, position) => {
    const score = readScore(entry);
    if (score === undefined || !Number.isFinite(score)) {
      throw new Error(`Rerank score ${position} is not a finite number.`);
    }
    return score;
  });
}

export class CrossEncoderClient implements RerankModel {
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: RerankServiceConfig, private readonly logger: Logger) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json'
    };
    if (config.apiKey) {
      headers.Authorization = `Bearer ${config.apiKey}`;
    }

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers
    });
    this.breaker = new CircuitBreaker('rerank', {
      failureThreshold: config.circuitBreakerFailures,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async predict(pairs: Array<[string, string]>, options: CallOptions = {}): Promise<number[]> {
    if (!this.config.enabled) {
      throw new Error('Rerank client is disabled.');
    }

    const scores: number[] = [];
    for (let offset = 0; offset < pairs.length; offset += this.config.batchSize) {
      options.signal?.throwIfAborted();
      const batch = pairs.slice(offset, offset + this.config.batchSize);
      const batchScores = await this.breaker.exec(
        () => this.requestBatch(batch, options),
        // Cancelled by the caller, not a dependency failure.
        () => !options.signal?.aborted
      );
      scores.push(...batchScores);
    }

    return scores;
  }

  async healthCheck(): Promise<RerankHealthStatus> {
    if (!this.config.enabled) {
      return { status: 'disabled', message: 'Rerank disabled via configuration.' } satisfies RerankHealthStatus;
    }

    const start = Date.now();
    try {
      const response = await this.http.get('/health');
      const latency = Date.now() - start;
      if (response.status >= 200 && response.status < 300) {
        return { status: 'healthy', latencyMs: latency } satisfies RerankHealthStatus;
      }
      return {
        status: 'degraded',
        latencyMs: latency,
        message: `Unexpected status ${response.status}`
      } satisfies RerankHealthStatus;
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Rerank health check failed.');
      return {
        status: 'unavailable',
        message: describeError(error)
      } satisfies RerankHealthStatus;
    }
  }

  private async requestBatch(batch: Array<[string, string]>, options: CallOptions): Promise<number[]> {
    const started = Date.now();
    try {
      const response = await this.http.post(
        '/predict',
        { inputs: batch, raw_scores: true },
        { signal: options.signal }
      );
      const scores = parsePredictResponse(response.data, batch.length);
      this.logger.debug({ pairs: batch.length, latencyMs: Date.now() - started }, 'Rerank batch scored.');
      return scores;
    } catch (error) {
      this.logger.warn({ pairs: batch.length, latencyMs: Date.now() - started, error: describeError(error) }, 'Rerank batch failed.');
      throw error;
    }
  }
}
