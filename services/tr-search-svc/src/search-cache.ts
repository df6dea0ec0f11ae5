import { createHash } from 'crypto';

import type { Logger } from 'pino';
import { describeError, getLogger } from '@tr/common';

import type {
  CacheHealthStatus,
  CacheLookup,
  CacheStats,
  CandidateRecord,
  SearchCacheStore
} from './types';

export type CacheFilters = Readonly<Record<string, unknown>>;

export interface SearchCacheOptions {
  store: SearchCacheStore;
  namespace?: string;
  ttlSeconds: number;
  disabled?: boolean;
  logger?: Logger;
}

/**
 * JSON with object keys sorted at every depth, so equal values serialize
 * identically whatever their insertion order. Undefined members are dropped.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((entry) => (entry === undefined ? 'null' : stableStringify(entry))).join(',')}]`;
  }

  if (typeof value === 'object' && value !== null) {
    const members = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${members.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

export function computeFingerprint(query: string | null | undefined, filters: CacheFilters): string {
  const canonical = stableStringify({ filters, query: query ?? '' });
  return createHash('sha256').update(canonical).digest('hex');
}

function isStructuredField(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'flat' || value.kind === 'records') &&
    'items' in value &&
    Array.isArray(value.items)
  );
}

function isCandidateRecord(value: unknown): value is CandidateRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'fullName' in value &&
    typeof value.fullName === 'string' &&
    'score' in value &&
    typeof value.score === 'number' &&
    'languages' in value &&
    Array.isArray(value.languages) &&
    'skills' in value &&
    isStructuredField(value.skills)
  );
}

function isCandidateList(value: unknown): value is CandidateRecord[] {
  return Array.isArray(value) && value.every(isCandidateRecord);
}

/**
 * Cache-aside store for final search result lists, keyed by a fingerprint
 * of the query and filters. Every store failure degrades to a miss or a
 * no-op; nothing here throws.
 */
export class SearchCache {
  private readonly store: SearchCacheStore;
  private readonly namespace: string;
  private readonly ttlSeconds: number;
  private readonly disabled: boolean;
  private readonly logger: Logger;

  constructor(options: SearchCacheOptions) {
    this.store = options.store;
    this.namespace = options.namespace ?? 'search';
    this.ttlSeconds = options.ttlSeconds;
    this.disabled = options.disabled ?? false;
    this.logger = (options.logger ?? getLogger()).child({ module: 'search-cache' });
  }

  get defaultPattern(): string {
    return `${this.namespace}:*`;
  }

  fingerprint(query: string | null | undefined, filters: CacheFilters): string {
    return computeFingerprint(query, filters);
  }

  buildKey(query: string | null | undefined, filters: CacheFilters): string {
    return `${this.namespace}:${this.fingerprint(query, filters)}`;
  }

  async get(query: string | null | undefined, filters: CacheFilters): Promise<CacheLookup> {
    if (this.disabled) {
      return { status: 'miss', reason: 'disabled' };
    }

    const key = this.buildKey(query, filters);

    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.error({ error: describeError(error), key }, 'Search cache read failed; treating as a miss.');
      return { status: 'miss', reason: 'unavailable' };
    }

    if (raw === null) {
      return { status: 'miss', reason: 'absent' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ error: describeError(error), key }, 'Search cache entry is not valid JSON.');
      return { status: 'miss', reason: 'corrupt' };
    }

    if (!isCandidateList(parsed)) {
      this.logger.warn({ key }, 'Search cache entry does not hold a candidate list.');
      return { status: 'miss', reason: 'corrupt' };
    }

    return { status: 'hit', results: parsed };
  }

  async set(
    query: string | null | undefined,
    filters: CacheFilters,
    results: CandidateRecord[],
    ttlSeconds: number = this.ttlSeconds
  ): Promise<boolean> {
    if (this.disabled) {
      return false;
    }

    const key = this.buildKey(query, filters);
    try {
      await this.store.setWithTtl(key, JSON.stringify(results), ttlSeconds);
      return true;
    } catch (error) {
      this.logger.error({ error: describeError(error), key }, 'Search cache write failed.');
      return false;
    }
  }

  /**
   * Deletes every entry matching `pattern`. Patterns outside this cache's
   * namespace are refused.
   */
  async invalidate(pattern: string = this.defaultPattern): Promise<number> {
    if (this.disabled) {
      return 0;
    }

    if (!pattern.startsWith(`${this.namespace}:`)) {
      this.logger.warn({ pattern, namespace: this.namespace }, 'Refusing to invalidate keys outside the search namespace.');
      return 0;
    }

    try {
      const deleted = await this.store.scanDelete(pattern);
      this.logger.info({ pattern, deleted }, 'Search cache invalidated.');
      return deleted;
    } catch (error) {
      this.logger.error({ error: describeError(error), pattern }, 'Search cache invalidation failed.');
      return 0;
    }
  }

  async stats(): Promise<CacheStats> {
    if (this.disabled) {
      return { hits: 0, misses: 0, keyCount: 0, hitRate: 0, available: false };
    }

    try {
      const [counters, keyCount] = await Promise.all([
        this.store.keyspaceCounters(),
        this.store.countKeys(this.defaultPattern)
      ]);
      const { hits, misses } = counters;
      return {
        hits,
        misses,
        keyCount,
        hitRate: hits / Math.max(hits + misses, 1),
        available: true
      };
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Search cache stats unavailable.');
      return { hits: 0, misses: 0, keyCount: 0, hitRate: 0, available: false };
    }
  }

  healthCheck(): Promise<CacheHealthStatus> {
    return this.store.healthCheck();
  }

  close(): Promise<void> {
    return this.store.close();
  }
}
