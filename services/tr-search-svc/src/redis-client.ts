import Redis, { Cluster, type ClusterNode, type ClusterOptions, type RedisOptions } from 'ioredis';
import type { Logger } from 'pino';
import type { ConnectionOptions } from 'tls';
import { describeError } from '@tr/common';

import type { RedisCacheConfig } from './config';
import type { CacheHealthStatus, KeyspaceCounters, SearchCacheStore } from './types';

/** Reads `keyspace_hits` / `keyspace_misses` from an `INFO stats` reply. */
export function parseKeyspaceCounters(info: string): KeyspaceCounters {
  const counters: KeyspaceCounters = { hits: 0, misses: 0 };

  for (const line of info.split(/\r?\n/)) {
    const [name, value] = line.split(':');
    const parsed = Number.parseInt(value ?? '', 10);
    if (!Number.isFinite(parsed)) {
      continue;
    }
    if (name === 'keyspace_hits') {
      counters.hits = parsed;
    } else if (name === 'keyspace_misses') {
      counters.misses = parsed;
    }
  }

  return counters;
}

export class SearchRedisClient implements SearchCacheStore {
  private client: Redis | Cluster | null = null;

  constructor(private readonly config: RedisCacheConfig, private readonly logger: Logger) {
    if (config.disable) {
      this.logger.warn('Redis caching disabled via configuration.');
    }
  }

  private createClient(): Redis | Cluster | null {
    if (this.config.disable) {
      return null;
    }

    if (this.client) {
      return this.client;
    }

    const hosts = this.config.host.split(',').map((value) => value.trim()).filter(Boolean);
    let tlsOptions: ConnectionOptions | undefined;
    if (this.config.tls) {
      tlsOptions = { rejectUnauthorized: this.config.tlsRejectUnauthorized };
      if (this.config.caCert) {
        tlsOptions.ca = [this.config.caCert];
      }
    }

    if (hosts.length > 1) {
      const nodes: ClusterNode[] = hosts.map((host) => ({ host, port: this.config.port }));
      const options: ClusterOptions = {
        redisOptions: {
          password: this.config.password,
          tls: tlsOptions
        }
      };
      this.logger.info({ tls: Boolean(tlsOptions), cluster: true }, 'Initializing Redis cluster client.');
      this.client = new Cluster(nodes, options);
    } else {
      const options: RedisOptions = {
        host: hosts[0] ?? this.config.host,
        port: this.config.port,
        password: this.config.password,
        tls: tlsOptions
      };
      this.logger.info(
        { tls: Boolean(tlsOptions), cluster: false, host: options.host, port: options.port },
        'Initializing Redis client.'
      );
      this.client = new Redis(options);
    }

    this.client.on('error', (error: unknown) => {
      this.logger.error({ error: describeError(error) }, 'Redis connection error.');
    });

    this.client.on('reconnecting', () => {
      this.logger.warn('Redis reconnecting.');
    });

    this.client.on('ready', () => {
      this.logger.info('Redis client connection ready.');
    });

    return this.client;
  }

  /** Nodes to scan: every master of a cluster, or the single client. */
  private scanTargets(): Redis[] {
    const client = this.createClient();
    if (!client) {
      return [];
    }

    return client instanceof Cluster ? client.nodes('master') : [client];
  }

  async get(key: string): Promise<string | null> {
    const client = this.createClient();
    if (!client) {
      return null;
    }

    return client.get(key);
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.createClient();
    if (!client) {
      return;
    }

    if (ttlSeconds > 0) {
      await client.setex(key, ttlSeconds, value);
    } else {
      await client.set(key, value);
    }
  }

  async scanDelete(pattern: string): Promise<number> {
    let deleted = 0;

    for (const node of this.scanTargets()) {
      let cursor = '0';
      do {
        const [nextCursor, keys] = await node.scan(cursor, 'MATCH', pattern, 'COUNT', this.config.scanCount);
        cursor = nextCursor;

        if (keys.length > 0) {
          const pipeline = node.pipeline();
          for (const key of keys) {
            pipeline.del(key);
          }
          const results = (await pipeline.exec()) ?? [];
          for (const [error, removed] of results) {
            if (error) {
              this.logger.warn({ error: describeError(error) }, 'Failed to delete a cached search entry.');
            } else if (typeof removed === 'number') {
              deleted += removed;
            }
          }
        }
      } while (cursor !== '0');
    }

    return deleted;
  }

  async countKeys(pattern: string): Promise<number> {
    let count = 0;

    for (const node of this.scanTargets()) {
      let cursor = '0';
      do {
        const [nextCursor, keys] = await node.scan(cursor, 'MATCH', pattern, 'COUNT', this.config.scanCount);
        cursor = nextCursor;
        count += keys.length;
      } while (cursor !== '0');
    }

    return count;
  }

  async keyspaceCounters(): Promise<KeyspaceCounters> {
    const totals: KeyspaceCounters = { hits: 0, misses: 0 };

    for (const node of this.scanTargets()) {
      const counters = parseKeyspaceCounters(await node.info('stats'));
      totals.hits += counters.hits;
      totals.misses += counters.misses;
    }

    return totals;
  }

  async healthCheck(): Promise<CacheHealthStatus> {
    if (this.config.disable) {
      return { status: 'disabled', message: 'Caching disabled via configuration.' } satisfies CacheHealthStatus;
    }

    const client = this.createClient();
    if (!client) {
      return { status: 'unavailable', message: 'Redis client not configured.' } satisfies CacheHealthStatus;
    }

    const start = Date.now();
    try {
      const response = await client.ping();
      const latency = Date.now() - start;
      if (response.toUpperCase() === 'PONG') {
        return { status: 'healthy', latencyMs: latency } satisfies CacheHealthStatus;
      }
      return { status: 'degraded', latencyMs: latency, message: 'Unexpected ping response.' } satisfies CacheHealthStatus;
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Redis ping failed.');
      return { status: 'degraded', message: describeError(error) } satisfies CacheHealthStatus;
    }
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to close Redis connection cleanly.');
    } finally {
      this.client = null;
    }
  }
}
