import { getConfig as getBaseConfig, parseBoolean, parseNumber, type ServiceConfig } from '@tr/common';

export interface EmbeddingServiceConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
}

export interface PgVectorConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  schema: string;
  candidatesTable: string;
  poolMax: number;
  poolMin: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
}

export interface RedisCacheConfig {
  host: string;
  port: number;
  password?: string;
  tls: boolean;
  tlsRejectUnauthorized: boolean;
  caCert?: string;
  keyPrefix: string;
  ttlSeconds: number;
  scanCount: number;
  disable: boolean;
}

export interface RerankServiceConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey?: string;
  model: string;
  batchSize: number;
  timeoutMs: number;
  minSegmentLength: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
}

export interface SearchRuntimeConfig {
  defaultTopK: number;
  maxResults: number;
  overfetchFactor: number;
}

export interface SearchServiceConfig {
  base: ServiceConfig;
  embed: EmbeddingServiceConfig;
  pgvector: PgVectorConfig;
  redis: RedisCacheConfig;
  rerank: RerankServiceConfig;
  search: SearchRuntimeConfig;
}

let cachedConfig: SearchServiceConfig | null = null;

function normalizeUrl(value: string | undefined, fallback: string): string {
  if (!value || value.trim().length === 0) {
    return fallback;
  }

  const trimmed = value.trim();
  return trimmed.endsWith('/') ? trimmed.slice(0, -1) : trimmed;
}

function optionalSecret(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function sqlIdentifier(value: string | undefined, fallback: string, envName: string): string {
  const resolved = value?.trim() || fallback;
  if (!IDENTIFIER_PATTERN.test(resolved)) {
    throw new Error(`${envName} must be a plain SQL identifier, received "${resolved}".`);
  }
  return resolved;
}

function positiveInteger(value: string | undefined, fallback: number): number {
  return Math.max(1, Math.floor(parseNumber(value, fallback)));
}

export function getSearchServiceConfig(): SearchServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const redis: RedisCacheConfig = {
    host: process.env.REDIS_HOST ?? base.redis.host,
    port: parseNumber(process.env.REDIS_PORT, base.redis.port),
    password: optionalSecret(process.env.REDIS_PASSWORD) ?? base.redis.password,
    tls: parseBoolean(process.env.REDIS_TLS, false),
    tlsRejectUnauthorized: parseBoolean(process.env.REDIS_TLS_REJECT_UNAUTHORIZED, true),
    caCert: process.env.REDIS_TLS_CA,
    keyPrefix: (process.env.SEARCH_CACHE_PREFIX ?? 'search').trim() || 'search',
    ttlSeconds: Math.max(0, parseNumber(process.env.CACHE_TTL, base.runtime.cacheTtlSeconds)),
    scanCount: positiveInteger(process.env.SEARCH_CACHE_SCAN_COUNT, 100),
    disable: parseBoolean(process.env.SEARCH_CACHE_DISABLE, false)
  };

  const embed: EmbeddingServiceConfig = {
    baseUrl: normalizeUrl(process.env.EMBEDDING_API_URL, 'https://api.openai.com'),
    apiKey: optionalSecret(process.env.EMBEDDING_API_KEY),
    model: process.env.EMBEDDING_MODEL ?? 'text-embedding-3-small',
    dimensions: positiveInteger(process.env.EMBEDDING_DIMENSIONS, 1536),
    batchSize: positiveInteger(process.env.EMBEDDING_BATCH_SIZE, 32),
    timeoutMs: positiveInteger(process.env.EMBEDDING_TIMEOUT_MS, 10_000),
    circuitBreakerFailures: positiveInteger(process.env.EMBED_CB_FAILURES, 3),
    circuitBreakerCooldownMs: Math.max(0, parseNumber(process.env.EMBED_CB_COOLDOWN_MS, 30_000))
  };

  const rerank: RerankServiceConfig = {
    enabled: parseBoolean(process.env.ENABLE_RERANK, true),
    baseUrl: normalizeUrl(process.env.RERANK_SERVICE_URL, 'http://localhost:8082'),
    apiKey: optionalSecret(process.env.RERANK_SERVICE_API_KEY),
    model: process.env.RERANK_MODEL ?? 'cross-encoder/ms-marco-MiniLM-L-6-v2',
    batchSize: positiveInteger(process.env.RERANK_BATCH_SIZE, 32),
    timeoutMs: positiveInteger(process.env.RERANK_TIMEOUT_MS, 5_000),
    minSegmentLength: Math.max(0, parseNumber(process.env.RERANK_MIN_SEGMENT_LENGTH, 15)),
    circuitBreakerFailures: positiveInteger(process.env.RERANK_CB_FAILURES, 3),
    circuitBreakerCooldownMs: Math.max(0, parseNumber(process.env.RERANK_CB_COOLDOWN_MS, 30_000))
  };

  const pgvector: PgVectorConfig = {
    host: process.env.PGVECTOR_HOST ?? '127.0.0.1',
    port: parseNumber(process.env.PGVECTOR_PORT, 5432),
    database: process.env.PGVECTOR_DATABASE ?? 'candidates',
    user: process.env.PGVECTOR_USER ?? 'postgres',
    password: (process.env.PGVECTOR_PASSWORD ?? '').trim(),
    ssl: parseBoolean(process.env.PGVECTOR_SSL, false),
    schema: sqlIdentifier(process.env.PGVECTOR_SCHEMA, 'public', 'PGVECTOR_SCHEMA'),
    candidatesTable: sqlIdentifier(process.env.PGVECTOR_CANDIDATES_TABLE, 'candidates', 'PGVECTOR_CANDIDATES_TABLE'),
    poolMax: positiveInteger(process.env.PGVECTOR_POOL_MAX, 5),
    poolMin: Math.max(0, parseNumber(process.env.PGVECTOR_POOL_MIN, 1)),
    idleTimeoutMs: parseNumber(process.env.PGVECTOR_IDLE_TIMEOUT_MS, 30_000),
    connectionTimeoutMs: parseNumber(process.env.PGVECTOR_CONNECTION_TIMEOUT_MS, 5_000),
    statementTimeoutMs: parseNumber(process.env.PGVECTOR_STATEMENT_TIMEOUT_MS, 15_000)
  };

  const search: SearchRuntimeConfig = {
    defaultTopK: positiveInteger(process.env.SEARCH_DEFAULT_TOP_K, 5),
    maxResults: positiveInteger(process.env.SEARCH_MAX_RESULTS, 50),
    overfetchFactor: positiveInteger(process.env.SEARCH_OVERFETCH_FACTOR, 4)
  };

  cachedConfig = {
    base,
    embed,
    pgvector,
    redis,
    rerank,
    search
  };

  return cachedConfig;
}

export function resetSearchServiceConfig(): void {
  cachedConfig = null;
}
