export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
  cacheTtlSeconds: number;
}

export interface MonitoringConfig {
  traceHeader: string;
  requestIdHeader: string;
}

export interface AdminConfig {
  apiKey?: string;
}

export interface ServiceConfig {
  redis: RedisConfig;
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
  admin: AdminConfig;
}

let cachedConfig: ServiceConfig | null = null;

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function validateConfig(config: ServiceConfig): void {
  if (!Number.isInteger(config.redis.port) || config.redis.port <= 0) {
    throw new Error(`REDIS_PORT must be a positive integer, received ${config.redis.port}.`);
  }

  if (config.runtime.cacheTtlSeconds < 0) {
    throw new Error('COMMON_CACHE_TTL must not be negative.');
  }
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const config: ServiceConfig = {
    redis: {
      host: process.env.REDIS_HOST ?? 'localhost',
      port: parseNumber(process.env.REDIS_PORT, 6379),
      password: optionalString(process.env.REDIS_PASSWORD)
    },
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'tr-service',
      logLevel: process.env.LOG_LEVEL ?? 'info',
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true),
      cacheTtlSeconds: parseNumber(process.env.COMMON_CACHE_TTL, 3600)
    },
    monitoring: {
      traceHeader: process.env.TRACE_HEADER ?? 'traceparent',
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID'
    },
    admin: {
      apiKey: optionalString(process.env.ADMIN_API_KEY)
    }
  };

  validateConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
