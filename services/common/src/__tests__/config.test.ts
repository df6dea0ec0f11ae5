import { afterEach, describe, expect, it } from 'vitest';

import { getConfig, parseBoolean, parseNumber, resetConfigForTesting } from '../config';

const touchedKeys = ['SERVICE_NAME', 'REDIS_PORT', 'ADMIN_API_KEY', 'COMMON_CACHE_TTL', 'REQUEST_ID_HEADER'];

describe('common config', () => {
  afterEach(() => {
    for (const key of touchedKeys) {
      delete process.env[key];
    }
    resetConfigForTesting();
  });

  it('applies defaults', () => {
    const config = getConfig();

    expect(config.redis).toEqual({ host: 'localhost', port: 6379, password: undefined });
    expect(config.runtime.cacheTtlSeconds).toBe(3600);
    expect(config.monitoring).toEqual({ traceHeader: 'traceparent', requestIdHeader: 'X-Request-ID' });
    expect(config.admin.apiKey).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    process.env.SERVICE_NAME = 'tr-search-svc';
    process.env.ADMIN_API_KEY = '  test-secret  ';
    process.env.COMMON_CACHE_TTL = '120';

    const config = getConfig();

    expect(config.runtime.serviceName).toBe('tr-search-svc');
    expect(config.admin.apiKey).toBe('test-secret');
    expect(config.runtime.cacheTtlSeconds).toBe(120);
  });

  it('caches the parsed config until reset', () => {
    const first = getConfig();
    process.env.SERVICE_NAME = 'changed';

    expect(getConfig()).toBe(first);

    resetConfigForTesting();
    expect(getConfig().runtime.serviceName).toBe('changed');
  });

  it('rejects an invalid redis port', () => {
    process.env.REDIS_PORT = '-1';

    expect(() => getConfig()).toThrow('REDIS_PORT must be a positive integer');
  });
});

describe('parse helpers', () => {
  it('parses booleans leniently', () => {
    expect(parseBoolean('YES', false)).toBe(true);
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  it('falls back when a number does not parse', () => {
    expect(parseNumber('15', 1)).toBe(15);
    expect(parseNumber('abc', 7)).toBe(7);
    expect(parseNumber('   ', 3)).toBe(3);
  });
});
