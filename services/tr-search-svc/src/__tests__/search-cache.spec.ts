import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { computeFingerprint, SearchCache, stableStringify } from '../search-cache';
import type { FilterSet } from '../types';
import { buildCandidate, InMemoryCacheStore, silentLogger } from './support/fixtures';

describe('stableStringify', () => {
  it('sorts keys at every depth and drops undefined members', () => {
    expect(stableStringify({ b: 1, a: { d: [3, undefined], c: 'x' }, e: undefined })).toBe(
      '{"a":{"c":"x","d":[3,null]},"b":1}'
    );
  });
});

describe('computeFingerprint', () => {
  it('ignores filter insertion order', () => {
    expect(computeFingerprint('go', { location: 'Lisbon', minExperience: 3 })).toBe(
      computeFingerprint('go', { minExperience: 3, location: 'Lisbon' })
    );
  });

  it('gives every distinct query and filter combination its own fingerprint', () => {
    const queries = ['', 'go', 'go ', 'Go', 'rust'];
    const locations = [undefined, 'Lisbon', 'lisbon'];
    const experience = [undefined, 0, 1, 10];
    const fingerprints = new Set<string>();

    for (const query of queries) {
      for (const location of locations) {
        for (const minExperience of experience) {
          const filters: FilterSet = {};
          if (location !== undefined) {
            filters.location = location;
          }
          if (minExperience !== undefined) {
            filters.minExperience = minExperience;
          }
          fingerprints.add(computeFingerprint(query, filters));
        }
      }
    }

    expect(fingerprints.size).toBe(queries.length * locations.length * experience.length);
  });

  it('treats an absent query like an empty one', () => {
    expect(computeFingerprint(undefined, {})).toBe(computeFingerprint('', {}));
  });

  it('produces a sha256 hex digest', () => {
    expect(computeFingerprint('go', {})).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('SearchCache', () => {
  let store: InMemoryCacheStore;
  let cache: SearchCache;
  const results = [buildCandidate({ id: 'cand-1', rerankScore: 2.5 }), buildCandidate({ id: 'cand-2', score: 0.4 })];

  beforeEach(() => {
    store = new InMemoryCacheStore();
    cache = new SearchCache({ store, namespace: 'search', ttlSeconds: 60, logger: silentLogger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('builds keys inside its namespace', () => {
    expect(cache.buildKey('go', {})).toBe(`search:${computeFingerprint('go', {})}`);
    expect(cache.defaultPattern).toBe('search:*');
  });

  it('returns what was stored', async () => {
    await expect(cache.set('go', { location: 'Lisbon' }, results)).resolves.toBe(true);

    const lookup = await cache.get('go', { location: 'Lisbon' });

    expect(lookup).toEqual({ status: 'hit', results });
  });

  it('reports a miss for unknown keys', async () => {
    await cache.set('go', { location: 'Lisbon' }, results);

    await expect(cache.get('go', { location: 'Porto' })).resolves.toEqual({ status: 'miss', reason: 'absent' });
  });

  it('expires entries after the TTL', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));

    await cache.set('go', {}, results);

    vi.advanceTimersByTime(59_000);
    expect((await cache.get('go', {})).status).toBe('hit');

    vi.advanceTimersByTime(1_000);
    expect(await cache.get('go', {})).toEqual({ status: 'miss', reason: 'absent' });
  });

  it('uses an explicit TTL when given', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));

    await cache.set('go', {}, results, 5);
    vi.advanceTimersByTime(5_000);

    expect((await cache.get('go', {})).status).toBe('miss');
  });

  it('deletes every entry in its namespace on invalidate and nothing else', async () => {
    await cache.set('go', {}, results);
    await cache.set('rust', {}, results);
    await cache.set(undefined, { location: 'Lisbon' }, results);
    await store.setWithTtl('sessions:abc', 'keep', 0);

    await expect(cache.invalidate()).resolves.toBe(3);

    expect((await cache.get('go', {})).status).toBe('miss');
    expect((await cache.get('rust', {})).status).toBe('miss');
    expect((await cache.get(undefined, { location: 'Lisbon' })).status).toBe('miss');
    expect(store.entries.has('sessions:abc')).toBe(true);
  });

  it('refuses patterns outside its namespace', async () => {
    await cache.set('go', {}, results);

    await expect(cache.invalidate('*')).resolves.toBe(0);
    expect((await cache.get('go', {})).status).toBe('hit');
  });

  it('treats unparseable entries as corrupt misses', async () => {
    await store.setWithTtl(cache.buildKey('go', {}), '{not json', 60);
    await store.setWithTtl(cache.buildKey('rust', {}), JSON.stringify([{ id: 7 }]), 60);

    await expect(cache.get('go', {})).resolves.toEqual({ status: 'miss', reason: 'corrupt' });
    await expect(cache.get('rust', {})).resolves.toEqual({ status: 'miss', reason: 'corrupt' });
  });

  it('degrades to misses and no-ops when the store fails', async () => {
    store.failure = new Error('connection lost');

    await expect(cache.get('go', {})).resolves.toEqual({ status: 'miss', reason: 'unavailable' });
    await expect(cache.set('go', {}, results)).resolves.toBe(false);
    await expect(cache.invalidate()).resolves.toBe(0);
    await expect(cache.stats()).resolves.toEqual({ hits: 0, misses: 0, keyCount: 0, hitRate: 0, available: false });
  });

  it('reports hit rate as a fraction with the namespace key count', async () => {
    await cache.set('go', {}, results);
    await cache.set('rust', {}, results);
    await cache.get('go', {});
    await cache.get('python', {});
    await cache.get('rust', {});
    await cache.get('java', {});

    await expect(cache.stats()).resolves.toEqual({ hits: 2, misses: 2, keyCount: 2, hitRate: 0.5, available: true });
  });

  it('reports a zero hit rate before any lookup', async () => {
    await expect(cache.stats()).resolves.toEqual({ hits: 0, misses: 0, keyCount: 0, hitRate: 0, available: true });
  });

  it('does nothing when disabled', async () => {
    const disabled = new SearchCache({ store, ttlSeconds: 60, disabled: true, logger: silentLogger });

    await expect(disabled.set('go', {}, results)).resolves.toBe(false);
    await expect(disabled.get('go', {})).resolves.toEqual({ status: 'miss', reason: 'disabled' });
    await expect(disabled.invalidate()).resolves.toBe(0);
    expect((await disabled.stats()).available).toBe(false);
    expect(store.entries.size).toBe(0);
  });
});
