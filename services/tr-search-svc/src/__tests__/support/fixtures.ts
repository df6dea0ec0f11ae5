import pino from 'pino';

import type {
  CacheHealthStatus,
  CallOptions,
  CandidateQuery,
  CandidateRecord,
  CandidateRow,
  CandidateStore,
  EmbeddingProvider,
  EmbeddingVector,
  KeyspaceCounters,
  RerankModel,
  SearchCacheStore
} from '../../types';

export const silentLogger = pino({ level: 'silent' });

export function buildRow(overrides: Partial<CandidateRow> = {}): CandidateRow {
  return {
    id: 'cand-1',
    full_name: 'Ana Souza',
    professional_title: 'Backend Engineer',
    years_experience: 5,
    location: 'Lisbon',
    languages: ['English', 'Portuguese'],
    skills: ['TypeScript', 'PostgreSQL'],
    tools: null,
    projects: null,
    work_history: null,
    education: null,
    certifications: null,
    summary: 'Builds payment APIs.',
    email: null,
    phone: null,
    similarity: 0.9,
    ...overrides
  };
}

export function buildCandidate(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
  return {
    id: 'cand-1',
    fullName: 'Ana Souza',
    professionalTitle: 'Backend Engineer',
    yearsExperience: 5,
    location: 'Lisbon',
    languages: ['English'],
    skills: { kind: 'flat', items: ['TypeScript'] },
    tools: { kind: 'flat', items: [] },
    projects: { kind: 'flat', items: [] },
    workHistory: { kind: 'flat', items: [] },
    education: { kind: 'flat', items: [] },
    certifications: { kind: 'flat', items: [] },
    summary: null,
    email: null,
    phone: null,
    score: 0.5,
    ...overrides
  };
}

/** Embeds every text as a fixed two-dimensional vector. */
export class FakeEmbeddings implements EmbeddingProvider {
  public readonly calls: string[][] = [];
  public failure: Error | null = null;

  async embedBatch(texts: string[], options: CallOptions = {}): Promise<EmbeddingVector[]> {
    this.calls.push(texts);
    options.signal?.throwIfAborted();
    if (this.failure) {
      throw this.failure;
    }
    return texts.map(() => [0.1, 0.2]);
  }
}

export class FakeCandidateStore implements CandidateStore {
  public readonly queries: CandidateQuery[] = [];
  public failure: Error | null = null;

  constructor(public rows: CandidateRow[] = []) {}

  async queryCandidates(query: CandidateQuery, options: CallOptions = {}): Promise<CandidateRow[]> {
    this.queries.push(query);
    options.signal?.throwIfAborted();
    if (this.failure) {
      throw this.failure;
    }
    const limit = query.values[query.values.length - 1];
    return typeof limit === 'number' ? this.rows.slice(0, limit) : this.rows;
  }
}

/** Scores each pair with the supplied function of the candidate text. */
export class FakeRerankModel implements RerankModel {
  public readonly calls: Array<Array<[string, string]>> = [];
  public failure: Error | null = null;

  constructor(private readonly scoreText: (text: string) => number = () => 0) {}

  async predict(pairs: Array<[string, string]>): Promise<number[]> {
    this.calls.push(pairs);
    if (this.failure) {
      throw this.failure;
    }
    return pairs.map(([, text]) => this.scoreText(text));
  }
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

interface StoredEntry {
  value: string;
  expiresAt: number | null;
}

/** Key-value store with TTLs and glob scans, standing in for Redis. */
export class InMemoryCacheStore implements SearchCacheStore {
  public readonly entries = new Map<string, StoredEntry>();
  public failure: Error | null = null;
  private hits = 0;
  private misses = 0;

  private live(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private guard(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  private matching(pattern: string): string[] {
    const matcher = globToRegExp(pattern);
    return [...this.entries.keys()].filter((key) => matcher.test(key) && this.live(key) !== undefined);
  }

  async get(key: string): Promise<string | null> {
    this.guard();
    const entry = this.live(key);
    if (entry) {
      this.hits += 1;
      return entry.value;
    }
    this.misses += 1;
    return null;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.guard();
    this.entries.set(key, { value, expiresAt: ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : null });
  }

  async scanDelete(pattern: string): Promise<number> {
    this.guard();
    const keys = this.matching(pattern);
    keys.forEach((key) => this.entries.delete(key));
    return keys.length;
  }

  async countKeys(pattern: string): Promise<number> {
    this.guard();
    return this.matching(pattern).length;
  }

  async keyspaceCounters(): Promise<KeyspaceCounters> {
    this.guard();
    return { hits: this.hits, misses: this.misses };
  }

  async healthCheck(): Promise<CacheHealthStatus> {
    return this.failure ? { status: 'unavailable', message: this.failure.message } : { status: 'healthy', latencyMs: 0 };
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
