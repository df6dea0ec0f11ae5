export type EmbeddingVector = number[];

/**
 * Semi-structured profile value. Rows store these either as a flat list of
 * strings or as a list of sub-records with named fields.
 */
export type StructuredField =
  | { kind: 'flat'; items: string[] }
  | { kind: 'records'; items: Array<Record<string, string>> };

export interface CandidateRecord {
  id: string;
  fullName: string;
  professionalTitle: string | null;
  yearsExperience: number | null;
  location: string | null;
  languages: string[];
  skills: StructuredField;
  tools: StructuredField;
  projects: StructuredField;
  workHistory: StructuredField;
  education: StructuredField;
  certifications: StructuredField;
  summary: string | null;
  email: string | null;
  phone: string | null;
  score: number;
  rerankScore?: number;
}

// A filter is present iff its property is defined.
export type FilterSet = {
  location?: string;
  minExperience?: number;
};

export interface CandidateRow {
  id: string | number;
  full_name: string | null;
  professional_title: string | null;
  years_experience: number | string | null;
  location: string | null;
  languages: unknown;
  skills: unknown;
  tools: unknown;
  projects: unknown;
  work_history: unknown;
  education: unknown;
  certifications: unknown;
  summary: string | null;
  email: string | null;
  phone: string | null;
  similarity: number | string | null;
}

export interface CandidateQuery {
  text: string;
  values: unknown[];
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  embedBatch(texts: string[], options?: CallOptions): Promise<EmbeddingVector[]>;
}

export interface CandidateStore {
  queryCandidates(query: CandidateQuery, options?: CallOptions): Promise<CandidateRow[]>;
}

export interface RerankModel {
  predict(pairs: Array<[string, string]>, options?: CallOptions): Promise<number[]>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  keyCount: number;
  hitRate: number;
  available?: boolean;
}

export interface KeyspaceCounters {
  hits: number;
  misses: number;
}

export interface CacheHealthStatus {
  status: 'healthy' | 'degraded' | 'disabled' | 'unavailable';
  latencyMs?: number;
  message?: string;
}

export interface SearchCacheStore {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
  scanDelete(pattern: string): Promise<number>;
  countKeys(pattern: string): Promise<number>;
  keyspaceCounters(): Promise<KeyspaceCounters>;
  healthCheck(): Promise<CacheHealthStatus>;
  close(): Promise<void>;
}

export type RetrievalEmptyReason = 'no_rows' | 'embedding_unavailable' | 'store_unavailable' | 'aborted';

export interface RetrievalTimings {
  embeddingMs?: number;
  storeMs?: number;
}

export type RetrievalOutcome =
  | { status: 'ok'; candidates: CandidateRecord[]; requestedLimit: number; timings: RetrievalTimings }
  | { status: 'empty'; reason: RetrievalEmptyReason; requestedLimit: number; timings: RetrievalTimings };

export type RerankFallbackReason = 'model_unavailable' | 'score_mismatch' | 'aborted';

export type RerankOutcome =
  | { status: 'reranked'; candidates: CandidateRecord[] }
  | { status: 'skipped'; candidates: CandidateRecord[] }
  | { status: 'fallback'; candidates: CandidateRecord[]; reason: RerankFallbackReason };

export type CacheMissReason = 'absent' | 'disabled' | 'unavailable' | 'corrupt';

export type CacheLookup =
  | { status: 'hit'; results: CandidateRecord[] }
  | { status: 'miss'; reason: CacheMissReason };

export interface SearchRequest {
  query?: string | null;
  filters?: FilterSet;
  topK?: number;
}

export interface SearchContext {
  requestId: string;
  signal?: AbortSignal;
}

export interface SearchTimings {
  cacheMs?: number;
  embeddingMs?: number;
  retrievalMs?: number;
  rerankMs?: number;
  totalMs: number;
}

export interface SearchResult {
  results: CandidateRecord[];
  cached: boolean;
}

export interface SearchResponse extends SearchResult {
  requestId: string;
  timings: SearchTimings;
  degraded: string[];
}

export interface SearchHttpRequest {
  query?: string;
  location?: string;
  minExperience?: number;
  topK?: number;
}

export interface InvalidateCacheRequest {
  pattern?: string;
}
