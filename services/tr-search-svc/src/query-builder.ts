import { toSql } from 'pgvector/pg';

import type { CandidateQuery, EmbeddingVector, FilterSet } from './types';

export interface CandidateQueryInput {
  filters?: FilterSet;
  queryVector?: EmbeddingVector | null;
  limit: number;
  /** Schema-qualified table name, already validated as SQL identifiers. */
  table: string;
}

const SELECT_COLUMNS = [
  'id',
  'full_name',
  'professional_title',
  'years_experience',
  'location',
  'spoken_languages AS languages',
  'skills',
  'tools',
  'projects',
  'work_history',
  'education',
  'certifications',
  'summary_generated AS summary',
  'email',
  'phone'
];

/**
 * Drops filters that carry no constraint. A blank location is absent;
 * `minExperience: 0` stays, since zero is a valid lower bound.
 */
export function normalizeFilters(filters: FilterSet = {}): FilterSet {
  const normalized: FilterSet = {};

  const location = filters.location?.trim();
  if (location) {
    normalized.location = location;
  }

  const minExperience = filters.minExperience;
  if (typeof minExperience === 'number' && Number.isFinite(minExperience) && minExperience >= 0) {
    normalized.minExperience = minExperience;
  }

  return normalized;
}

export function buildCandidateQuery(input: CandidateQueryInput): CandidateQuery {
  const filters = normalizeFilters(input.filters);
  const predicates: string[] = [];
  const values: unknown[] = [];

  // Argument order is fixed: location, then experience, then the vector.
  if (filters.location !== undefined) {
    values.push(filters.location);
    predicates.push(`location = $${values.length}`);
  }

  if (filters.minExperience !== undefined) {
    values.push(filters.minExperience);
    predicates.push(`years_experience >= $${values.length}`);
  }

  let similarity = '0';
  let ordering = 'created_at DESC';

  if (input.queryVector && input.queryVector.length > 0) {
    values.push(toSql(input.queryVector));
    const vectorParam = `$${values.length}::vector`;
    predicates.push('embedding IS NOT NULL');
    similarity = `1 - (embedding <=> ${vectorParam})`;
    ordering = `embedding <=> ${vectorParam} ASC`;
  }

  values.push(Math.max(1, Math.floor(input.limit)));

  const lines = [
    `SELECT ${SELECT_COLUMNS.join(', ')}, ${similarity} AS similarity`,
    `FROM ${input.table}`
  ];

  if (predicates.length > 0) {
    lines.push(`WHERE ${predicates.join(' AND ')}`);
  }

  lines.push(`ORDER BY ${ordering}, id ASC`);
  lines.push(`LIMIT $${values.length}`);

  return { text: lines.join('\n'), values };
}
