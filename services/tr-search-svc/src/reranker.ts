import type { Logger } from 'pino';
import { describeError, getLogger } from '@tr/common';

import type { CallOptions, CandidateRecord, RerankModel, RerankOutcome, StructuredField } from './types';

/** Each group lists alternative keys; the first non-empty one is used. */
type RecordFieldGroups = ReadonlyArray<readonly string[]>;

const WORK_HISTORY_FIELDS: RecordFieldGroups = [['position'], ['company'], ['description']];
const PROJECT_FIELDS: RecordFieldGroups = [['name'], ['description']];
const SKILL_FIELDS: RecordFieldGroups = [['name'], ['level']];
const CREDENTIAL_FIELDS: RecordFieldGroups = [['institution', 'name'], ['degree', 'issuer'], ['year']];

export const DEFAULT_MIN_SEGMENT_LENGTH = 15;

export interface RerankerOptions {
  model: RerankModel;
  minSegmentLength?: number;
  logger?: Logger;
}

function pickValue(record: Record<string, string>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function formatStructuredField(field: StructuredField, groups: RecordFieldGroups): string {
  if (field.kind === 'flat') {
    return field.items.join(', ');
  }

  return field.items
    .map((record) =>
      groups
        .map((keys) => pickValue(record, keys))
        .filter((value): value is string => value !== undefined)
        .join(' - ')
    )
    .filter((entry) => entry.length > 0)
    .join('; ');
}

/**
 * Builds the text a candidate is scored on. Segments no longer than
 * `minSegmentLength` characters are dropped.
 */
export function buildCandidateText(candidate: CandidateRecord, minSegmentLength = DEFAULT_MIN_SEGMENT_LENGTH): string {
  const segments = [
    `Title: ${candidate.professionalTitle || 'Unknown'}`,
    `Experience: ${candidate.yearsExperience ?? 0} years`,
    `Location: ${candidate.location || 'Unknown'}`,
    `Languages: ${candidate.languages.join(', ')}`,
    `Education: ${formatStructuredField(candidate.education, CREDENTIAL_FIELDS)}`,
    `Certifications: ${formatStructuredField(candidate.certifications, CREDENTIAL_FIELDS)}`,
    `Skills: ${formatStructuredField(candidate.skills, SKILL_FIELDS)}`,
    `Tools: ${formatStructuredField(candidate.tools, SKILL_FIELDS)}`,
    `Work History: ${formatStructuredField(candidate.workHistory, WORK_HISTORY_FIELDS)}`,
    `Projects: ${formatStructuredField(candidate.projects, PROJECT_FIELDS)}`,
    `Summary: ${candidate.summary ?? ''}`
  ];

  return segments.filter((segment) => segment.length > minSegmentLength).join('. ');
}

export class Reranker {
  private readonly model: RerankModel;
  private readonly minSegmentLength: number;
  private readonly logger: Logger;

  constructor(options: RerankerOptions) {
    this.model = options.model;
    this.minSegmentLength = options.minSegmentLength ?? DEFAULT_MIN_SEGMENT_LENGTH;
    this.logger = (options.logger ?? getLogger()).child({ module: 'reranker' });
  }

  async rerank(
    query: string,
    candidates: CandidateRecord[],
    topK: number,
    options: CallOptions = {}
  ): Promise<RerankOutcome> {
    const limit = Math.max(1, Math.floor(topK));
    const trimmedQuery = query.trim();

    if (candidates.length === 0 || !trimmedQuery) {
      return { status: 'skipped', candidates: candidates.slice(0, limit) };
    }

    const pairs: Array<[string, string]> = candidates.map((candidate) => [
      trimmedQuery,
      buildCandidateText(candidate, this.minSegmentLength)
    ]);

    let scores: number[];
    try {
      scores = await this.model.predict(pairs, options);
    } catch (error) {
      const aborted = options.signal?.aborted === true;
      if (!aborted) {
        this.logger.error({ error: describeError(error), candidates: candidates.length }, 'Rerank model failed; keeping retrieval order.');
      }
      return { status: 'fallback', reason: aborted ? 'aborted' : 'model_unavailable', candidates: candidates.slice(0, limit) };
    }

    if (scores.length !== candidates.length || !scores.every((score) => Number.isFinite(score))) {
      this.logger.error(
        { expected: candidates.length, received: scores.length },
        'Rerank model returned unusable scores; keeping retrieval order.'
      );
      return { status: 'fallback', reason: 'score_mismatch', candidates: candidates.slice(0, limit) };
    }

    const ranked = candidates
      .map((candidate, position) => ({ candidate, position, score: scores[position] ?? 0 }))
      .sort((left, right) => right.score - left.score || left.position - right.position)
      .slice(0, limit)
      .map(({ candidate, score }) => ({ ...candidate, rerankScore: score }));

    this.logger.debug({ candidates: candidates.length, returned: ranked.length }, 'Candidates reranked.');

    return { status: 'reranked', candidates: ranked };
  }

  async rerankCandidates(
    query: string,
    candidates: CandidateRecord[],
    topK: number,
    options: CallOptions = {}
  ): Promise<CandidateRecord[]> {
    const outcome = await this.rerank(query, candidates, topK, options);
    return outcome.candidates;
  }
}
