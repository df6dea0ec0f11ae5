import type { FilterSet, SearchContext, SearchRequest, SearchResult } from '../types';
import { aggregateMetrics, calculateAllMetrics, type MetricScores, type RankedJudgement } from './metrics';

export interface EvaluationCase {
  query: string;
  relevantCandidates: string[];
  filters?: FilterSet;
  description?: string;
}

export interface Searcher {
  search(request: SearchRequest, context: SearchContext): Promise<SearchResult>;
}

export interface CaseResult extends RankedJudgement {
  query: string;
  description?: string;
  metrics: MetricScores;
}

export interface EvaluationReport {
  cases: CaseResult[];
  aggregate: MetricScores;
}

export interface EvaluationOptions {
  topK?: number;
  kValues?: number[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function readFilters(value: unknown): FilterSet | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  const filters: FilterSet = {};
  if ('location' in value && typeof value.location === 'string') {
    filters.location = value.location;
  }
  if ('minExperience' in value && typeof value.minExperience === 'number') {
    filters.minExperience = value.minExperience;
  }
  return filters;
}

/** Validates labelled cases loaded from JSON. */
export function parseEvaluationCases(raw: unknown): EvaluationCase[] {
  if (!Array.isArray(raw)) {
    throw new Error('Evaluation cases must be a JSON array.');
  }

  return raw.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Evaluation case ${index} is not an object.`);
    }

    const query = 'query' in entry ? entry.query : undefined;
    if (typeof query !== 'string') {
      throw new Error(`Evaluation case ${index} has no query.`);
    }

    const relevantCandidates = 'relevantCandidates' in entry ? entry.relevantCandidates : undefined;
    if (!isStringArray(relevantCandidates)) {
      throw new Error(`Evaluation case ${index} has no relevantCandidates list.`);
    }

    const description = 'description' in entry ? entry.description : undefined;

    return {
      query,
      relevantCandidates,
      filters: 'filters' in entry ? readFilters(entry.filters) : undefined,
      description: typeof description === 'string' ? description : undefined
    } satisfies EvaluationCase;
  });
}

/**
 * Runs each labelled query through the searcher, one at a time, and scores
 * the returned ids against the labels.
 */
export async function runEvaluation(
  searcher: Searcher,
  cases: EvaluationCase[],
  options: EvaluationOptions = {}
): Promise<EvaluationReport> {
  const topK = options.topK ?? 5;
  const kValues = options.kValues ?? [1, 3, 5];
  const results: CaseResult[] = [];

  for (const [index, testCase] of cases.entries()) {
    const response = await searcher.search(
      { query: testCase.query, filters: testCase.filters, topK },
      { requestId: `eval-${index + 1}` }
    );
    const retrieved = response.results.map((candidate) => candidate.id);

    results.push({
      query: testCase.query,
      description: testCase.description,
      retrieved,
      relevant: testCase.relevantCandidates,
      metrics: calculateAllMetrics(retrieved, testCase.relevantCandidates, topK)
    });
  }

  return {
    cases: results,
    aggregate: aggregateMetrics(results, kValues, topK)
  };
}

export function formatEvaluationReport(label: string, report: EvaluationReport): string {
  const lines = [`${label} (${report.cases.length} queries)`];
  for (const [metric, value] of Object.entries(report.aggregate)) {
    lines.push(`  ${metric.padEnd(14)} ${value.toFixed(4)}`);
  }
  return lines.join('\n');
}
