/**
 * Retrieval-quality metrics over ranked candidate ids with binary relevance.
 * Every function returns a value in [0, 1].
 */

export interface RankedJudgement {
  retrieved: string[];
  relevant: string[];
}

export function precisionAtK(retrieved: string[], relevant: string[], k: number): number {
  if (retrieved.length === 0 || relevant.length === 0 || k <= 0) {
    return 0;
  }

  const relevantSet = new Set(relevant);
  const hits = retrieved.slice(0, k).filter((id) => relevantSet.has(id)).length;
  return hits / k;
}

export function recallAtK(retrieved: string[], relevant: string[], k: number): number {
  const relevantSet = new Set(relevant);
  if (relevantSet.size === 0) {
    return 0;
  }

  const hits = retrieved.slice(0, k).filter((id) => relevantSet.has(id)).length;
  return hits / relevantSet.size;
}

export function ndcgAtK(retrieved: string[], relevant: string[], k: number): number {
  if (retrieved.length === 0 || relevant.length === 0) {
    return 0;
  }

  const relevantSet = new Set(relevant);
  let dcg = 0;
  retrieved.slice(0, k).forEach((id, index) => {
    if (relevantSet.has(id)) {
      dcg += 1 / Math.log2(index + 2);
    }
  });

  let idcg = 0;
  for (let rank = 1; rank <= Math.min(relevant.length, k); rank += 1) {
    idcg += 1 / Math.log2(rank + 1);
  }

  return idcg > 0 ? dcg / idcg : 0;
}

export function meanReciprocalRank(judgements: RankedJudgement[]): number {
  if (judgements.length === 0) {
    return 0;
  }

  const total = judgements.reduce((sum, { retrieved, relevant }) => {
    const relevantSet = new Set(relevant);
    const position = retrieved.findIndex((id) => relevantSet.has(id));
    return sum + (position === -1 ? 0 : 1 / (position + 1));
  }, 0);

  return total / judgements.length;
}

/** Judgements without any relevant id are left out of the mean. */
export function mapAtK(judgements: RankedJudgement[], k: number): number {
  const averagePrecisions: number[] = [];

  for (const { retrieved, relevant } of judgements) {
    const relevantSet = new Set(relevant);
    if (relevantSet.size === 0) {
      continue;
    }

    let hits = 0;
    let precisionSum = 0;
    retrieved.slice(0, k).forEach((id, index) => {
      if (relevantSet.has(id)) {
        hits += 1;
        precisionSum += hits / (index + 1);
      }
    });

    averagePrecisions.push(precisionSum / relevantSet.size);
  }

  if (averagePrecisions.length === 0) {
    return 0;
  }

  return averagePrecisions.reduce((sum, value) => sum + value, 0) / averagePrecisions.length;
}

export type MetricScores = Record<string, number>;

export function calculateAllMetrics(retrieved: string[], relevant: string[], k = 5): MetricScores {
  return {
    [`precision@${k}`]: precisionAtK(retrieved, relevant, k),
    [`recall@${k}`]: recallAtK(retrieved, relevant, k),
    [`ndcg@${k}`]: ndcgAtK(retrieved, relevant, k)
  };
}

/** Per-k means of precision, recall and nDCG, plus MRR and MAP@`mapK`. */
export function aggregateMetrics(judgements: RankedJudgement[], kValues: number[], mapK = 5): MetricScores {
  const metrics: MetricScores = {};
  const mean = (values: number[]) =>
    values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

  for (const k of kValues) {
    metrics[`precision@${k}`] = mean(judgements.map((entry) => precisionAtK(entry.retrieved, entry.relevant, k)));
    metrics[`recall@${k}`] = mean(judgements.map((entry) => recallAtK(entry.retrieved, entry.relevant, k)));
    metrics[`ndcg@${k}`] = mean(judgements.map((entry) => ndcgAtK(entry.retrieved, entry.relevant, k)));
  }

  metrics.mrr = meanReciprocalRank(judgements);
  metrics[`map@${mapK}`] = mapAtK(judgements, mapK);

  return metrics;
}
