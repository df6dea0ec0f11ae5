export interface PerformanceTrackerOptions {
  maxSamples?: number;
}

export interface PerformanceSample {
  totalMs: number;
  embeddingMs?: number;
  retrievalMs?: number;
  rerankMs?: number;
  cacheHit: boolean;
  degraded: boolean;
  timestamp?: number;
}

export interface MetricSnapshot {
  p50: number | null;
  p95: number | null;
  p99: number | null;
  average: number | null;
  max: number | null;
}

export interface PerformanceSnapshot {
  totalCount: number;
  cacheHitCount: number;
  cacheHitRatio: number;
  degradedCount: number;
  windowSize: number;
  lastUpdatedAt: number | null;
  totals: MetricSnapshot;
  embedding: MetricSnapshot;
  retrieval: MetricSnapshot;
  rerank: MetricSnapshot;
}

function definedValues(values: Array<number | undefined>): number[] {
  return values.filter((value): value is number => typeof value === 'number');
}

/** Rolling latency window over the most recent searches. */
export class PerformanceTracker {
  private readonly maxSamples: number;
  private readonly samples: PerformanceSample[] = [];

  constructor(options?: PerformanceTrackerOptions) {
    this.maxSamples = Math.max(1, options?.maxSamples ?? 500);
  }

  record(sample: PerformanceSample): void {
    const timestamp = sample.timestamp ?? Date.now();
    this.samples.push({ ...sample, timestamp });

    if (this.samples.length > this.maxSamples) {
      this.samples.splice(0, this.samples.length - this.maxSamples);
    }
  }

  getSnapshot(): PerformanceSnapshot {
    const totalCount = this.samples.length;
    const computed = this.samples.filter((sample) => !sample.cacheHit);
    const cacheHitCount = totalCount - computed.length;

    return {
      totalCount,
      cacheHitCount,
      cacheHitRatio: totalCount === 0 ? 0 : cacheHitCount / totalCount,
      degradedCount: this.samples.filter((sample) => sample.degraded).length,
      windowSize: this.maxSamples,
      lastUpdatedAt: this.samples[totalCount - 1]?.timestamp ?? null,
      totals: this.buildMetricSnapshot(this.samples.map((sample) => sample.totalMs)),
      embedding: this.buildMetricSnapshot(definedValues(computed.map((sample) => sample.embeddingMs))),
      retrieval: this.buildMetricSnapshot(definedValues(computed.map((sample) => sample.retrievalMs))),
      rerank: this.buildMetricSnapshot(definedValues(computed.map((sample) => sample.rerankMs)))
    } satisfies PerformanceSnapshot;
  }

  private buildMetricSnapshot(values: number[]): MetricSnapshot {
    if (values.length === 0) {
      return { p50: null, p95: null, p99: null, average: null, max: null } satisfies MetricSnapshot;
    }

    const sorted = [...values].sort((a, b) => a - b);

    return {
      p50: this.computePercentile(sorted, 50),
      p95: this.computePercentile(sorted, 95),
      p99: this.computePercentile(sorted, 99),
      average: sorted.reduce((sum, value) => sum + value, 0) / sorted.length,
      max: sorted[sorted.length - 1] ?? null
    } satisfies MetricSnapshot;
  }

  private computePercentile(sortedValues: number[], percentile: number): number | null {
    const index = Math.ceil((percentile / 100) * sortedValues.length) - 1;
    const boundedIndex = Math.min(sortedValues.length - 1, Math.max(0, index));
    return sortedValues[boundedIndex] ?? null;
  }
}
