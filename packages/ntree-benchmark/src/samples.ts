export type BenchTiming = { iterations: number; warmupIterations: number };

export type SampleSummary = {
  medianMs: number;
  p95Ms: number;
  minMs: number;
  maxMs: number;
};

// Nearest-rank: the smallest sample with at least p% of samples at or below it.
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) throw new Error("percentile of an empty sample set");
  if (!(p > 0 && p <= 100)) throw new Error(`percentile must be in (0,100], got: ${p}`);
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[rank - 1] ?? NaN;
}

export function summarizeSamples(samples: readonly number[]): SampleSummary {
  const sorted = [...samples].sort((a, b) => a - b);
  return {
    medianMs: percentile(sorted, 50),
    p95Ms: percentile(sorted, 95),
    minMs: sorted[0] ?? NaN,
    maxMs: sorted[sorted.length - 1] ?? NaN,
  };
}
