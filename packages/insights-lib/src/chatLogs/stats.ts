/**
 * Percentile with linear interpolation between the closest ranks.
 * `p` is in [0, 100]. Returns null for an empty sample.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/**
 * Mean of the non-null values, or null when there are none.
 */
export function mean(values: readonly (number | null)[]): number | null {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    if (value === null) continue;
    sum += value;
    count += 1;
  }
  return count === 0 ? null : sum / count;
}

export interface BoxStats {
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export function boxStats(values: readonly number[]): BoxStats | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count: sorted.length,
    min: sorted[0],
    q1: percentile(sorted, 25) ?? sorted[0],
    median: percentile(sorted, 50) ?? sorted[0],
    q3: percentile(sorted, 75) ?? sorted[0],
    max: sorted[sorted.length - 1],
  };
}

export interface Histogram {
  binEdges: number[];
  counts: number[];
}

/**
 * Equal-width histogram over [min, max]; the last bin includes its right
 * edge. A sample with a single distinct value is spread over
 * [value - 0.5, value + 0.5]. A fractional `bins` is rounded down.
 */
export function histogram(values: readonly number[], bins: number): Histogram {
  const binCount = Number.isFinite(bins) ? Math.floor(bins) : 0;
  if (values.length === 0 || binCount < 1) {
    return { binEdges: [], counts: [] };
  }
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (min === max) {
    min -= 0.5;
    max += 0.5;
  }
  const width = (max - min) / binCount;
  const binEdges = Array.from({ length: binCount + 1 }, (_, i) =>
    i === binCount ? max : min + i * width,
  );
  const counts = new Array<number>(binCount).fill(0);
  for (const value of values) {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    counts[index] += 1;
  }
  return { binEdges, counts };
}
