export interface CumulativeDistribution {
  cumulative: number[];
  /** True when the weights summed to zero and equal weights were used instead. */
  uniform: boolean;
}

/**
 * Turn raw weights into a prefix-summed distribution ending at exactly 1.
 * An empty weight list yields an empty distribution.
 */
export function toCumulative(weights: readonly number[]): CumulativeDistribution {
  const count = weights.length;
  if (count === 0) return { cumulative: [], uniform: false };

  const sum = weights.reduce((acc, w) => acc + w, 0);
  const uniform = !(sum > 0) || !Number.isFinite(sum);
  const cumulative: number[] = [];
  let running = 0;
  for (const weight of weights) {
    running += uniform ? 1 / count : weight / sum;
    cumulative.push(running);
  }
  cumulative[count - 1] = 1;
  return { cumulative, uniform };
}

/**
 * Index of the first entry that is >= `draw`, clamped to the last entry.
 */
export function pickIndex(cumulative: readonly number[], draw: number): number {
  for (let i = 0; i < cumulative.length; i++) {
    if (cumulative[i] >= draw) return i;
  }
  return cumulative.length - 1;
}
