import { mean, sum } from 'es-toolkit';

/**
 * Optimal split of 1-D values into two clusters
 */
export interface TwoMeansSplit {
  /** Values left of the split, ascending */
  lower: number[];

  /** Values right of the split, ascending */
  upper: number[];

  lowerMean: number;
  upperMean: number;

  /** Midpoint between the two clusters; values below belong to `lower` */
  threshold: number;

  /** Sum of squared errors with one cluster */
  singleClusterSse: number;

  /** Sum of squared errors with two clusters */
  twoClusterSse: number;
}

export function sumOfSquaredErrors(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const center = mean(values);
  return sum(values.map((value) => (value - center) ** 2));
}

/**
 * Exact k=2 clustering of 1-D values
 *
 * Every split point of the sorted values is tried and the one with the
 * smallest within-cluster error wins. Equal values always share a cluster.
 *
 * @returns null when there are fewer than two distinct values
 */
export function bestTwoMeansSplit(
  values: readonly number[],
): TwoMeansSplit | null {
  const sorted = [...values].sort((a, b) => a - b);
  let best: TwoMeansSplit | null = null;

  for (let index = 1; index < sorted.length; index++) {
    if (sorted[index] === sorted[index - 1]) {
      continue;
    }
    const lower = sorted.slice(0, index);
    const upper = sorted.slice(index);
    const twoClusterSse = sumOfSquaredErrors(lower) + sumOfSquaredErrors(upper);

    if (best === null || twoClusterSse < best.twoClusterSse) {
      best = {
        lower,
        upper,
        lowerMean: mean(lower),
        upperMean: mean(upper),
        threshold: (lower[lower.length - 1] + upper[0]) / 2,
        singleClusterSse: 0,
        twoClusterSse,
      };
    }
  }

  if (best === null) {
    return null;
  }
  return { ...best, singleClusterSse: sumOfSquaredErrors(sorted) };
}

/**
 * Whether a split describes two real columns: far enough apart and
 * explaining at least `maxVarianceRatio` of the spread
 */
export function isDistinctSplit(
  split: TwoMeansSplit,
  minSeparation: number,
  maxVarianceRatio: number,
): boolean {
  return (
    split.upperMean - split.lowerMean >= minSeparation &&
    split.twoClusterSse <= maxVarianceRatio * split.singleClusterSse
  );
}
