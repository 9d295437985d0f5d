import { describe, expect, test } from 'vitest';

import {
  bestTwoMeansSplit,
  isDistinctSplit,
  sumOfSquaredErrors,
} from './two-means';

describe('sumOfSquaredErrors', () => {
  test('is zero for empty or constant input', () => {
    expect(sumOfSquaredErrors([])).toBe(0);
    expect(sumOfSquaredErrors([4, 4, 4])).toBe(0);
  });

  test('sums squared deviations from the mean', () => {
    // mean 2: 1 + 0 + 1
    expect(sumOfSquaredErrors([1, 2, 3])).toBe(2);
  });
});

describe('bestTwoMeansSplit', () => {
  test('returns null without two distinct values', () => {
    expect(bestTwoMeansSplit([])).toBeNull();
    expect(bestTwoMeansSplit([100])).toBeNull();
    expect(bestTwoMeansSplit([100, 100, 100])).toBeNull();
  });

  test('separates two column centers', () => {
    const split = bestTwoMeansSplit([110, 600, 100, 610]);

    expect(split).toEqual({
      lower: [100, 110],
      upper: [600, 610],
      lowerMean: 105,
      upperMean: 605,
      threshold: 355,
      // mean 355: 4 values each 250 or 255 away
      singleClusterSse: 255 ** 2 * 2 + 245 ** 2 * 2,
      twoClusterSse: 100,
    });
  });

  test('keeps equal values in one cluster', () => {
    const split = bestTwoMeansSplit([10, 10, 10, 50]);

    expect(split?.lower).toEqual([10, 10, 10]);
    expect(split?.upper).toEqual([50]);
  });
});

describe('isDistinctSplit', () => {
  test('accepts well separated columns', () => {
    const split = bestTwoMeansSplit([100, 110, 600, 610]);

    expect(split && isDistinctSplit(split, 50, 0.5)).toBe(true);
  });

  test('rejects clusters closer than the minimum separation', () => {
    const split = bestTwoMeansSplit([100, 110, 130, 140]);

    expect(split && isDistinctSplit(split, 50, 0.5)).toBe(false);
  });

  test('rejects a split that leaves most of the spread', () => {
    // evenly spaced values: best split keeps half of the variance
    const split = bestTwoMeansSplit([0, 100, 200, 300, 400, 500, 600]);

    expect(split && isDistinctSplit(split, 50, 0.2)).toBe(false);
  });
});
