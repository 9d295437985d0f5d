import type { LayoutTopology, StrategyName } from '@regroup/model';

import type { ProfileStatistics } from './strategy-recommendation';

import { describe, expect, test } from 'vitest';

import { recommendStrategy } from './strategy-recommendation';

function stats(
  topology: LayoutTopology,
  horizontalAdjacencyRatio: number,
  consistencyScore: number,
  overrides: Partial<ProfileStatistics> = {},
): ProfileStatistics {
  return {
    pageWidth: 1000,
    pageHeight: 1400,
    topology,
    anchorXStd: 0,
    consistencyScore,
    horizontalAdjacencyRatio,
    anchorCount: 10,
    anchorYVariance: 0,
    ...overrides,
  };
}

describe('recommendStrategy', () => {
  describe('two-column', () => {
    test.each<[number, number, Partial<ProfileStatistics>, StrategyName]>([
      [0.5, 0.5, {}, 'hybrid'],
      [0.7, 0.9, {}, 'direct'],
      [0.7, 0.9, { pageWidth: 2480 }, 'legacy-local'],
      [0.3, 0.9, {}, 'legacy-local'],
      [0.5, 0.8, {}, 'direct'],
      [0.5, 0.8, { anchorCount: 4 }, 'legacy-local'],
      [0.5, 0.3, {}, 'legacy-local'],
    ])(
      'adjacency %d, consistency %d, %o ⇒ %s',
      (adjacency, consistency, overrides, expected) => {
        expect(
          recommendStrategy(
            stats('two-column', adjacency, consistency, overrides),
          ),
        ).toBe(expected);
      },
    );
  });

  test('mixed pages need high adjacency for hybrid', () => {
    expect(recommendStrategy(stats('mixed', 0.5, 0.5))).toBe('hybrid');
    expect(recommendStrategy(stats('mixed', 0.4, 0.5))).toBe('legacy-local');
  });

  test('horizontally split pages go direct unless adjacency dominates', () => {
    expect(recommendStrategy(stats('horizontal-split', 0.4, 0.5))).toBe(
      'legacy-local',
    );
    expect(recommendStrategy(stats('horizontal-split', 0.2, 0.5))).toBe(
      'direct',
    );
  });

  describe('single-column', () => {
    test.each<[number, number, StrategyName]>([
      [0.6, 0.9, 'legacy-local'],
      [0.2, 0.8, 'direct'],
      [0.2, 0.3, 'legacy-local'],
      [0.4, 0.5, 'hybrid'],
      [0.2, 0.5, 'direct'],
    ])(
      'adjacency %d, consistency %d ⇒ %s',
      (adjacency, consistency, expected) => {
        expect(
          recommendStrategy(stats('single-column', adjacency, consistency)),
        ).toBe(expected);
      },
    );
  });
});
