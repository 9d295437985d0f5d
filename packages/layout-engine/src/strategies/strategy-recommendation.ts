import type { LayoutProfile, StrategyName } from '@regroup/model';

import { STRATEGY_SELECTION } from '../config/constants';

export type ProfileStatistics = Omit<LayoutProfile, 'recommendedStrategy'>;

/**
 * Pick an assignment strategy from layout statistics
 *
 * - Clean two-column pages with adjacent question text go direct, unless
 *   the page is too wide for the weighted-distance pass
 * - Mixed pages are legacy-local unless adjacency is high
 * - Horizontally split pages go direct unless adjacency dominates
 * - Single-column pages follow adjacency first, then anchor consistency,
 *   with hybrid for the ambiguous middle band
 */
export function recommendStrategy(stats: ProfileStatistics): StrategyName {
  const adjacency = stats.horizontalAdjacencyRatio;
  const consistency = stats.consistencyScore;

  switch (stats.topology) {
    case 'two-column': {
      if (
        adjacency >= 0.4 &&
        adjacency < 0.6 &&
        consistency >= 0.4 &&
        consistency <= 0.75
      ) {
        return 'hybrid';
      }
      if (adjacency >= 0.6) {
        return stats.pageWidth > 0 &&
          stats.pageWidth <= STRATEGY_SELECTION.MAX_DIRECT_PAGE_WIDTH
          ? 'direct'
          : 'legacy-local';
      }
      if (adjacency < 0.4) {
        return 'legacy-local';
      }
      if (stats.anchorCount < STRATEGY_SELECTION.MIN_ANCHORS_FOR_DIRECT) {
        return 'legacy-local';
      }
      return consistency >= 0.6 ? 'direct' : 'legacy-local';
    }

    case 'mixed':
      return adjacency >= 0.5 ? 'hybrid' : 'legacy-local';

    case 'horizontal-split':
      return adjacency >= 0.4 ? 'legacy-local' : 'direct';

    case 'single-column': {
      if (adjacency > 0.5) {
        return 'legacy-local';
      }
      if (consistency > 0.75) {
        return 'direct';
      }
      if (consistency < 0.4) {
        return 'legacy-local';
      }
      if (adjacency >= 0.35 && adjacency <= 0.65) {
        return 'hybrid';
      }
      return 'direct';
    }
  }
}
