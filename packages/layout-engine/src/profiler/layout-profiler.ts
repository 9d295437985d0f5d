import type { LoggerMethods } from '@regroup/logger';
import type { LayoutElement, LayoutProfile } from '@regroup/model';

import { isAnchorClass } from '@regroup/model';
import { mean, partition } from 'es-toolkit';

import { LAYOUT_PROFILER } from '../config/constants';
import { EngineComponent } from '../core/engine-component';
import { center } from '../geometry/bounding-box';
import { recommendStrategy } from '../strategies/strategy-recommendation';
import { isHorizontallyAdjacent } from './adjacency';
import { type PageSize, describePageLayout } from './page-layout';

function populationVariance(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const average = mean(values);
  return mean(values.map((value) => (value - average) ** 2));
}

/**
 * LayoutProfiler
 *
 * Measures how anchors are laid out on a page and recommends an
 * assignment strategy.
 *
 * ## Statistics
 *
 * - consistency: 1 - std(anchor X centers) / (0.3 × page width), floored at 0
 * - horizontal adjacency: share of anchors with a child on the same row
 * - topology: column clustering of anchor X centers plus separator detection
 */
export class LayoutProfiler extends EngineComponent {
  constructor(logger: LoggerMethods) {
    super(logger, 'LayoutProfiler');
  }

  /**
   * Profile one page
   *
   * @param elements - Page elements (already filtered)
   * @param pageSize - Known page dimensions
   */
  profile(
    elements: readonly LayoutElement[],
    pageSize: PageSize = {},
  ): LayoutProfile {
    const [anchors, children] = partition(elements, (element) =>
      isAnchorClass(element.className),
    );

    const { pageWidth, pageHeight, topology } = describePageLayout(
      elements,
      pageSize,
    );

    let anchorXStd = 0;
    let anchorYVariance = 0;
    if (anchors.length >= LAYOUT_PROFILER.MIN_ANCHORS_FOR_SPLIT) {
      anchorXStd = Math.sqrt(
        populationVariance(anchors.map((anchor) => center(anchor.bbox).x)),
      );
      anchorYVariance = populationVariance(
        anchors.map((anchor) => center(anchor.bbox).y),
      );
    }

    const consistencyScore = this.consistency(
      anchors.length,
      anchorXStd,
      pageWidth,
    );

    const adjacentCount = anchors.filter((anchor) =>
      children.some((child) => isHorizontallyAdjacent(anchor.bbox, child.bbox)),
    ).length;
    const horizontalAdjacencyRatio =
      anchors.length > 0 ? adjacentCount / anchors.length : 0;

    const stats = {
      pageWidth,
      pageHeight,
      topology,
      anchorXStd,
      consistencyScore,
      horizontalAdjacencyRatio,
      anchorCount: anchors.length,
      anchorYVariance,
    };
    const profile: LayoutProfile = {
      ...stats,
      recommendedStrategy: recommendStrategy(stats),
    };

    this.log(
      'info',
      `Profiled ${anchors.length} anchor(s): consistency=${consistencyScore.toFixed(3)}, adjacency=${horizontalAdjacencyRatio.toFixed(3)}, topology=${topology}, recommended=${profile.recommendedStrategy}`,
    );

    return profile;
  }

  private consistency(
    anchorCount: number,
    anchorXStd: number,
    pageWidth: number,
  ): number {
    if (anchorCount === 0) {
      return 0;
    }
    const maxStd = pageWidth * LAYOUT_PROFILER.CONSISTENCY_STD_RATIO;
    if (maxStd <= 0) {
      return LAYOUT_PROFILER.UNKNOWN_WIDTH_CONSISTENCY;
    }
    return Math.max(0, 1 - anchorXStd / maxStd);
  }
}
