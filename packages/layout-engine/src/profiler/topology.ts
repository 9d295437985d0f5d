import type {
  BoundingBox,
  LayoutElement,
  LayoutTopology,
} from '@regroup/model';

import { isAnchorClass } from '@regroup/model';
import { minBy } from 'es-toolkit';

import { LAYOUT_PROFILER } from '../config/constants';
import { center, height, width } from '../geometry/bounding-box';
import {
  type TwoMeansSplit,
  bestTwoMeansSplit,
  isDistinctSplit,
} from './two-means';

export interface TopologyDetection {
  topology: LayoutTopology;

  /** Full-width section header (horizontal-split only) */
  separator?: LayoutElement;

  /** Anchor X-center clusters (two-column and mixed only) */
  columns?: TwoMeansSplit;
}

export interface TopologyOptions {
  /**
   * Whether `mixed` may be reported; regions produced by a mixed split
   * are re-detected without it
   */
  allowMixed: boolean;
}

/**
 * Topmost section header spanning most of the region width inside the
 * region's top zone
 */
export function findSeparator(
  elements: readonly LayoutElement[],
  region: BoundingBox,
): LayoutElement | undefined {
  const regionWidth = width(region);
  if (regionWidth <= 0) {
    return undefined;
  }
  const topLimit =
    region.y1 + height(region) * LAYOUT_PROFILER.SEPARATOR_TOP_ZONE_RATIO;

  const candidates = elements.filter(
    (element) =>
      element.className === 'question_type' &&
      element.bbox.y1 < topLimit &&
      width(element.bbox) / regionWidth >=
        LAYOUT_PROFILER.SEPARATOR_MIN_WIDTH_RATIO,
  );
  return minBy(candidates, (element) => element.bbox.y1);
}

/**
 * Split anchor X centers into two columns when they form two distinct
 * clusters
 */
export function detectColumns(
  anchors: readonly LayoutElement[],
): TwoMeansSplit | undefined {
  if (anchors.length < LAYOUT_PROFILER.MIN_ANCHORS_FOR_SPLIT) {
    return undefined;
  }
  const split = bestTwoMeansSplit(
    anchors.map((anchor) => center(anchor.bbox).x),
  );
  if (
    split === null ||
    !isDistinctSplit(
      split,
      LAYOUT_PROFILER.MIN_CLUSTER_SEPARATION_PX,
      LAYOUT_PROFILER.MAX_SPLIT_VARIANCE_RATIO,
    )
  ) {
    return undefined;
  }
  return split;
}

/**
 * Classify the arrangement of a region from its anchors
 */
export function detectTopology(
  elements: readonly LayoutElement[],
  region: BoundingBox,
  options: TopologyOptions,
): TopologyDetection {
  const anchors = elements.filter((element) =>
    isAnchorClass(element.className),
  );
  if (anchors.length < LAYOUT_PROFILER.MIN_ANCHORS_FOR_SPLIT) {
    return { topology: 'single-column' };
  }

  const separator = findSeparator(elements, region);
  if (separator) {
    return { topology: 'horizontal-split', separator };
  }

  const columns = detectColumns(anchors);
  if (!columns) {
    return { topology: 'single-column' };
  }

  const splitY =
    region.y1 + height(region) * LAYOUT_PROFILER.TOP_BOTTOM_SPLIT_RATIO;
  const top = anchors.filter((anchor) => center(anchor.bbox).y < splitY);
  const bottom = anchors.filter((anchor) => center(anchor.bbox).y >= splitY);
  const spansBothColumns = (group: LayoutElement[]) => {
    const xs = group.map((anchor) => center(anchor.bbox).x);
    return (
      xs.some((x) => x < columns.threshold) &&
      xs.some((x) => x >= columns.threshold)
    );
  };

  if (
    options.allowMixed &&
    top.length > 0 &&
    bottom.length > 0 &&
    spansBothColumns(top) !== spansBothColumns(bottom)
  ) {
    return { topology: 'mixed', columns };
  }
  return { topology: 'two-column', columns };
}
