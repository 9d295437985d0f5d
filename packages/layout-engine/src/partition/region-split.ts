import type { BoundingBox, LayoutElement } from '@regroup/model';

import type { ColumnOrder } from '../config/engine-options';
import type { GroupDraft } from '../groups/group-factory';
import type { TwoMeansSplit } from '../profiler/two-means';

import { isAnchorClass } from '@regroup/model';
import { maxBy, mean, sortBy } from 'es-toolkit';

import { SPATIAL_PARTITIONER } from '../config/constants';
import { center, height } from '../geometry/bounding-box';

/**
 * Elements above and below a separator (by center Y), separator excluded
 */
export function splitAroundSeparator(
  elements: readonly LayoutElement[],
  separator: LayoutElement,
): { above: LayoutElement[]; below: LayoutElement[] } {
  const separatorY = center(separator.bbox).y;
  const above: LayoutElement[] = [];
  const below: LayoutElement[] = [];

  for (const element of elements) {
    if (element.id === separator.id) {
      continue;
    }
    if (center(element.bbox).y < separatorY) {
      above.push(element);
    } else {
      below.push(element);
    }
  }
  return { above, below };
}

/**
 * Y coordinate of the widest vertical gap between consecutive anchors,
 * when that gap is at least max(1.5 × mean anchor height, 100px)
 *
 * The split line sits halfway between the upper anchor's bottom and the
 * lower anchor's top, and must fall strictly inside the region.
 */
export function findVerticalGapSplit(
  elements: readonly LayoutElement[],
  region: BoundingBox,
): number | undefined {
  const anchors = sortBy(
    elements.filter((element) => isAnchorClass(element.className)),
    [(anchor) => anchor.bbox.y1],
  );
  if (anchors.length < 2) {
    return undefined;
  }

  const heights = anchors
    .map((anchor) => height(anchor.bbox))
    .filter((value) => value > 0);
  const averageHeight =
    heights.length > 0
      ? mean(heights)
      : SPATIAL_PARTITIONER.DEFAULT_ANCHOR_HEIGHT_PX;
  const threshold = Math.max(
    averageHeight * SPATIAL_PARTITIONER.VERTICAL_GAP_HEIGHT_RATIO,
    SPATIAL_PARTITIONER.VERTICAL_GAP_MIN_PX,
  );

  const gaps = anchors.slice(1).map((lower, index) => ({
    upper: anchors[index],
    lower,
    gap: center(lower.bbox).y - center(anchors[index].bbox).y,
  }));
  const widest = maxBy(gaps, (entry) => entry.gap);
  if (!widest || widest.gap < threshold) {
    return undefined;
  }

  const splitY = (widest.upper.bbox.y2 + widest.lower.bbox.y1) / 2;
  if (splitY <= region.y1 || splitY >= region.y2) {
    return undefined;
  }
  return splitY;
}

/**
 * X coordinate between two columns: the leftmost edge of the right column's
 * anchors minus `margin`, so the line does not cut through right-column
 * children that bleed slightly to the left
 *
 * @returns undefined when the line falls outside the region
 */
export function columnBoundary(
  anchors: readonly LayoutElement[],
  columns: TwoMeansSplit,
  margin: number,
  region: BoundingBox,
): number | undefined {
  const rightEdges = anchors
    .filter((anchor) => center(anchor.bbox).x >= columns.threshold)
    .map((anchor) => anchor.bbox.x1);
  if (rightEdges.length === 0) {
    return undefined;
  }

  const boundary = Math.min(...rightEdges) - margin;
  if (boundary <= region.x1 || boundary >= region.x2) {
    return undefined;
  }
  return boundary;
}

/**
 * Combine the groups of two columns
 *
 * `column-major` reads the whole left column first; `row-major` interleaves
 * by anchor Y, left column first on ties.
 */
export function mergeColumns(
  left: readonly GroupDraft[],
  right: readonly GroupDraft[],
  order: ColumnOrder,
): GroupDraft[] {
  if (order === 'column-major') {
    return [...left, ...right];
  }
  return sortBy([...left, ...right], [(draft) => draft.anchor.y]);
}
