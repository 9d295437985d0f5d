import type { BoundingBox } from '@regroup/model';

import { LAYOUT_PROFILER } from '../config/constants';
import { center, height } from '../geometry/bounding-box';

/**
 * Whether a child sits on the same text row as an anchor and starts right
 * next to the anchor's right edge
 */
export function isHorizontallyAdjacent(
  anchor: BoundingBox,
  child: BoundingBox,
): boolean {
  const yThreshold =
    ((height(anchor) + height(child)) / 2) *
    LAYOUT_PROFILER.ADJACENCY_Y_CENTER_RATIO;
  const yDiff = Math.abs(center(anchor).y - center(child).y);
  const gapRight = child.x1 - anchor.x2;

  return (
    yDiff < yThreshold &&
    Math.abs(gapRight) < LAYOUT_PROFILER.ADJACENCY_X_PROXIMITY_PX
  );
}
