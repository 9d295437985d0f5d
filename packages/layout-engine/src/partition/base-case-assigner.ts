import type { LayoutElement } from '@regroup/model';

import type { GroupDraft } from '../groups/group-factory';

import { minBy } from 'es-toolkit';

import { SPATIAL_PARTITIONER } from '../config/constants';
import { readingOrder, splitAnchors } from '../elements/element-filter';
import { area, center, weightedDistance } from '../geometry/bounding-box';
import { isHorizontallyAdjacent } from '../profiler/adjacency';

/**
 * Groups and orphans produced for one region
 */
export interface RegionAssignment {
  /** Drafts in reading order */
  drafts: GroupDraft[];
  orphans: LayoutElement[];
}

export interface BaseCaseSettings {
  proximityXWeight: number;
  lookaheadMaxGroups: number;
  minIdentifierConfidence: number;
}

/**
 * Pass 1: each anchor claims the closest unclaimed child on its own row
 *
 * @returns Ids of the claimed children
 */
export function claimAdjacentChildren(
  drafts: readonly GroupDraft[],
  children: readonly LayoutElement[],
): Set<string> {
  const claimed = new Set<string>();

  for (const draft of drafts) {
    const anchorBox = draft.anchor.element.bbox;
    const closest = minBy(
      children.filter(
        (child) =>
          !claimed.has(child.id) &&
          isHorizontallyAdjacent(anchorBox, child.bbox),
      ),
      (child) => Math.abs(child.bbox.x1 - anchorBox.x2),
    );
    if (closest) {
      draft.children.push(closest);
      claimed.add(closest.id);
    }
  }

  return claimed;
}

export function isLargeElement(element: LayoutElement): boolean {
  return (
    SPATIAL_PARTITIONER.LARGE_ELEMENT_CLASSES.some(
      (className) => className === element.className,
    ) || area(element.bbox) >= SPATIAL_PARTITIONER.LARGE_ELEMENT_AREA_PX2
  );
}

/**
 * Pass 3: move large elements forward to a following anchor that is
 * strictly closer in Y (top edges), looking at most `maxGroups` ahead.
 * Equal distances favor the later anchor.
 *
 * @returns Number of moved elements
 */
export function applyLookahead(
  drafts: readonly GroupDraft[],
  maxGroups: number,
): number {
  const moved = new Set<string>();

  drafts.forEach((current, index) => {
    const candidates = current.children.filter(
      (child) => !moved.has(child.id) && isLargeElement(child),
    );

    for (const child of candidates) {
      const currentDistance = Math.abs(child.bbox.y1 - current.anchor.y);
      if (currentDistance <= SPATIAL_PARTITIONER.LOOKAHEAD_MIN_Y_DISTANCE_PX) {
        continue;
      }

      let target: GroupDraft | undefined;
      let bestDistance = currentDistance;
      const last = Math.min(index + maxGroups, drafts.length - 1);
      for (let next = index + 1; next <= last; next++) {
        const distance = Math.abs(child.bbox.y1 - drafts[next].anchor.y);
        if (
          distance < currentDistance &&
          (target === undefined || distance <= bestDistance)
        ) {
          target = drafts[next];
          bestDistance = distance;
        }
      }

      if (target) {
        current.children.splice(current.children.indexOf(child), 1);
        target.children.push(child);
        moved.add(child.id);
      }
    }
  });

  return moved.size;
}

/**
 * Assign the children of a single-column region to its anchors
 *
 * 1. same-row adjacency
 * 2. weighted distance to anchors whose center is not below the child's
 * 3. lookahead for large visual elements
 *
 * Children with no eligible anchor become orphans.
 */
export function assignColumn(
  elements: readonly LayoutElement[],
  settings: BaseCaseSettings,
): RegionAssignment {
  const { anchors, children } = splitAnchors(
    elements,
    settings.minIdentifierConfidence,
  );
  if (anchors.length === 0) {
    return { drafts: [], orphans: children };
  }

  const drafts: GroupDraft[] = anchors.map((anchor) => ({
    anchor,
    children: [],
  }));
  const claimed = claimAdjacentChildren(drafts, children);

  const orphans: LayoutElement[] = [];
  for (const child of children) {
    if (claimed.has(child.id)) {
      continue;
    }
    const childY = center(child.bbox).y;
    const owner = minBy(
      drafts.filter(
        (draft) => center(draft.anchor.element.bbox).y <= childY,
      ),
      (draft) =>
        weightedDistance(
          child.bbox,
          draft.anchor.element.bbox,
          settings.proximityXWeight,
        ),
    );
    if (owner) {
      owner.children.push(child);
    } else {
      orphans.push(child);
    }
  }

  applyLookahead(drafts, settings.lookaheadMaxGroups);

  for (const draft of drafts) {
    draft.children = readingOrder(draft.children);
  }
  return { drafts, orphans };
}
