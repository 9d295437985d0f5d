import type { LayoutElement, LayoutPartition } from '@regroup/model';

import { isAnchorClass } from '@regroup/model';
import { groupBy } from 'es-toolkit';

import { GROUPING_PENALTY } from '../config/constants';
import { center } from '../geometry/bounding-box';

/**
 * Element id to group key for every grouped element of a partition
 */
export function partitionLabels(
  partition: LayoutPartition,
): Map<string, string> {
  const labels = new Map<string, string>();
  for (const group of partition.groups) {
    labels.set(group.anchor.element.id, group.id);
    for (const child of group.children) {
      labels.set(child.id, group.id);
    }
  }
  return labels;
}

/**
 * Penalty of a grouping; lower is better
 *
 * Penalized: groups without an anchor (and each of their children), anchors
 * without children, children above their anchor, children far outside
 * their anchor's column, ungrouped children and anchors that root no group.
 *
 * @param elements - Every element of the page
 * @param labels - Element id to group key; unlabeled elements are ungrouped
 * @returns Infinity for an empty page
 */
export function scoreGrouping(
  elements: readonly LayoutElement[],
  labels: ReadonlyMap<string, string>,
  pageWidth: number,
): number {
  if (elements.length === 0) {
    return Infinity;
  }

  const labeled = elements.filter((element) => labels.has(element.id));
  const groups = groupBy(labeled, (element) => labels.get(element.id) ?? '');
  const columnTolerance =
    pageWidth > 0 ? pageWidth * GROUPING_PENALTY.COLUMN_OFFSET_RATIO : 0;

  let penalty = 0;
  const rootAnchorIds = new Set<string>();
  const groupedChildIds = new Set<string>();

  for (const members of Object.values(groups)) {
    const anchor = members.find((member) => isAnchorClass(member.className));
    const children = members.filter(
      (member) => !isAnchorClass(member.className),
    );

    if (!anchor) {
      penalty +=
        GROUPING_PENALTY.ANCHORLESS_GROUP +
        children.length * GROUPING_PENALTY.ANCHORLESS_GROUP_CHILD;
      continue;
    }

    rootAnchorIds.add(anchor.id);
    if (children.length === 0) {
      penalty += GROUPING_PENALTY.CHILDLESS_ANCHOR;
    }

    const anchorCenter = center(anchor.bbox);
    for (const child of children) {
      groupedChildIds.add(child.id);
      const childCenter = center(child.bbox);
      if (childCenter.y < anchorCenter.y) {
        penalty += GROUPING_PENALTY.CHILD_ABOVE_ANCHOR;
      }
      if (
        columnTolerance > 0 &&
        Math.abs(childCenter.x - anchorCenter.x) > columnTolerance
      ) {
        penalty += GROUPING_PENALTY.CHILD_OUTSIDE_COLUMN;
      }
    }
  }

  for (const element of elements) {
    if (isAnchorClass(element.className)) {
      if (!rootAnchorIds.has(element.id)) {
        penalty += GROUPING_PENALTY.UNASSIGNED_ANCHOR;
      }
    } else if (!groupedChildIds.has(element.id)) {
      penalty += GROUPING_PENALTY.ORPHAN_CHILD;
    }
  }

  return penalty;
}
