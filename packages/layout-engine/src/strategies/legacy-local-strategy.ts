import type { LoggerMethods } from '@regroup/logger';
import type {
  LayoutElement,
  LayoutPartition,
  PageLayout,
} from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';
import type { GroupDraft } from '../groups/group-factory';
import type { RegionAssignment } from '../partition/base-case-assigner';
import type { AssignmentStrategy } from './assignment-strategy';

import { isAnchorClass } from '@regroup/model';
import { median, partition } from 'es-toolkit';

import { EngineComponent } from '../core/engine-component';
import { readingOrder, splitAnchors } from '../elements/element-filter';
import { center } from '../geometry/bounding-box';
import { buildGroups } from '../groups/group-factory';
import { claimAdjacentChildren } from '../partition/base-case-assigner';
import { mergeColumns } from '../partition/region-split';

/**
 * LegacyLocalStrategy
 *
 * The `legacy-local` strategy. Works row by row: same-row adjacency first,
 * then a reading-order sweep that hands every remaining child to the last
 * anchor starting at or above it. Multi-column pages are cut at the median
 * of anchor X centers.
 */
export class LegacyLocalStrategy
  extends EngineComponent
  implements AssignmentStrategy
{
  readonly name = 'legacy-local';

  private readonly options: EngineOptions;

  constructor(logger: LoggerMethods, options: EngineOptions) {
    super(logger, 'LegacyLocalStrategy');
    this.options = options;
  }

  assign(
    elements: readonly LayoutElement[],
    layout: PageLayout,
  ): LayoutPartition {
    if (elements.length === 0) {
      return { groups: [], orphans: [] };
    }

    let assignment: RegionAssignment;
    if (layout.topology === 'two-column' || layout.topology === 'mixed') {
      assignment = this.assignColumns(elements);
    } else {
      assignment = this.sweep(elements);
    }

    return {
      groups: buildGroups(assignment.drafts),
      orphans: readingOrder(assignment.orphans),
    };
  }

  private assignColumns(elements: readonly LayoutElement[]): RegionAssignment {
    const anchorCenters = elements
      .filter((element) => isAnchorClass(element.className))
      .map((anchor) => center(anchor.bbox).x);
    if (anchorCenters.length === 0) {
      return this.sweep(elements);
    }

    const splitX = median(anchorCenters);
    const [left, right] = partition(
      elements,
      (element) => center(element.bbox).x <= splitX,
    );
    if (
      !left.some((element) => isAnchorClass(element.className)) ||
      !right.some((element) => isAnchorClass(element.className))
    ) {
      this.log(
        'debug',
        `Anchors do not straddle x=${splitX}, sweeping as one column`,
      );
      return this.sweep(elements);
    }

    const leftColumn = this.sweep(left);
    const rightColumn = this.sweep(right);
    return {
      drafts: mergeColumns(
        leftColumn.drafts,
        rightColumn.drafts,
        this.options.columnOrder,
      ),
      orphans: [...leftColumn.orphans, ...rightColumn.orphans],
    };
  }

  private sweep(elements: readonly LayoutElement[]): RegionAssignment {
    const { anchors, children } = splitAnchors(
      elements,
      this.options.minIdentifierConfidence,
    );
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
      const owner = lastAnchorAtOrAbove(drafts, child.bbox.y1);
      if (owner) {
        owner.children.push(child);
      } else {
        orphans.push(child);
      }
    }

    for (const draft of drafts) {
      draft.children = readingOrder(draft.children);
    }
    return { drafts, orphans };
  }
}

function lastAnchorAtOrAbove(
  drafts: readonly GroupDraft[],
  y: number,
): GroupDraft | undefined {
  for (let index = drafts.length - 1; index >= 0; index--) {
    if (drafts[index].anchor.y <= y) {
      return drafts[index];
    }
  }
  return undefined;
}
