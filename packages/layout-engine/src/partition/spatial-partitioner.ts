import type { LoggerMethods } from '@regroup/logger';
import type {
  BoundingBox,
  LayoutElement,
  LayoutPartition,
  LayoutTopology,
  PageLayout,
} from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';
import type { AssignmentStrategy } from '../strategies/assignment-strategy';
import type { RegionAssignment } from './base-case-assigner';

import { isAnchorClass } from '@regroup/model';
import { partition } from 'es-toolkit';

import {
  LAYOUT_PROFILER,
  SPATIAL_PARTITIONER,
} from '../config/constants';
import { EngineComponent } from '../core/engine-component';
import { toAnchor } from '../elements/anchor-identifier';
import { readingOrder } from '../elements/element-filter';
import { center, height } from '../geometry/bounding-box';
import { buildGroups } from '../groups/group-factory';
import {
  detectColumns,
  detectTopology,
  findSeparator,
} from '../profiler/topology';
import { assignColumn } from './base-case-assigner';
import {
  columnBoundary,
  findVerticalGapSplit,
  mergeColumns,
  splitAroundSeparator,
} from './region-split';

/**
 * SpatialPartitioner
 *
 * The `direct` strategy. Recursively splits the page by its topology and
 * assigns children inside each resulting single-column region.
 *
 * - horizontal-split: regions above and below the separator header, which
 *   becomes a group of its own between them
 * - two-column: left and right of a boundary derived from the right
 *   column's anchors
 * - mixed: top and bottom at the widest anchor gap (or 40% of the height),
 *   each re-detected without `mixed`
 */
export class SpatialPartitioner
  extends EngineComponent
  implements AssignmentStrategy
{
  readonly name = 'direct';

  private readonly options: EngineOptions;

  constructor(logger: LoggerMethods, options: EngineOptions) {
    super(logger, 'SpatialPartitioner');
    this.options = options;
  }

  assign(
    elements: readonly LayoutElement[],
    layout: PageLayout,
  ): LayoutPartition {
    if (elements.length === 0) {
      return { groups: [], orphans: [] };
    }

    const region: BoundingBox = {
      x1: 0,
      y1: 0,
      x2: layout.pageWidth,
      y2: layout.pageHeight,
    };
    const { drafts, orphans } = this.partitionRegion(
      elements,
      region,
      layout.topology,
      0,
    );

    if (orphans.length > 0) {
      this.log('debug', `${orphans.length} element(s) left without an anchor`);
    }

    return { groups: buildGroups(drafts), orphans: readingOrder(orphans) };
  }

  private partitionRegion(
    elements: readonly LayoutElement[],
    region: BoundingBox,
    topology: LayoutTopology,
    depth: number,
  ): RegionAssignment {
    if (depth >= SPATIAL_PARTITIONER.MAX_SPLIT_DEPTH) {
      this.log(
        'warn',
        `Split depth ${depth} reached, using single-column rules`,
      );
      return this.assignSingleColumn(elements);
    }

    switch (topology) {
      case 'horizontal-split':
        return this.splitAtSeparator(elements, region, depth);
      case 'two-column':
        return this.splitColumns(elements, region);
      case 'mixed':
        return this.splitTopBottom(elements, region, depth);
      case 'single-column':
        return this.assignSingleColumn(elements);
    }
  }

  /**
   * Re-detect the topology of a sub-region and partition it
   */
  private partitionSubRegion(
    elements: readonly LayoutElement[],
    region: BoundingBox,
    depth: number,
    allowMixed: boolean,
  ): RegionAssignment {
    if (elements.length === 0) {
      return { drafts: [], orphans: [] };
    }
    const { topology } = detectTopology(elements, region, { allowMixed });
    return this.partitionRegion(elements, region, topology, depth);
  }

  private splitAtSeparator(
    elements: readonly LayoutElement[],
    region: BoundingBox,
    depth: number,
  ): RegionAssignment {
    const separator = findSeparator(elements, region);
    if (!separator) {
      this.log(
        'warn',
        'No separator header found in region, using single-column rules',
      );
      return this.assignSingleColumn(elements);
    }

    const { above, below } = splitAroundSeparator(elements, separator);
    const top = this.partitionSubRegion(
      above,
      { ...region, y2: Math.max(region.y1, separator.bbox.y1) },
      depth + 1,
      true,
    );
    const bottom = this.partitionSubRegion(
      below,
      { ...region, y1: Math.min(region.y2, separator.bbox.y2) },
      depth + 1,
      true,
    );

    return {
      drafts: [
        ...top.drafts,
        {
          anchor: toAnchor(separator, this.options.minIdentifierConfidence),
          children: [],
        },
        ...bottom.drafts,
      ],
      orphans: [...top.orphans, ...bottom.orphans],
    };
  }

  private splitColumns(
    elements: readonly LayoutElement[],
    region: BoundingBox,
  ): RegionAssignment {
    const anchors = elements.filter((element) =>
      isAnchorClass(element.className),
    );
    const columns = detectColumns(anchors);
    const boundary = columns
      ? columnBoundary(
          anchors,
          columns,
          this.options.columnGapMarginPx,
          region,
        )
      : undefined;

    if (boundary === undefined) {
      this.log(
        'warn',
        'Column boundary is degenerate, using single-column rules',
      );
      return this.assignSingleColumn(elements);
    }

    const [leftElements, rightElements] = partition(
      elements,
      (element) => center(element.bbox).x < boundary,
    );
    const left = this.assignSingleColumn(leftElements);
    const right = this.assignSingleColumn(rightElements);

    return {
      drafts: mergeColumns(left.drafts, right.drafts, this.options.columnOrder),
      orphans: [...left.orphans, ...right.orphans],
    };
  }

  private splitTopBottom(
    elements: readonly LayoutElement[],
    region: BoundingBox,
    depth: number,
  ): RegionAssignment {
    const splitY =
      findVerticalGapSplit(elements, region) ??
      region.y1 + height(region) * LAYOUT_PROFILER.TOP_BOTTOM_SPLIT_RATIO;

    const [above, below] = partition(
      elements,
      (element) => center(element.bbox).y < splitY,
    );
    const top = this.partitionSubRegion(
      above,
      { ...region, y2: splitY },
      depth + 1,
      false,
    );
    const bottom = this.partitionSubRegion(
      below,
      { ...region, y1: splitY },
      depth + 1,
      false,
    );

    return {
      drafts: [...top.drafts, ...bottom.drafts],
      orphans: [...top.orphans, ...bottom.orphans],
    };
  }

  private assignSingleColumn(
    elements: readonly LayoutElement[],
  ): RegionAssignment {
    return assignColumn(elements, this.options);
  }
}
