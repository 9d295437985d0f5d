import type { LoggerMethods } from '@regroup/logger';
import type { LayoutGroup, RangeConflict } from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';

import { SPATIAL_VALIDATOR } from '../config/constants';
import { EngineComponent } from '../core/engine-component';
import { height, iou, overlapArea, overlaps } from '../geometry/bounding-box';

export type SpatialValidatorOptions = Pick<
  EngineOptions,
  'iouConflictThreshold' | 'severeOverlapAreaPx2'
>;

/**
 * SpatialValidator
 *
 * Reports pairs of groups whose envelopes overlap too much, with the
 * children responsible for the overlap.
 */
export class SpatialValidator extends EngineComponent {
  private readonly options: SpatialValidatorOptions;

  constructor(logger: LoggerMethods, options: SpatialValidatorOptions) {
    super(logger, 'SpatialValidator');
    this.options = options;
  }

  validate(groups: readonly LayoutGroup[]): RangeConflict[] {
    const conflicts: RangeConflict[] = [];

    for (let i = 0; i < groups.length; i++) {
      for (let j = i + 1; j < groups.length; j++) {
        const conflict = this.compare(groups[i], groups[j]);
        if (conflict) {
          conflicts.push(conflict);
        }
      }
    }

    if (conflicts.length > 0) {
      this.log(
        'info',
        `Found ${conflicts.length} overlapping group pair(s) (${conflicts.filter((conflict) => conflict.severe).length} severe)`,
      );
    }
    return conflicts;
  }

  /**
   * Groups taller than a third of the page, usually a sign that an anchor
   * swallowed the content of a missed one
   */
  findAbnormalRanges(
    groups: readonly LayoutGroup[],
    pageHeight: number,
  ): LayoutGroup[] {
    if (pageHeight <= 0) {
      return [];
    }
    const limit = pageHeight * SPATIAL_VALIDATOR.ABNORMAL_HEIGHT_RATIO;
    return groups.filter((group) => height(group.envelope) > limit);
  }

  private compare(
    first: LayoutGroup,
    second: LayoutGroup,
  ): RangeConflict | undefined {
    const score = iou(first.envelope, second.envelope);
    if (score <= this.options.iouConflictThreshold) {
      return undefined;
    }

    const area = overlapArea(first.envelope, second.envelope);
    const contributingElementIds = [
      ...first.children.filter((child) =>
        overlaps(child.bbox, second.envelope),
      ),
      ...second.children.filter((child) =>
        overlaps(child.bbox, first.envelope),
      ),
    ].map((child) => child.id);

    return {
      firstGroupId: first.id,
      secondGroupId: second.id,
      overlapArea: area,
      iou: score,
      contributingElementIds,
      severe: area > this.options.severeOverlapAreaPx2,
    };
  }
}
