import type { LoggerMethods } from '@regroup/logger';
import type { LayoutGroup, ValidationResult } from '@regroup/model';

import type { SequenceValidatorOptions } from './sequence-validator';
import type { SpatialValidatorOptions } from './spatial-validator';

import { SequenceValidator } from './sequence-validator';
import { SpatialValidator } from './spatial-validator';

/**
 * Runs both validators over a group collection
 *
 * Large jumps are reported but do not make a page invalid; nothing can
 * repair them.
 */
export class LayoutValidator {
  readonly sequence: SequenceValidator;
  readonly spatial: SpatialValidator;

  constructor(
    logger: LoggerMethods,
    options: SequenceValidatorOptions & SpatialValidatorOptions,
  ) {
    this.sequence = new SequenceValidator(logger, options);
    this.spatial = new SpatialValidator(logger, options);
  }

  validate(groups: readonly LayoutGroup[]): ValidationResult {
    const gaps = this.sequence.validate(groups);
    const conflicts = this.spatial.validate(groups);

    return {
      valid:
        conflicts.length === 0 &&
        gaps.every((gap) => gap.kind === 'large-jump'),
      gaps,
      conflicts,
    };
  }
}
