import type { LoggerMethods } from '@regroup/logger';
import type {
  CorrectionFailure,
  CorrectionResult,
  ElementMove,
  RangeConflict,
  SequenceGap,
  ValidationResult,
} from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';

import { uniq } from 'es-toolkit';

import { CORRECTION } from '../config/constants';
import { EngineComponent } from '../core/engine-component';
import { GroupCollection } from '../groups/group-collection';
import { SequenceValidator } from '../validators/sequence-validator';
import {
  chooseCandidate,
  digitSubstitutionCandidates,
} from './digit-confusion';
import { chooseOwner } from './element-reassigner';

export type CorrectionEngineOptions = Pick<
  EngineOptions,
  'correctionWindow' | 'digitConfusions'
>;

export interface CorrectionOutcome {
  collection: GroupCollection;
  result: CorrectionResult;
}

export function emptyCorrectionResult(): CorrectionResult {
  return {
    renames: {},
    recovered: [],
    reassignments: {},
    moves: [],
    failures: [],
  };
}

/**
 * CorrectionEngine
 *
 * Repairs a validated group collection without touching the input:
 *
 * 1. OCR repair: an out-of-order number is replaced by the confusable-digit
 *    substitution that lands on (or near) the expected number. A number
 *    that no other group holds and that lies inside the page's range is
 *    read correctly but placed out of order (e.g. row-wise numbering read
 *    column by column) and is kept
 * 2. Gap recording: numbers skipped by forward gaps are recorded, never
 *    invented
 * 3. Reassignment: children behind an envelope overlap move to the group
 *    they fit better
 * 4. Merge: repaired numbers are applied; a number that is already taken
 *    merges the two groups
 */
export class CorrectionEngine extends EngineComponent {
  private readonly options: CorrectionEngineOptions;

  constructor(logger: LoggerMethods, options: CorrectionEngineOptions) {
    super(logger, 'CorrectionEngine');
    this.options = options;
  }

  correct(
    collection: GroupCollection,
    validation: ValidationResult,
  ): CorrectionOutcome {
    const result = emptyCorrectionResult();
    if (validation.valid) {
      return { collection, result };
    }

    this.repairIdentifiers(collection, validation.gaps, result);
    const reassigned = this.reassignElements(
      collection,
      validation.conflicts,
      result,
    );
    const finalIds = new Map<string, string>();
    const merged = this.applyRenames(reassigned, result.renames, finalIds);

    for (const move of result.moves) {
      result.reassignments[move.elementId] =
        finalIds.get(move.toGroupId) ?? move.toGroupId;
    }
    result.recovered = uniq(
      SequenceValidator.forwardGaps(validation.gaps).flatMap(
        (gap) => gap.missing,
      ),
    ).filter((identifier) => !merged.has(String(identifier)));

    this.log(
      'info',
      `Corrected page: ${Object.keys(result.renames).length} rename(s), ${result.moves.length} move(s), ${result.recovered.length} recovered number(s), ${result.failures.length} failure(s)`,
    );
    return { collection: merged, result };
  }

  /**
   * Replay a stored correction: moves first, then renames
   *
   * @throws {LayoutEngineError} When a move or rename no longer applies
   */
  applyCorrection(
    collection: GroupCollection,
    result: CorrectionResult,
  ): GroupCollection {
    const moved = result.moves.reduce(
      (current, move) =>
        current.moveChild(move.elementId, move.fromGroupId, move.toGroupId),
      collection,
    );
    return this.applyRenames(moved, result.renames, new Map());
  }

  private repairIdentifiers(
    collection: GroupCollection,
    gaps: readonly SequenceGap[],
    result: CorrectionResult,
  ): void {
    for (const gap of SequenceValidator.reverseGaps(gaps)) {
      const groupId = gap.suspectGroupId;
      if (groupId === undefined || !collection.has(groupId)) {
        continue;
      }

      if (fillsSequenceHole(collection, groupId, gap.after)) {
        this.fail(result, {
          kind: 'fills-gap',
          message: `Group ${groupId}: keeping ${gap.after}, no other group holds it`,
          groupId,
        });
        continue;
      }

      const chosen = chooseCandidate(
        digitSubstitutionCandidates(gap.after, this.options.digitConfusions),
        gap.expectedNext,
        this.options.correctionWindow,
      );
      if (chosen === undefined || chosen === gap.after) {
        this.fail(result, {
          kind: 'no-candidate',
          message: `No digit substitution of ${gap.after} lands within ${this.options.correctionWindow} of ${gap.expectedNext}`,
          groupId,
        });
        continue;
      }

      result.renames[groupId] = chosen;
      this.log(
        'info',
        `Group ${groupId}: read ${gap.after} as ${chosen} (expected ${gap.expectedNext})`,
      );
    }
  }

  private reassignElements(
    validated: GroupCollection,
    conflicts: readonly RangeConflict[],
    result: CorrectionResult,
  ): GroupCollection {
    let working = validated;
    const handled = new Set<string>();

    for (const conflict of conflicts) {
      for (const elementId of conflict.contributingElementIds) {
        if (handled.has(elementId)) {
          continue;
        }
        handled.add(elementId);

        const original = validated.findChild(elementId);
        const located = original
          ? working.findChildByBox(
              original.element.bbox,
              CORRECTION.BOX_MATCH_TOLERANCE,
            )
          : undefined;
        if (!original || !located) {
          this.fail(result, {
            kind: 'element-not-found',
            message: `Element ${elementId} matches no group member`,
            elementId,
          });
          continue;
        }

        const otherId =
          original.group.id === conflict.firstGroupId
            ? conflict.secondGroupId
            : conflict.firstGroupId;
        const other = working.get(otherId);
        if (!other || other.id === located.group.id) {
          continue;
        }

        const targetId = chooseOwner(located.element, located.group, other);
        if (targetId === located.group.id) {
          continue;
        }

        working = working.moveChild(
          located.element.id,
          located.group.id,
          targetId,
        );
        const move: ElementMove = {
          elementId: located.element.id,
          fromGroupId: located.group.id,
          toGroupId: targetId,
          reason: 'spatial-conflict',
        };
        result.moves.push(move);
        this.log(
          'info',
          `Moved ${move.elementId} from group ${move.fromGroupId} to group ${move.toGroupId}`,
        );
      }
    }

    return working;
  }

  /**
   * @param finalIds - Filled with old id to final id for every rename
   */
  private applyRenames(
    collection: GroupCollection,
    renames: Readonly<Record<string, number>>,
    finalIds: Map<string, string>,
  ): GroupCollection {
    let current = collection;
    for (const [groupId, identifier] of Object.entries(renames)) {
      const renamed = current.renameGroup(groupId, identifier);
      current = renamed.collection;
      finalIds.set(groupId, renamed.finalId);
      if (renamed.merged) {
        this.log(
          'info',
          `Merged group ${groupId} into existing group ${renamed.finalId}`,
        );
      }
    }
    return current;
  }

  private fail(result: CorrectionResult, failure: CorrectionFailure): void {
    result.failures.push(failure);
    this.log('warn', failure.message);
  }
}

/**
 * Whether `identifier` is missing from every other numbered group while
 * lying strictly inside their range, so renaming its group would lose it
 */
function fillsSequenceHole(
  collection: GroupCollection,
  groupId: string,
  identifier: number,
): boolean {
  const others = collection
    .toArray()
    .flatMap((group) =>
      group.id !== groupId &&
      group.anchor.element.className === 'question_number' &&
      typeof group.identifier === 'number'
        ? [group.identifier]
        : [],
    );
  if (others.length === 0 || others.includes(identifier)) {
    return false;
  }
  return identifier > Math.min(...others) && identifier < Math.max(...others);
}
