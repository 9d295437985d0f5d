import type { LayoutGroup, ValidationResult } from '@regroup/model';

import { beforeEach, describe, expect, test } from 'vitest';

import { resolveEngineOptions } from '../config/engine-options';
import { GroupCollection } from '../groups/group-collection';
import {
  createMockLogger,
  describeGroups,
  numberedGroup,
  overlappingGroups,
} from '../testing/fixtures';
import { LayoutValidator } from '../validators/layout-validator';
import { CorrectionEngine } from './correction-engine';

function column(...numbers: number[]): LayoutGroup[] {
  return numbers.map((n, index) => numberedGroup(n, 100, 100 + index * 200));
}

describe('CorrectionEngine', () => {
  const options = resolveEngineOptions();
  let logger: ReturnType<typeof createMockLogger>;
  let engine: CorrectionEngine;
  let validator: LayoutValidator;

  beforeEach(() => {
    logger = createMockLogger();
    engine = new CorrectionEngine(logger, options);
    validator = new LayoutValidator(logger, options);
  });

  function correct(groups: LayoutGroup[]) {
    const collection = GroupCollection.from(groups);
    return {
      input: collection,
      ...engine.correct(collection, validator.validate(groups)),
    };
  }

  test('leaves a valid collection untouched', () => {
    const { input, collection, result } = correct(column(1, 2, 3));

    expect(collection).toBe(input);
    expect(result).toEqual({
      renames: {},
      recovered: [],
      reassignments: {},
      moves: [],
      failures: [],
    });
  });

  test('records a skipped number without inventing a group', () => {
    const { input, collection, result } = correct(column(1, 2, 4));

    expect(collection).toBe(input);
    expect(result.recovered).toEqual([3]);
    expect(result.renames).toEqual({});
  });

  test('repairs a misread number from its confusable digits', () => {
    const { collection, result } = correct(column(295, 204, 296));

    expect(result.renames).toEqual({ '204': 294 });
    expect(collection.ids()).toEqual(['295', '294', '296']);
    expect(collection.get('294')?.identifier).toBe(294);
    expect(collection.get('294')?.anchor.identifier).toBe(294);
    expect(logger.info).toHaveBeenCalledWith(
      '[CorrectionEngine] Group 204: read 204 as 294 (expected 296)',
    );
  });

  test('merges a repaired number into the group already holding it', () => {
    const { collection, result } = correct(column(7, 8, 3, 9));

    expect(result.renames).toEqual({ '3': 8 });
    expect(collection.ids()).toEqual(['7', '8', '9']);
    expect(describeGroups([...collection])).toEqual(['7: ', '8: q3', '9: ']);
    expect(logger.info).toHaveBeenCalledWith(
      '[CorrectionEngine] Merged group 3 into existing group 8',
    );
  });

  test('keeps correctly read numbers that are only out of order', () => {
    const { collection, result } = correct(column(1, 3, 5, 7, 2, 4, 6, 8));

    expect(result.renames).toEqual({});
    expect(result.recovered).toEqual([]);
    expect(collection.ids()).toEqual(['1', '3', '5', '7', '2', '4', '6', '8']);
    expect(result.failures).toEqual(
      [2, 4, 6].map((n) => ({
        kind: 'fills-gap',
        message: `Group ${n}: keeping ${n}, no other group holds it`,
        groupId: String(n),
      })),
    );
  });

  test('repairs an inflated number once the following ones continue', () => {
    const { collection, result } = correct(column(1, 2, 8, 4, 5, 6));

    expect(result.renames).toEqual({ '8': 3 });
    expect(result.recovered).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(collection.ids()).toEqual(['1', '2', '3', '4', '5', '6']);
    expect(logger.info).toHaveBeenCalledWith(
      '[CorrectionEngine] Group 8: read 8 as 3 (expected 3)',
    );
  });

  test('reports a reverse number with no repair in range', () => {
    const { collection, result } = correct(column(10, 4, 11));

    expect(collection.ids()).toEqual(['10', '4', '11']);
    expect(result.failures).toEqual([
      {
        kind: 'no-candidate',
        message: 'No digit substitution of 4 lands within 2 of 11',
        groupId: '4',
      },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[CorrectionEngine] No digit substitution of 4 lands within 2 of 11',
    );
  });

  describe('spatial conflicts', () => {
    test('moves a mis-owned child to the group it lies in', () => {
      const { input, collection, result } = correct(overlappingGroups());

      expect(describeGroups([...collection])).toEqual(['1: a', '2: b, stray']);
      expect(result.moves).toEqual([
        {
          elementId: 'stray',
          fromGroupId: '1',
          toGroupId: '2',
          reason: 'spatial-conflict',
        },
      ]);
      expect(result.reassignments).toEqual({ stray: '2' });
      expect(describeGroups([...input])).toEqual(['1: a, stray', '2: b']);
    });

    test('keeps every element exactly once', () => {
      const { input, collection } = correct(overlappingGroups());

      expect(collection.elementCount()).toBe(input.elementCount());
    });

    test('leaves nothing to correct on a second pass', () => {
      const first = correct(overlappingGroups());
      const groups = [...first.collection];

      const second = engine.correct(
        first.collection,
        validator.validate(groups),
      );

      expect(second.collection).toBe(first.collection);
      expect(second.result.moves).toEqual([]);
    });

    test('reports a contributing element that cannot be found', () => {
      const groups = overlappingGroups();
      const validation: ValidationResult = {
        valid: false,
        gaps: [],
        conflicts: [
          {
            firstGroupId: '1',
            secondGroupId: '2',
            overlapArea: 12_000,
            iou: 0.15,
            contributingElementIds: ['ghost'],
            severe: true,
          },
        ],
      };

      const { result } = engine.correct(
        GroupCollection.from(groups),
        validation,
      );

      expect(result.failures).toEqual([
        {
          kind: 'element-not-found',
          message: 'Element ghost matches no group member',
          elementId: 'ghost',
        },
      ]);
    });
  });

  describe('applyCorrection', () => {
    test('replays moves and renames on the original groups', () => {
      const groups = [
        ...overlappingGroups(),
        numberedGroup(5, 100, 700),
        numberedGroup(3, 100, 900),
        numberedGroup(6, 100, 1100),
      ];
      const { input, collection, result } = correct(groups);

      const replayed = engine.applyCorrection(input, result);

      expect(result.renames).toEqual({ '3': 8 });
      expect(describeGroups([...replayed])).toEqual(
        describeGroups([...collection]),
      );
    });
  });
});
