import type { LoggerMethods } from '@regroup/logger';
import type { LayoutGroup, SequenceGap } from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';

import { groupBy, range, sortBy, uniq } from 'es-toolkit';

import { EngineComponent } from '../core/engine-component';

/**
 * Numbered group in reading order
 */
export interface SequenceEntry {
  groupId: string;
  identifier: number;
}

export type SequenceValidatorOptions = Pick<
  EngineOptions,
  'sequenceLargeJump'
>;

/**
 * SequenceValidator
 *
 * Checks that question numbers increase along the reading order.
 *
 * ## Classification
 *
 * - reverse: lower than the last accepted number; excluded afterwards.
 *   When that number continues the sequence from the one accepted before
 *   the last (`2, 8, 4`), the last one is the inflated misread and is set
 *   aside instead
 * - forward-gap: the sorted accepted numbers skip 1..`sequenceLargeJump`-1
 *   values
 * - large-jump: a wider skip, usually a page boundary or section restart
 */
export class SequenceValidator extends EngineComponent {
  private readonly largeJump: number;

  constructor(logger: LoggerMethods, options: SequenceValidatorOptions) {
    super(logger, 'SequenceValidator');
    this.largeJump = options.sequenceLargeJump;
  }

  /**
   * Validate the numbered question groups of a page
   *
   * Only `question_number` anchors with a parsed identifier take part.
   */
  validate(groups: readonly LayoutGroup[]): SequenceGap[] {
    const entries = numberedEntries(groups);

    for (const holders of duplicateHolders(entries)) {
      this.log(
        'warn',
        `Question number ${holders[0].identifier} is held by ${holders.length} groups: ${holders.map((holder) => holder.groupId).join(', ')}`,
      );
    }

    const gaps = this.classify(entries);
    if (gaps.length > 0) {
      this.log(
        'info',
        `Found ${gaps.length} sequence gap(s) in ${entries.length} numbered group(s)`,
      );
    }
    return gaps;
  }

  /**
   * Question numbers held by more than one numbered group, ascending
   */
  findDuplicates(groups: readonly LayoutGroup[]): number[] {
    return sortBy(
      duplicateHolders(numberedEntries(groups)).map(
        (holders) => holders[0].identifier,
      ),
      [(identifier) => identifier],
    );
  }

  /**
   * Classify identifiers given in reading order
   */
  classify(entries: readonly SequenceEntry[]): SequenceGap[] {
    const gaps: SequenceGap[] = [];
    const accepted: SequenceEntry[] = [];

    for (const entry of entries) {
      const last =
        accepted.length > 0 ? accepted[accepted.length - 1] : undefined;
      if (last === undefined || entry.identifier >= last.identifier) {
        accepted.push(entry);
        continue;
      }

      const previous =
        accepted.length > 1 ? accepted[accepted.length - 2] : undefined;
      if (previous && isInflated(previous, last, entry)) {
        accepted.pop();
        accepted.push(entry);
        gaps.push({
          kind: 'reverse',
          before: previous.identifier,
          after: last.identifier,
          missing: [],
          expectedNext: previous.identifier + 1,
          suspectGroupId: last.groupId,
        });
        continue;
      }

      gaps.push({
        kind: 'reverse',
        before: last.identifier,
        after: entry.identifier,
        missing: [],
        expectedNext: last.identifier + 1,
        suspectGroupId: entry.groupId,
      });
    }

    const ordered = sortBy(uniq(accepted.map((entry) => entry.identifier)), [
      (value) => value,
    ]);
    for (let index = 1; index < ordered.length; index++) {
      const before = ordered[index - 1];
      const after = ordered[index];
      const step = after - before;
      if (step <= 1) {
        continue;
      }

      if (step <= this.largeJump) {
        gaps.push({
          kind: 'forward-gap',
          before,
          after,
          missing: range(before + 1, after),
          expectedNext: before + 1,
        });
      } else {
        gaps.push({
          kind: 'large-jump',
          before,
          after,
          missing: [],
          expectedNext: before + 1,
        });
      }
    }

    return gaps;
  }

  static reverseGaps(gaps: readonly SequenceGap[]): SequenceGap[] {
    return gaps.filter((gap) => gap.kind === 'reverse');
  }

  static forwardGaps(gaps: readonly SequenceGap[]): SequenceGap[] {
    return gaps.filter((gap) => gap.kind === 'forward-gap');
  }

  /**
   * Whether a reverse gap looks like one misread digit: the out-of-order
   * number and the expected one have the same length and differ in one
   * position
   */
  static isLikelyDigitMisread(gap: SequenceGap): boolean {
    if (gap.kind !== 'reverse') {
      return false;
    }
    const actual = String(gap.after);
    const expected = String(gap.expectedNext);
    if (actual.length !== expected.length) {
      return false;
    }

    let differences = 0;
    for (let index = 0; index < actual.length; index++) {
      if (actual[index] !== expected[index]) {
        differences++;
      }
    }
    return differences === 1;
  }
}

function numberedEntries(groups: readonly LayoutGroup[]): SequenceEntry[] {
  const entries: SequenceEntry[] = [];
  for (const group of groups) {
    if (
      group.anchor.element.className === 'question_number' &&
      typeof group.identifier === 'number'
    ) {
      entries.push({ groupId: group.id, identifier: group.identifier });
    }
  }
  return entries;
}

function duplicateHolders(
  entries: readonly SequenceEntry[],
): SequenceEntry[][] {
  return Object.values(groupBy(entries, (entry) => entry.identifier)).filter(
    (holders) => holders.length > 1,
  );
}

/**
 * `last` sits between `previous` and `current` in reading order, yet
 * `current` follows `previous` with at most one number skipped while `last`
 * overshoots it: `last` is the misread
 */
function isInflated(
  previous: SequenceEntry,
  last: SequenceEntry,
  current: SequenceEntry,
): boolean {
  return (
    current.identifier > previous.identifier &&
    current.identifier <= previous.identifier + 2 &&
    current.identifier < last.identifier - 1
  );
}
