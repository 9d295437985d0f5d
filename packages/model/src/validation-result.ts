/**
 * Kind of irregularity between two adjacent identifiers
 */
export type SequenceGapKind = 'forward-gap' | 'reverse' | 'large-jump';

export interface SequenceGap {
  kind: SequenceGapKind;

  /** Identifier preceding the gap */
  before: number;

  /** Identifier following the gap */
  after: number;

  /** Integers strictly between `before` and `after` (forward gaps only) */
  missing: number[];

  /** `before + 1` */
  expectedNext: number;

  /**
   * Group holding the out-of-order identifier (reverse gaps only); either
   * the number read after `before`, or an inflated number set aside
   * because the numbers after it continue from `before`
   */
  suspectGroupId?: string;
}

/**
 * Two groups whose envelopes overlap beyond the configured IoU
 */
export interface RangeConflict {
  firstGroupId: string;
  secondGroupId: string;
  overlapArea: number;
  iou: number;

  /** Children whose own box overlaps the other group's envelope */
  contributingElementIds: string[];

  /** Overlap area above the severe threshold */
  severe: boolean;
}

export interface ValidationResult {
  /** No correctable gap and no conflict */
  valid: boolean;
  gaps: SequenceGap[];
  conflicts: RangeConflict[];
}
