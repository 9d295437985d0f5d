/**
 * Why an element changed groups
 */
export type ElementMoveReason = 'spatial-conflict';

/**
 * Audit record of one reassignment
 */
export interface ElementMove {
  elementId: string;
  fromGroupId: string;
  toGroupId: string;
  reason: ElementMoveReason;
}

/**
 * Correction that was considered but not applied
 *
 * - `no-candidate`: no digit substitution landed in the window
 * - `fills-gap`: the out-of-order number is held by no other group and lies
 *   inside the page's range, so renaming it would lose it
 * - `element-not-found`: a conflicting element matched no group member
 */
export interface CorrectionFailure {
  kind: 'no-candidate' | 'fills-gap' | 'element-not-found';
  message: string;
  groupId?: string;
  elementId?: string;
}

export interface CorrectionResult {
  /** Old group id to corrected identifier */
  renames: Record<string, number>;

  /** Missing identifiers recorded without inventing elements */
  recovered: number[];

  /** Element id to destination group id (after renames) */
  reassignments: Record<string, string>;

  moves: ElementMove[];

  failures: CorrectionFailure[];
}
