import type { CorrectionResult } from './correction-result';
import type { LayoutElement } from './layout-element';
import type { LayoutGroup } from './layout-group';
import type {
  LayoutProfile,
  PageLayout,
  StrategyName,
} from './layout-profile';
import type { ValidationResult } from './validation-result';

/**
 * One page handed over by the detection collaborators
 */
export interface PageInput {
  /** Caller key (e.g. page number) used for persistence */
  pageKey?: string;

  /** Page width in pixels, estimated from elements when absent */
  width?: number;

  /** Page height in pixels, estimated from elements when absent */
  height?: number;

  /** Unordered element batch */
  elements: LayoutElement[];
}

/**
 * Result of reconstructing one page
 */
export interface PageReconstruction {
  pageKey?: string;

  /** Extents and topology the strategy partitioned against */
  layout: PageLayout;

  /** Absent when the strategy was forced and profiling was skipped */
  profile?: LayoutProfile;

  strategy: StrategyName;

  /** Groups as assigned, before correction */
  initialGroups: readonly LayoutGroup[];

  /** Groups after correction, in reading order */
  groups: readonly LayoutGroup[];

  orphans: readonly LayoutElement[];

  /** Validation of the initial groups */
  validation: ValidationResult;

  /** Present only when the initial groups were invalid */
  correction?: CorrectionResult;

  /** Validation of the final groups */
  finalValidation: ValidationResult;

  audit: PageAudit;
}

/**
 * Findings kept for review; none of them affects validity
 */
export interface PageAudit {
  /** Final groups taller than a third of the page */
  abnormalGroupIds: string[];

  /**
   * Groups whose out-of-order number differs from the expected one in a
   * single digit
   */
  likelyMisreadGroupIds: string[];

  /** Question numbers held by more than one final group, ascending */
  duplicateIdentifiers: number[];
}

/**
 * Role of an element in flattened output
 */
export type FlattenedRole = 'orphan' | 'anchor' | 'child';

/**
 * Element with its global reading position
 */
export interface FlattenedElement {
  element: LayoutElement;
  role: FlattenedRole;

  /** 0-based order across the whole page */
  globalOrder: number;

  /** Index of the owning group, null for orphans */
  groupIndex: number | null;

  groupId: string | null;

  /** 0 for the anchor, 1.. for children; orphans count among themselves */
  orderInGroup: number;
}
