export type {
  CorrectionFailure,
  CorrectionResult,
  ElementMove,
  ElementMoveReason,
} from './correction-result';
export {
  ANCHOR_CLASSES,
  CHILD_CLASSES,
  ELEMENT_CLASSES,
  UNPARSED_IDENTIFIER,
  WORKSHEET_CHILD_CLASSES,
  isAnchorClass,
} from './layout-element';
export type {
  Anchor,
  AnchorClass,
  AnchorIdentifier,
  BoundingBox,
  ChildClass,
  ElementClass,
  LayoutElement,
} from './layout-element';
export type { LayoutGroup, LayoutPartition } from './layout-group';
export { STRATEGY_NAMES } from './layout-profile';
export type {
  LayoutProfile,
  LayoutTopology,
  PageLayout,
  StrategyName,
} from './layout-profile';
export type {
  FlattenedElement,
  FlattenedRole,
  PageAudit,
  PageInput,
  PageReconstruction,
} from './reconstruction';
export type {
  RangeConflict,
  SequenceGap,
  SequenceGapKind,
  ValidationResult,
} from './validation-result';
