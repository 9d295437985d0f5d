export {
  DEFAULT_DIGIT_CONFUSIONS,
  engineOptionsFromEnv,
  engineOptionsSchema,
  resolveEngineOptions,
} from './config/engine-options';
export type {
  ColumnOrder,
  EngineOptions,
  EngineOptionsInput,
} from './config/engine-options';
export {
  CORRECTION,
  GROUPING_PENALTY,
  LAYOUT_PROFILER,
  SPATIAL_PARTITIONER,
  SPATIAL_VALIDATOR,
  STRATEGY_SELECTION,
} from './config/constants';
export { CorrectionEngine } from './correction/correction-engine';
export type { CorrectionOutcome } from './correction/correction-engine';
export {
  chooseCandidate,
  digitSubstitutionCandidates,
} from './correction/digit-confusion';
export { filterElements, readingOrder } from './elements/element-filter';
export { parseAnchorIdentifier } from './elements/anchor-identifier';
export { parsePageInput, pageInputSchema } from './elements/element-schema';
export {
  InvalidEngineOptionsError,
  LayoutEngineError,
  MalformedElementError,
} from './errors/layout-engine-error';
export type { InputIssue } from './errors/layout-engine-error';
export * as geometry from './geometry/bounding-box';
export { GroupCollection } from './groups/group-collection';
export { LayoutReconstructor } from './layout-reconstructor';
export type { LayoutReconstructorOptions } from './layout-reconstructor';
export { SpatialPartitioner } from './partition/spatial-partitioner';
export { LayoutProfiler } from './profiler/layout-profiler';
export { describePageLayout } from './profiler/page-layout';
export type { PageSize } from './profiler/page-layout';
export type { AssignmentStrategy } from './strategies/assignment-strategy';
export { scoreGrouping } from './strategies/grouping-penalty';
export { HybridStrategy } from './strategies/hybrid-strategy';
export type { HybridOutcome } from './strategies/hybrid-strategy';
export { LegacyLocalStrategy } from './strategies/legacy-local-strategy';
export { recommendStrategy } from './strategies/strategy-recommendation';
export { StrategySelector } from './strategies/strategy-selector';
export type {
  CommitResult,
  ReconstructDocumentOptions,
  ReconstructionResultStore,
} from './types';
export { flattenGroups } from './utils/flatten-groups';
export { LayoutValidator } from './validators/layout-validator';
export { SequenceValidator } from './validators/sequence-validator';
export { SpatialValidator } from './validators/spatial-validator';
