/**
 * Configuration constants for LayoutProfiler
 */
export const LAYOUT_PROFILER = {
  /**
   * Minimum anchors before column clustering is attempted
   */
  MIN_ANCHORS_FOR_SPLIT: 2,

  /**
   * Minimum width of a section header, as a share of region width, to act
   * as a horizontal separator
   */
  SEPARATOR_MIN_WIDTH_RATIO: 0.8,

  /**
   * Separator top must lie within this share of the region height
   */
  SEPARATOR_TOP_ZONE_RATIO: 0.15,

  /**
   * Minimum distance between the two column centers in pixels
   */
  MIN_CLUSTER_SEPARATION_PX: 50,

  /**
   * Two clusters are kept only when their within-cluster variance is at most
   * this share of the single-cluster variance
   */
  MAX_SPLIT_VARIANCE_RATIO: 0.5,

  /**
   * Share of region height separating top and bottom anchors for mixed
   * layout detection
   */
  TOP_BOTTOM_SPLIT_RATIO: 0.4,

  /**
   * Anchor X std equal to this share of page width maps to consistency 0
   */
  CONSISTENCY_STD_RATIO: 0.3,

  /**
   * Consistency reported when page width is unknown
   */
  UNKNOWN_WIDTH_CONSISTENCY: 0.5,

  /**
   * Same-row band: |Δcy| below this share of the mean height of both boxes
   */
  ADJACENCY_Y_CENTER_RATIO: 0.7,

  /**
   * Same-row band: |child.x1 - anchor.x2| below this distance in pixels
   */
  ADJACENCY_X_PROXIMITY_PX: 50,
} as const;

/**
 * Configuration constants for SpatialPartitioner
 */
export const SPATIAL_PARTITIONER = {
  /**
   * Children of these classes are always candidates for lookahead
   */
  LARGE_ELEMENT_CLASSES: ['figure', 'table', 'formula', 'flowchart'],

  /**
   * Any child at least this large (px²) is a lookahead candidate
   */
  LARGE_ELEMENT_AREA_PX2: 40_000,

  /**
   * Lookahead leaves a child alone when its top is within this distance of
   * its owner's top
   */
  LOOKAHEAD_MIN_Y_DISTANCE_PX: 75,

  /**
   * Vertical gap split threshold: max(mean anchor height × ratio, minimum)
   */
  VERTICAL_GAP_HEIGHT_RATIO: 1.5,
  VERTICAL_GAP_MIN_PX: 100,

  /**
   * Fallback anchor height when every anchor has zero height
   */
  DEFAULT_ANCHOR_HEIGHT_PX: 30,

  /**
   * Recursion guard for nested region splits
   */
  MAX_SPLIT_DEPTH: 8,
} as const;

/**
 * Penalty weights used by the hybrid strategy (lower total wins)
 */
export const GROUPING_PENALTY = {
  ANCHORLESS_GROUP: 5.0,
  ANCHORLESS_GROUP_CHILD: 1.5,
  CHILDLESS_ANCHOR: 1.0,
  CHILD_ABOVE_ANCHOR: 1.0,
  CHILD_OUTSIDE_COLUMN: 0.5,
  ORPHAN_CHILD: 2.0,
  UNASSIGNED_ANCHOR: 1.5,

  /**
   * Child counts as outside its column when |Δcx| exceeds this share of
   * page width
   */
  COLUMN_OFFSET_RATIO: 0.4,
} as const;

/**
 * Thresholds for strategy recommendation
 */
export const STRATEGY_SELECTION = {
  /**
   * Widest page still handled by the direct strategy in clean two-column
   * layouts (scanned worksheets)
   */
  MAX_DIRECT_PAGE_WIDTH: 2000,

  /**
   * Two-column pages with fewer anchors fall back to legacy-local
   */
  MIN_ANCHORS_FOR_DIRECT: 8,
} as const;

/**
 * Configuration constants for CorrectionEngine
 */
export const CORRECTION = {
  /**
   * IoU difference above which a conflicting element follows the higher
   * IoU; below it the nearest envelope center decides
   */
  REASSIGN_IOU_DELTA: 0.15,

  /**
   * Coordinate tolerance when locating an element by its box
   */
  BOX_MATCH_TOLERANCE: 1,
} as const;

/**
 * Configuration constants for SpatialValidator
 */
export const SPATIAL_VALIDATOR = {
  /**
   * A group taller than this share of the page is reported as abnormal
   */
  ABNORMAL_HEIGHT_RATIO: 1 / 3,
} as const;
