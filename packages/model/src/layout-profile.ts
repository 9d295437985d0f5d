/**
 * Page arrangement detected from anchor positions
 *
 * - `single-column`: one reading column
 * - `two-column`: two side-by-side columns
 * - `mixed`: one column on top and two below, or the reverse
 * - `horizontal-split`: a full-width section header near the top splits the page
 */
export type LayoutTopology =
  | 'single-column'
  | 'two-column'
  | 'mixed'
  | 'horizontal-split';

export const STRATEGY_NAMES = ['direct', 'legacy-local', 'hybrid'] as const;

/**
 * Assignment strategy identifier
 */
export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Page extents and arrangement; all a strategy needs to partition a page
 */
export interface PageLayout {
  /** Page width in pixels (given or estimated from max extents) */
  pageWidth: number;

  /** Page height in pixels (given or estimated from max extents) */
  pageHeight: number;

  topology: LayoutTopology;
}

/**
 * Statistics and recommendation produced by the layout profiler
 */
export interface LayoutProfile extends PageLayout {

  /** Population std of anchor X centers */
  anchorXStd: number;

  /** 0-1 score, 1 when anchors share the same X */
  consistencyScore: number;

  /** Share of anchors with a same-row child next to them */
  horizontalAdjacencyRatio: number;

  anchorCount: number;

  /** Population variance of anchor Y centers */
  anchorYVariance: number;

  recommendedStrategy: StrategyName;
}
