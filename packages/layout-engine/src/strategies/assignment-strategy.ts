import type {
  LayoutElement,
  LayoutPartition,
  PageLayout,
  StrategyName,
} from '@regroup/model';

/**
 * Assigns the children of one page to its anchors
 *
 * Implementations receive elements that already passed preprocessing and
 * must place every element exactly once: as an anchor, a child or an orphan.
 */
export interface AssignmentStrategy {
  readonly name: StrategyName;

  assign(
    elements: readonly LayoutElement[],
    layout: PageLayout,
  ): LayoutPartition;
}
