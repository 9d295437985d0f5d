import type {
  Anchor,
  AnchorIdentifier,
  BoundingBox,
  LayoutElement,
} from './layout-element';

/**
 * Anchor-rooted group of elements
 *
 * `envelope` is always the minimal box around the anchor and every child.
 * Groups are frozen; every change produces a new group.
 */
export interface LayoutGroup {
  /** Unique key within a collection */
  readonly id: string;

  readonly identifier: AnchorIdentifier;

  readonly anchor: Anchor;

  /** Children in reading order */
  readonly children: readonly LayoutElement[];

  readonly envelope: BoundingBox;
}

/**
 * Output of an assignment strategy for one page
 */
export interface LayoutPartition {
  /** Groups in reading order */
  groups: LayoutGroup[];

  /** Children no anchor could claim (header/footer candidates) */
  orphans: LayoutElement[];
}
