import type {
  Anchor,
  AnchorClass,
  ChildClass,
  LayoutElement,
} from '@regroup/model';

import { isAnchorClass } from '@regroup/model';
import { sortBy } from 'es-toolkit';

import { area } from '../geometry/bounding-box';
import { toAnchor } from './anchor-identifier';

export interface ElementFilterOptions {
  worksheetMode: boolean;
  allowedAnchorClasses: readonly AnchorClass[];
  allowedChildClasses: readonly ChildClass[];
}

export type DropReason = 'zero-area' | 'class-not-allowed';

export interface DroppedElement {
  element: LayoutElement;
  reason: DropReason;
}

export interface FilteredElements {
  kept: LayoutElement[];
  dropped: DroppedElement[];
}

/**
 * Drop elements with no area and, in worksheet mode, classes outside the
 * allow-lists
 */
export function filterElements(
  elements: readonly LayoutElement[],
  options: ElementFilterOptions,
): FilteredElements {
  const kept: LayoutElement[] = [];
  const dropped: DroppedElement[] = [];

  for (const element of elements) {
    if (area(element.bbox) <= 0) {
      dropped.push({ element, reason: 'zero-area' });
    } else if (options.worksheetMode && !isAllowed(element, options)) {
      dropped.push({ element, reason: 'class-not-allowed' });
    } else {
      kept.push(element);
    }
  }

  return { kept, dropped };
}

function isAllowed(
  element: LayoutElement,
  options: ElementFilterOptions,
): boolean {
  const { className } = element;
  if (isAnchorClass(className)) {
    return options.allowedAnchorClasses.includes(className);
  }
  return options.allowedChildClasses.includes(className);
}

/**
 * Sort elements top-to-bottom, then left-to-right
 */
export function readingOrder<T extends LayoutElement>(
  elements: readonly T[],
): T[] {
  return sortBy(elements, [
    (element) => element.bbox.y1,
    (element) => element.bbox.x1,
  ]);
}

export interface AnchorSplit {
  /** Anchors in reading order */
  anchors: Anchor[];

  /** Children in reading order */
  children: LayoutElement[];
}

/**
 * Separate anchors from children and parse anchor identifiers
 */
export function splitAnchors(
  elements: readonly LayoutElement[],
  minIdentifierConfidence: number,
): AnchorSplit {
  const ordered = readingOrder(elements);
  const anchors: Anchor[] = [];
  const children: LayoutElement[] = [];

  for (const element of ordered) {
    if (isAnchorClass(element.className)) {
      anchors.push(toAnchor(element, minIdentifierConfidence));
    } else {
      children.push(element);
    }
  }

  return { anchors, children };
}
