import type {
  FlattenedElement,
  LayoutElement,
  LayoutGroup,
} from '@regroup/model';

import { readingOrder } from '../elements/element-filter';

/**
 * Groups and orphans of a page
 */
export interface GroupedPage {
  groups: readonly LayoutGroup[];
  orphans: readonly LayoutElement[];
}

/**
 * Assign every element its global reading position
 *
 * Orphans (headers and other unanchored content) come first in reading
 * order, then each group with its anchor before its children.
 */
export function flattenGroups(page: GroupedPage): FlattenedElement[] {
  const flattened: FlattenedElement[] = [];

  readingOrder(page.orphans).forEach((element, index) => {
    flattened.push({
      element,
      role: 'orphan',
      globalOrder: flattened.length,
      groupIndex: null,
      groupId: null,
      orderInGroup: index,
    });
  });

  page.groups.forEach((group, groupIndex) => {
    flattened.push({
      element: group.anchor.element,
      role: 'anchor',
      globalOrder: flattened.length,
      groupIndex,
      groupId: group.id,
      orderInGroup: 0,
    });
    group.children.forEach((element, index) => {
      flattened.push({
        element,
        role: 'child',
        globalOrder: flattened.length,
        groupIndex,
        groupId: group.id,
        orderInGroup: index + 1,
      });
    });
  });

  return flattened;
}
