import type {
  Anchor,
  AnchorIdentifier,
  LayoutElement,
  LayoutGroup,
} from '@regroup/model';

import { union } from '../geometry/bounding-box';

/**
 * Mutable group under construction during assignment
 */
export interface GroupDraft {
  anchor: Anchor;
  children: LayoutElement[];
}

/**
 * Build a frozen group; the envelope is always derived from its members
 */
export function createGroup(
  id: string,
  anchor: Anchor,
  children: readonly LayoutElement[],
  identifier: AnchorIdentifier = anchor.identifier,
): LayoutGroup {
  const envelope = children.reduce(
    (box, child) => union(box, child.bbox),
    anchor.element.bbox,
  );

  return Object.freeze({
    id,
    identifier,
    anchor:
      identifier === anchor.identifier ? anchor : { ...anchor, identifier },
    children: Object.freeze([...children]),
    envelope,
  });
}

/**
 * Group key: the identifier for the first question number carrying it,
 * otherwise a key derived from the anchor element
 */
export function groupKey(
  anchor: Anchor,
  usedKeys: ReadonlySet<string>,
): string {
  if (
    anchor.element.className === 'question_number' &&
    typeof anchor.identifier === 'number'
  ) {
    const key = String(anchor.identifier);
    if (!usedKeys.has(key)) {
      return key;
    }
  }
  return `anchor:${anchor.element.id}`;
}

/**
 * Freeze drafts into groups with unique keys, preserving order
 */
export function buildGroups(drafts: readonly GroupDraft[]): LayoutGroup[] {
  const usedKeys = new Set<string>();

  return drafts.map((draft) => {
    const key = groupKey(draft.anchor, usedKeys);
    usedKeys.add(key);
    return createGroup(key, draft.anchor, draft.children);
  });
}

/**
 * Anchor and children of a group, anchor first
 */
export function groupMembers(group: LayoutGroup): LayoutElement[] {
  return [group.anchor.element, ...group.children];
}
