import type { BoundingBox, LayoutElement, LayoutGroup } from '@regroup/model';

import { LayoutEngineError } from '../errors/layout-engine-error';
import { boxesMatch } from '../geometry/bounding-box';
import { createGroup } from './group-factory';

export interface LocatedElement {
  group: LayoutGroup;
  element: LayoutElement;
}

/**
 * GroupCollection
 *
 * Ordered, immutable set of groups keyed by group id. Every change returns a
 * new collection that shares the untouched groups with its predecessor, so
 * the state before and after a correction can be kept side by side.
 */
export class GroupCollection implements Iterable<LayoutGroup> {
  private readonly groups: readonly LayoutGroup[];
  private readonly positions: ReadonlyMap<string, number>;

  private constructor(groups: readonly LayoutGroup[]) {
    const positions = new Map<string, number>();
    groups.forEach((group, index) => {
      if (positions.has(group.id)) {
        throw new LayoutEngineError(`Duplicate group id "${group.id}"`);
      }
      positions.set(group.id, index);
    });
    this.groups = Object.freeze([...groups]);
    this.positions = positions;
  }

  static empty(): GroupCollection {
    return new GroupCollection([]);
  }

  /**
   * @throws {LayoutEngineError} When two groups share an id
   */
  static from(groups: readonly LayoutGroup[]): GroupCollection {
    return new GroupCollection(groups);
  }

  get size(): number {
    return this.groups.length;
  }

  [Symbol.iterator](): Iterator<LayoutGroup> {
    return this.groups[Symbol.iterator]();
  }

  toArray(): readonly LayoutGroup[] {
    return this.groups;
  }

  ids(): string[] {
    return this.groups.map((group) => group.id);
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  get(id: string): LayoutGroup | undefined {
    const position = this.positions.get(id);
    return position === undefined ? undefined : this.groups[position];
  }

  /**
   * Anchors plus children over all groups
   */
  elementCount(): number {
    return this.groups.reduce(
      (count, group) => count + 1 + group.children.length,
      0,
    );
  }

  /**
   * Find the group that owns a child element
   */
  findChild(elementId: string): LocatedElement | undefined {
    for (const group of this.groups) {
      const element = group.children.find((child) => child.id === elementId);
      if (element) {
        return { group, element };
      }
    }
    return undefined;
  }

  /**
   * Find a child by its box; anchors are never matched
   */
  findChildByBox(
    box: BoundingBox,
    tolerance: number,
  ): LocatedElement | undefined {
    for (const group of this.groups) {
      const element = group.children.find((child) =>
        boxesMatch(child.bbox, box, tolerance),
      );
      if (element) {
        return { group, element };
      }
    }
    return undefined;
  }

  /**
   * Move a child to the end of another group
   *
   * @throws {LayoutEngineError} When either group or the child is missing
   */
  moveChild(
    elementId: string,
    fromId: string,
    toId: string,
  ): GroupCollection {
    const from = this.require(fromId);
    const to = this.require(toId);
    const element = from.children.find((child) => child.id === elementId);
    if (!element) {
      throw new LayoutEngineError(
        `Element "${elementId}" is not a child of group "${fromId}"`,
      );
    }
    if (fromId === toId) {
      return this;
    }

    return this.withReplaced([
      createGroup(
        from.id,
        from.anchor,
        from.children.filter((child) => child.id !== elementId),
        from.identifier,
      ),
      createGroup(to.id, to.anchor, [...to.children, element], to.identifier),
    ]);
  }

  /**
   * Give a group a corrected identifier
   *
   * When another group already uses that identifier, the two are merged:
   * the existing group keeps its anchor and position, the renamed group's
   * anchor and children are appended to its children.
   *
   * @returns The new collection and the key the renamed group ended up under
   * @throws {LayoutEngineError} When the group is missing
   */
  renameGroup(
    id: string,
    identifier: number,
  ): { collection: GroupCollection; finalId: string; merged: boolean } {
    const group = this.require(id);
    const newId = String(identifier);
    if (newId === id) {
      return { collection: this, finalId: id, merged: false };
    }

    const target = this.get(newId);
    if (!target) {
      const renamed = createGroup(
        newId,
        group.anchor,
        group.children,
        identifier,
      );
      return {
        collection: new GroupCollection(
          this.groups.map((existing) =>
            existing.id === id ? renamed : existing,
          ),
        ),
        finalId: newId,
        merged: false,
      };
    }

    const mergedGroup = createGroup(
      target.id,
      target.anchor,
      [...target.children, group.anchor.element, ...group.children],
      target.identifier,
    );
    return {
      collection: new GroupCollection(
        this.groups
          .filter((existing) => existing.id !== id)
          .map((existing) =>
            existing.id === target.id ? mergedGroup : existing,
          ),
      ),
      finalId: target.id,
      merged: true,
    };
  }

  private require(id: string): LayoutGroup {
    const group = this.get(id);
    if (!group) {
      throw new LayoutEngineError(`Unknown group "${id}"`);
    }
    return group;
  }

  private withReplaced(replacements: LayoutGroup[]): GroupCollection {
    const byId = new Map(replacements.map((group) => [group.id, group]));
    return new GroupCollection(
      this.groups.map((group) => byId.get(group.id) ?? group),
    );
  }
}
