import type { LayoutGroup } from '@regroup/model';

import { describe, expect, test } from 'vitest';

import { toAnchor } from '../elements/anchor-identifier';
import { LayoutEngineError } from '../errors/layout-engine-error';
import { envelopeOf } from '../geometry/bounding-box';
import { element, questionNumber } from '../testing/fixtures';
import { GroupCollection } from './group-collection';
import { buildGroups, createGroup, groupMembers } from './group-factory';

const expectEnvelopeInvariant = (groups: Iterable<LayoutGroup>) => {
  for (const group of groups) {
    expect(group.envelope).toEqual(
      envelopeOf(groupMembers(group).map((member) => member.bbox)),
    );
  }
};

const q1 = questionNumber('q1', 1, 50, 100);
const q2 = questionNumber('q2', 2, 50, 500);
const t1 = element('t1', 'question_text', [50, 140, 800, 300]);
const t2 = element('t2', 'question_text', [50, 540, 800, 700]);
const f1 = element('f1', 'figure', [100, 310, 400, 480]);

const sampleCollection = () =>
  GroupCollection.from(
    buildGroups([
      { anchor: toAnchor(q1), children: [t1, f1] },
      { anchor: toAnchor(q2), children: [t2] },
    ]),
  );

describe('createGroup', () => {
  test('derives the envelope from anchor and children', () => {
    const group = createGroup('1', toAnchor(q1), [t1, f1]);

    expect(group.envelope).toEqual({ x1: 50, y1: 100, x2: 800, y2: 480 });
    expect(Object.isFrozen(group)).toBe(true);
    expect(Object.isFrozen(group.children)).toBe(true);
  });

  test('updates the anchor identifier when given a new one', () => {
    const group = createGroup('7', toAnchor(q1), [], 7);

    expect(group.identifier).toBe(7);
    expect(group.anchor.identifier).toBe(7);
    expect(group.anchor.element).toBe(q1);
  });
});

describe('buildGroups', () => {
  test('keys question numbers by identifier and everything else by element', () => {
    const section = element('s1', 'question_type', [20, 20, 900, 60], {
      text: 'I. Reading',
    });
    const duplicate = questionNumber('q1b', 1, 50, 900);
    const unreadable = element('q9', 'question_number', [50, 1200, 90, 1230]);

    const groups = buildGroups([
      { anchor: toAnchor(section), children: [] },
      { anchor: toAnchor(q1), children: [] },
      { anchor: toAnchor(duplicate), children: [] },
      { anchor: toAnchor(unreadable), children: [] },
    ]);

    expect(groups.map((group) => group.id)).toEqual([
      'anchor:s1',
      '1',
      'anchor:q1b',
      'anchor:q9',
    ]);
    expect(groups[2].identifier).toBe(1);
    expect(groups[3].identifier).toBe('unparsed');
  });
});

describe('GroupCollection', () => {
  test('rejects duplicate ids', () => {
    const group = createGroup('1', toAnchor(q1), []);

    expect(() => GroupCollection.from([group, group])).toThrow(
      LayoutEngineError,
    );
  });

  test('exposes groups in order', () => {
    const collection = sampleCollection();

    expect(collection.size).toBe(2);
    expect(collection.ids()).toEqual(['1', '2']);
    expect([...collection].map((group) => group.id)).toEqual(['1', '2']);
    expect(collection.has('2')).toBe(true);
    expect(collection.get('3')).toBeUndefined();
    expect(collection.elementCount()).toBe(5);
    expect(GroupCollection.empty().size).toBe(0);
  });

  test('finds children by id and by box, never anchors', () => {
    const collection = sampleCollection();

    expect(collection.findChild('f1')?.group.id).toBe('1');
    expect(
      collection.findChildByBox({ x1: 100.5, y1: 310, x2: 399, y2: 481 }, 1)
        ?.element.id,
    ).toBe('f1');
    expect(collection.findChildByBox(q1.bbox, 1)).toBeUndefined();
    expect(collection.findChild('q1')).toBeUndefined();
  });

  describe('moveChild', () => {
    test('returns a new collection and leaves the original untouched', () => {
      const before = sampleCollection();

      const after = before.moveChild('f1', '1', '2');

      expect(before.get('1')?.children.map((child) => child.id)).toEqual([
        't1',
        'f1',
      ]);
      expect(after.get('1')?.children.map((child) => child.id)).toEqual(['t1']);
      expect(after.get('2')?.children.map((child) => child.id)).toEqual([
        't2',
        'f1',
      ]);
      expect(after.elementCount()).toBe(before.elementCount());
      expectEnvelopeInvariant(after);
      expectEnvelopeInvariant(before);
    });

    test('shares untouched groups', () => {
      const q3 = questionNumber('q3', 3, 50, 900);
      const before = GroupCollection.from(
        buildGroups([
          { anchor: toAnchor(q1), children: [t1] },
          { anchor: toAnchor(q2), children: [t2] },
          { anchor: toAnchor(q3), children: [] },
        ]),
      );

      const after = before.moveChild('t1', '1', '2');

      expect(after.get('3')).toBe(before.get('3'));
    });

    test('rejects unknown groups and foreign children', () => {
      const collection = sampleCollection();

      expect(() => collection.moveChild('t2', '1', '2')).toThrow(
        'Element "t2" is not a child of group "1"',
      );
      expect(() => collection.moveChild('t1', '1', '9')).toThrow(
        'Unknown group "9"',
      );
    });
  });

  describe('renameGroup', () => {
    test('renames in place when the identifier is free', () => {
      const collection = sampleCollection();

      const { collection: renamed, finalId, merged } = collection.renameGroup(
        '2',
        4,
      );

      expect(finalId).toBe('4');
      expect(merged).toBe(false);
      expect(renamed.ids()).toEqual(['1', '4']);
      expect(renamed.get('4')?.anchor.identifier).toBe(4);
      expect(collection.ids()).toEqual(['1', '2']);
    });

    test('is a no-op for the same identifier', () => {
      const collection = sampleCollection();

      expect(collection.renameGroup('1', 1).collection).toBe(collection);
    });

    test('merges into an existing group without losing elements', () => {
      const collection = sampleCollection();

      const { collection: merged, finalId } = collection.renameGroup('2', 1);

      expect(finalId).toBe('1');
      expect(merged.ids()).toEqual(['1']);
      expect(merged.get('1')?.anchor.element).toBe(q1);
      expect(merged.get('1')?.children.map((child) => child.id)).toEqual([
        't1',
        'f1',
        'q2',
        't2',
      ]);
      expect(merged.elementCount()).toBe(collection.elementCount());
      expectEnvelopeInvariant(merged);
    });
  });
});
