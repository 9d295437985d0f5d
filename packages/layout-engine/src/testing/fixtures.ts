import type { LoggerMethods } from '@regroup/logger';
import type {
  ElementClass,
  LayoutElement,
  LayoutGroup,
  LayoutProfile,
  LayoutTopology,
} from '@regroup/model';

import { vi } from 'vitest';

import { toAnchor } from '../elements/anchor-identifier';
import { createGroup } from '../groups/group-factory';

/**
 * Logger whose methods are all mocks
 */
export function createMockLogger(): LoggerMethods {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Element with a box given by its corners
 */
export function element(
  id: string,
  className: ElementClass,
  [x1, y1, x2, y2]: [number, number, number, number],
  extra: Partial<Omit<LayoutElement, 'id' | 'className' | 'bbox'>> = {},
): LayoutElement {
  return {
    id,
    className,
    bbox: { x1, y1, x2, y2 },
    confidence: 0.9,
    ...extra,
  };
}

/**
 * Question-number anchor printed as "n."
 * (40 × 30 box with its top-left corner at x, y)
 */
export function questionNumber(
  id: string,
  n: number,
  x: number,
  y: number,
): LayoutElement {
  return element(id, 'question_number', [x, y, x + 40, y + 30], {
    text: `${n}.`,
    textConfidence: 0.98,
  });
}

/**
 * Profile of a 1000 × 1000 page with the given topology
 */
export function layoutProfile(
  topology: LayoutTopology,
  overrides: Partial<LayoutProfile> = {},
): LayoutProfile {
  return {
    pageWidth: 1000,
    pageHeight: 1000,
    topology,
    anchorXStd: 0,
    consistencyScore: 1,
    horizontalAdjacencyRatio: 1,
    anchorCount: 0,
    anchorYVariance: 0,
    recommendedStrategy: 'direct',
    ...overrides,
  };
}

/**
 * Group ids with their child ids, e.g. `1: t1, t2`
 */
export function describeGroups(groups: readonly LayoutGroup[]): string[] {
  return groups.map(
    (group) =>
      `${group.id}: ${group.children.map((child) => child.id).join(', ')}`,
  );
}

/**
 * Group keyed by its number, anchored by a question number at x, y
 */
export function numberedGroup(
  n: number,
  x: number,
  y: number,
  children: LayoutElement[] = [],
): LayoutGroup {
  return createGroup(
    String(n),
    toAnchor(questionNumber(`q${n}`, n, x, y)),
    children,
  );
}

/**
 * Two groups whose envelopes overlap by 12 000 px² at IoU 0.15
 *
 * Group 1 spans (100, 100)-(300, 330) because it holds `stray`, a text
 * block lying inside group 2; group 2 spans (100, 270)-(300, 500).
 */
export function overlappingGroups(): [LayoutGroup, LayoutGroup] {
  return [
    numberedGroup(1, 100, 100, [
      element('a', 'question_text', [150, 100, 300, 200]),
      element('stray', 'plain_text', [100, 280, 300, 330]),
    ]),
    numberedGroup(2, 100, 270, [
      element('b', 'question_text', [150, 300, 300, 500]),
    ]),
  ];
}
