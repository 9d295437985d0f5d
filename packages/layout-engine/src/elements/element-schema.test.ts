import { describe, expect, test } from 'vitest';

import { MalformedElementError } from '../errors/layout-engine-error';
import { parsePageInput } from './element-schema';

const element = (overrides: Record<string, unknown> = {}) => ({
  id: 'e1',
  className: 'question_number',
  bbox: { x1: 10, y1: 10, x2: 40, y2: 30 },
  confidence: 0.9,
  text: '1.',
  ...overrides,
});

const issuesOf = (input: unknown) => {
  try {
    parsePageInput(input);
  } catch (error) {
    if (error instanceof MalformedElementError) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe('parsePageInput', () => {
  test('accepts a well-formed page', () => {
    const page = parsePageInput({
      pageKey: '3',
      width: 1200,
      height: 1700,
      elements: [element()],
    });

    expect(page.pageKey).toBe('3');
    expect(page.elements).toHaveLength(1);
    expect(page.elements[0].className).toBe('question_number');
  });

  test('accepts zero-area boxes for later filtering', () => {
    const page = parsePageInput({
      elements: [element({ bbox: { x1: 5, y1: 5, x2: 5, y2: 20 } })],
    });

    expect(page.elements).toHaveLength(1);
  });

  test('rejects unknown classes', () => {
    expect(() =>
      parsePageInput({ elements: [element({ className: 'banner' })] }),
    ).toThrow(MalformedElementError);
  });

  test('rejects negative and inverted coordinates', () => {
    expect(
      issuesOf({
        elements: [element({ bbox: { x1: -1, y1: 0, x2: 10, y2: 10 } })],
      }).map((issue) => issue.path),
    ).toEqual(['elements.0.bbox.x1']);

    expect(
      issuesOf({
        elements: [element({ bbox: { x1: 20, y1: 0, x2: 10, y2: 10 } })],
      }),
    ).toEqual([
      {
        path: 'elements.0.bbox',
        message: 'Box corners are inverted (x2 < x1 or y2 < y1)',
      },
    ]);
  });

  test('rejects confidences outside [0, 1]', () => {
    expect(() =>
      parsePageInput({ elements: [element({ confidence: 1.2 })] }),
    ).toThrow(MalformedElementError);
    expect(() =>
      parsePageInput({ elements: [element({ textConfidence: -0.1 })] }),
    ).toThrow(MalformedElementError);
  });

  test('rejects duplicate element ids', () => {
    expect(
      issuesOf({ elements: [element(), element()] }),
    ).toEqual([
      { path: 'elements.1.id', message: 'Duplicate element id "e1"' },
    ]);
  });

  test('rejects a missing element list', () => {
    expect(() => parsePageInput({ width: 100 })).toThrow(
      MalformedElementError,
    );
  });
});
