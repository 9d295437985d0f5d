/**
 * Element classes that root a group
 */
export const ANCHOR_CLASSES = [
  'question_number',
  'question_type',
  'second_question_number',
] as const;

/**
 * Element classes that attach to an anchor
 */
export const CHILD_CLASSES = [
  'question_text',
  'plain_text',
  'choices',
  'list',
  'figure',
  'table',
  'flowchart',
  'formula',
  'caption',
  'answer_text',
  'explanation_text',
  'title',
  'page_header',
  'page_footer',
  'page_number',
  'footnote',
] as const;

/**
 * Full closed taxonomy emitted by the layout detector
 */
export const ELEMENT_CLASSES = [...ANCHOR_CLASSES, ...CHILD_CLASSES] as const;

/**
 * Child classes kept in worksheet mode
 */
export const WORKSHEET_CHILD_CLASSES = [
  'question_text',
  'list',
  'choices',
  'figure',
  'table',
  'flowchart',
  'formula',
  'caption',
] as const satisfies readonly ChildClass[];

export type AnchorClass = (typeof ANCHOR_CLASSES)[number];
export type ChildClass = (typeof CHILD_CLASSES)[number];
export type ElementClass = AnchorClass | ChildClass;

/**
 * Axis-aligned box in page pixels (origin top-left)
 */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/**
 * Single region detected on a page
 *
 * Produced by the layout/OCR/vision collaborators and never mutated by the
 * engine. Only group membership changes.
 */
export interface LayoutElement {
  /** Stable identity within the page */
  id: string;

  /** Detector class label */
  className: ElementClass;

  bbox: BoundingBox;

  /** Detector confidence in [0, 1] */
  confidence: number;

  /** Recognized text (OCR) */
  text?: string;

  /** OCR confidence in [0, 1] */
  textConfidence?: number;

  /** Generated description (vision service) */
  description?: string;
}

/**
 * Sentinel for an anchor whose text carries no usable number
 */
export const UNPARSED_IDENTIFIER = 'unparsed';

export type AnchorIdentifier = number | typeof UNPARSED_IDENTIFIER;

/**
 * Element that roots a group, with its parsed identifier
 */
export interface Anchor {
  readonly element: LayoutElement;
  readonly identifier: AnchorIdentifier;

  /** Top edge, used for reading order */
  readonly y: number;
}

export function isAnchorClass(
  className: ElementClass,
): className is AnchorClass {
  return ANCHOR_CLASSES.some((anchorClass) => anchorClass === className);
}
