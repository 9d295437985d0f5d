import type { Anchor, AnchorIdentifier, LayoutElement } from '@regroup/model';

import { UNPARSED_IDENTIFIER } from '@regroup/model';

/**
 * First run of up to four digits, after NFKC folding
 * (full-width digits and circled numbers ①..⑳ become ASCII)
 */
const IDENTIFIER_PATTERN = /(\d{1,4})/;

/**
 * Parse the number printed on an anchor
 *
 * Handles "1.", "[1]", "【1】", "(1)", "Q1", "문제 1", "1번", "①" and trailing
 * OCR noise such as "299 . .". Text below `minConfidence` is not trusted.
 *
 * @returns Parsed integer or the unparsed sentinel
 */
export function parseAnchorIdentifier(
  element: LayoutElement,
  minConfidence = 0.5,
): AnchorIdentifier {
  const { text, textConfidence } = element;
  if (text === undefined) {
    return UNPARSED_IDENTIFIER;
  }
  if (textConfidence !== undefined && textConfidence < minConfidence) {
    return UNPARSED_IDENTIFIER;
  }

  const match = IDENTIFIER_PATTERN.exec(text.normalize('NFKC'));
  if (!match) {
    return UNPARSED_IDENTIFIER;
  }
  return Number.parseInt(match[1], 10);
}

export function toAnchor(element: LayoutElement, minConfidence = 0.5): Anchor {
  return {
    element,
    identifier: parseAnchorIdentifier(element, minConfidence),
    y: element.bbox.y1,
  };
}
