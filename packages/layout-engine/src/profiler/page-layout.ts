import type { LayoutElement, PageLayout } from '@regroup/model';

import { maxBy } from 'es-toolkit';

import { detectTopology } from './topology';

/**
 * Known page dimensions; missing or non-positive values are estimated
 */
export interface PageSize {
  width?: number;
  height?: number;
}

function resolveExtent(
  given: number | undefined,
  elements: readonly LayoutElement[],
  extent: (element: LayoutElement) => number,
): number {
  if (given !== undefined && given > 0) {
    return given;
  }
  const furthest = maxBy(elements, extent);
  return furthest ? extent(furthest) : 0;
}

/**
 * Page extents (given, or the furthest element edges) and page topology
 */
export function describePageLayout(
  elements: readonly LayoutElement[],
  pageSize: PageSize = {},
): PageLayout {
  const pageWidth = resolveExtent(
    pageSize.width,
    elements,
    (element) => element.bbox.x2,
  );
  const pageHeight = resolveExtent(
    pageSize.height,
    elements,
    (element) => element.bbox.y2,
  );
  const { topology } = detectTopology(
    elements,
    { x1: 0, y1: 0, x2: pageWidth, y2: pageHeight },
    { allowMixed: true },
  );

  return { pageWidth, pageHeight, topology };
}
