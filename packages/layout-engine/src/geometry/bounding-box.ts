import type { BoundingBox } from '@regroup/model';

export interface Point {
  x: number;
  y: number;
}

export function width(box: BoundingBox): number {
  return Math.max(0, box.x2 - box.x1);
}

export function height(box: BoundingBox): number {
  return Math.max(0, box.y2 - box.y1);
}

export function area(box: BoundingBox): number {
  return width(box) * height(box);
}

export function center(box: BoundingBox): Point {
  return { x: (box.x1 + box.x2) / 2, y: (box.y1 + box.y2) / 2 };
}

/**
 * Smallest box containing both boxes
 */
export function union(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x1: Math.min(a.x1, b.x1),
    y1: Math.min(a.y1, b.y1),
    x2: Math.max(a.x2, b.x2),
    y2: Math.max(a.y2, b.y2),
  };
}

/**
 * Smallest box containing every box, or null for none
 */
export function envelopeOf(
  boxes: readonly BoundingBox[],
): BoundingBox | null {
  if (boxes.length === 0) {
    return null;
  }
  return boxes.reduce(union);
}

export function overlapArea(a: BoundingBox, b: BoundingBox): number {
  const overlapWidth = Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1);
  const overlapHeight = Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1);
  if (overlapWidth <= 0 || overlapHeight <= 0) {
    return 0;
  }
  return overlapWidth * overlapHeight;
}

export function overlaps(a: BoundingBox, b: BoundingBox): boolean {
  return overlapArea(a, b) > 0;
}

/**
 * Intersection over union; 0 when the union is empty
 */
export function iou(a: BoundingBox, b: BoundingBox): number {
  const intersection = overlapArea(a, b);
  if (intersection === 0) {
    return 0;
  }
  return intersection / (area(a) + area(b) - intersection);
}

/**
 * Whether every coordinate differs by at most `tolerance`
 */
export function boxesMatch(
  a: BoundingBox,
  b: BoundingBox,
  tolerance = 1,
): boolean {
  return (
    Math.abs(a.x1 - b.x1) <= tolerance &&
    Math.abs(a.y1 - b.y1) <= tolerance &&
    Math.abs(a.x2 - b.x2) <= tolerance &&
    Math.abs(a.y2 - b.y2) <= tolerance
  );
}

/**
 * Center distance with the horizontal component scaled by `xWeight`
 */
export function weightedDistance(
  from: BoundingBox,
  to: BoundingBox,
  xWeight: number,
): number {
  const a = center(from);
  const b = center(to);
  const dx = (a.x - b.x) * xWeight;
  const dy = a.y - b.y;
  return Math.sqrt(dy * dy + dx * dx);
}

export function euclideanDistance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
