import type { BBox, Point } from '../types/pdf.js';

export function width(box: BBox): number {
  return box.x1 - box.x0;
}

export function height(box: BBox): number {
  return box.y1 - box.y0;
}

export function area(box: BBox): number {
  return Math.max(0, width(box)) * Math.max(0, height(box));
}

export function center(box: BBox): Point {
  return { x: (box.x0 + box.x1) / 2, y: (box.y0 + box.y1) / 2 };
}

export function union(a: BBox, b: BBox): BBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1)
  };
}

export function intersection(a: BBox, b: BBox): BBox | null {
  const box = {
    x0: Math.max(a.x0, b.x0),
    y0: Math.max(a.y0, b.y0),
    x1: Math.min(a.x1, b.x1),
    y1: Math.min(a.y1, b.y1)
  };
  return box.x1 > box.x0 && box.y1 > box.y0 ? box : null;
}

export function overlapArea(a: BBox, b: BBox): number {
  const shared = intersection(a, b);
  return shared ? area(shared) : 0;
}

export function containsPoint(box: BBox, point: Point, tolerance = 0): boolean {
  return (
    point.x >= box.x0 - tolerance &&
    point.x <= box.x1 + tolerance &&
    point.y >= box.y0 - tolerance &&
    point.y <= box.y1 + tolerance
  );
}

export function horizontalOverlap(a: BBox, b: BBox): number {
  return Math.max(0, Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0));
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}
