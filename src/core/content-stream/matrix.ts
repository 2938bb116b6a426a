import type { BBox, Matrix, Point } from '../../types/pdf.js';

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/** `m1 × m2` with PDF's row-vector convention: apply m1 first, then m2. */
export function multiply(m1: Matrix, m2: Matrix): Matrix {
  const [a, b, c, d, e, f] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a * a2 + b * c2,
    a * b2 + b * d2,
    c * a2 + d * c2,
    c * b2 + d * d2,
    e * a2 + f * c2 + e2,
    e * b2 + f * d2 + f2
  ];
}

export function translate(m: Matrix, tx: number, ty: number): Matrix {
  return multiply([1, 0, 0, 1, tx, ty], m);
}

export function applyToPoint(m: Matrix, x: number, y: number): Point {
  return {
    x: m[0] * x + m[2] * y + m[4],
    y: m[1] * x + m[3] * y + m[5]
  };
}

export function transformBBox(m: Matrix, box: BBox): BBox {
  const corners = [
    applyToPoint(m, box.x0, box.y0),
    applyToPoint(m, box.x1, box.y0),
    applyToPoint(m, box.x0, box.y1),
    applyToPoint(m, box.x1, box.y1)
  ];
  return {
    x0: Math.min(...corners.map((p) => p.x)),
    y0: Math.min(...corners.map((p) => p.y)),
    x1: Math.max(...corners.map((p) => p.x)),
    y1: Math.max(...corners.map((p) => p.y))
  };
}

export function toMatrix(values: number[]): Matrix {
  return [values[0] ?? 1, values[1] ?? 0, values[2] ?? 0, values[3] ?? 1, values[4] ?? 0, values[5] ?? 0];
}
