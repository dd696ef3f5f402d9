/**
 * Plane geometry for text regions: hulls, rotated rectangles, homographies.
 */
import { ImageError, type Point } from "@ocrsets/core";

const dist = (a: Point, b: Point) => Math.hypot(a[0] - b[0], a[1] - b[1]);

const cross = (o: Point, a: Point, b: Point) =>
  (a[0] - o[0]) * (b[1] - o[1]) - (a[1] - o[1]) * (b[0] - o[0]);

/** Convex hull (monotone chain), counter-clockwise in a y-up frame. */
export function convexHull(points: readonly Point[]): Point[] {
  const pts = [...points].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  if (pts.length < 3) return pts;
  const lower: Point[] = [];
  for (const p of pts) {
    while (lower.length >= 2 && cross(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) lower.pop();
    lower.push(p);
  }
  const upper: Point[] = [];
  for (let i = pts.length - 1; i >= 0; i--) {
    const p = pts[i];
    while (upper.length >= 2 && cross(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) upper.pop();
    upper.push(p);
  }
  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

/**
 * Smallest-area enclosing rectangle. One side of the optimum is collinear
 * with a hull edge, so every edge direction is tried.
 */
export function minAreaRect(points: readonly Point[]): Point[] {
  const hull = convexHull(points);
  if (hull.length < 3) {
    throw new ImageError({ message: `Region needs 3 non-collinear points, got ${points.length}` });
  }
  let best: Point[] = [];
  let bestArea = Infinity;
  for (let i = 0; i < hull.length; i++) {
    const a = hull[i];
    const b = hull[(i + 1) % hull.length];
    const len = dist(a, b);
    if (len === 0) continue;
    const ux = (b[0] - a[0]) / len;
    const uy = (b[1] - a[1]) / len;
    let minU = Infinity, maxU = -Infinity, minV = Infinity, maxV = -Infinity;
    for (const p of hull) {
      const u = p[0] * ux + p[1] * uy;
      const v = -p[0] * uy + p[1] * ux;
      minU = Math.min(minU, u); maxU = Math.max(maxU, u);
      minV = Math.min(minV, v); maxV = Math.max(maxV, v);
    }
    const area = (maxU - minU) * (maxV - minV);
    if (area < bestArea) {
      bestArea = area;
      const back = (u: number, v: number): Point => [u * ux - v * uy, u * uy + v * ux];
      best = [back(minU, minV), back(maxU, minV), back(maxU, maxV), back(minU, maxV)];
    }
  }
  return best;
}

/**
 * Order four corners as top-left, top-right, bottom-right, bottom-left
 * (image coordinates, y down).
 */
export function orderCorners(pts: readonly Point[]): [Point, Point, Point, Point] {
  if (pts.length !== 4) throw new ImageError({ message: `Expected 4 corners, got ${pts.length}` });
  const byX = [...pts].sort((a, b) => a[0] - b[0]);
  const [tl, bl] = byX.slice(0, 2).sort((a, b) => a[1] - b[1]);
  const right = byX.slice(2);
  // the right-hand corner farthest from top-left is bottom-right
  const [br, tr] = right.sort((a, b) => dist(tl, b) - dist(tl, a));
  return [tl, tr, br, bl];
}

/** Rotated-rectangle corners of a region, ordered tl, tr, br, bl. */
export function rotatedBox(points: readonly Point[]): [Point, Point, Point, Point] {
  return orderCorners(minAreaRect(points));
}

/** Mean lengths of opposite sides of an ordered box, truncated to pixels. */
export function boxSize(box: readonly [Point, Point, Point, Point]): { width: number; height: number } {
  const [tl, tr, br, bl] = box;
  const px = (len: number) => Math.trunc(len + 1e-6);
  return {
    width: px((dist(tl, tr) + dist(br, bl)) / 2),
    height: px((dist(tl, bl) + dist(tr, br)) / 2),
  };
}

/** Row-major 3×3 homography with h[8] = 1. */
export type Homography = readonly number[];

/** Solve for H with H·src[i] ∝ dst[i] from four correspondences. */
export function perspectiveTransform(src: readonly Point[], dst: readonly Point[]): Homography {
  if (src.length !== 4 || dst.length !== 4) {
    throw new ImageError({ message: "A perspective transform needs exactly 4 point pairs" });
  }
  const A: number[][] = [];
  for (let i = 0; i < 4; i++) {
    const [x, y] = src[i];
    const [u, v] = dst[i];
    A.push([x, y, 1, 0, 0, 0, -x * u, -y * u, u]);
    A.push([0, 0, 0, x, y, 1, -x * v, -y * v, v]);
  }
  // Gauss-Jordan with partial pivoting on the 8×9 augmented matrix
  for (let col = 0; col < 8; col++) {
    let pivot = col;
    for (let r = col + 1; r < 8; r++) if (Math.abs(A[r][col]) > Math.abs(A[pivot][col])) pivot = r;
    if (Math.abs(A[pivot][col]) < 1e-12) throw new ImageError({ message: "Degenerate region: corners are collinear" });
    [A[col], A[pivot]] = [A[pivot], A[col]];
    for (let r = 0; r < 8; r++) {
      if (r === col) continue;
      const f = A[r][col] / A[col][col];
      for (let c = col; c < 9; c++) A[r][c] -= f * A[col][c];
    }
  }
  const h = A.map((row, i) => row[8] / row[i]);
  return [...h, 1];
}

export function applyHomography(h: Homography, x: number, y: number): Point {
  const w = h[6] * x + h[7] * y + h[8];
  return [(h[0] * x + h[1] * y + h[2]) / w, (h[3] * x + h[4] * y + h[5]) / w];
}
