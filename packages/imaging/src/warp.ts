/**
 * Rectify a text region into a fixed-size, axis-aligned crop.
 *
 * The region is reduced to its rotated bounding rectangle, scaled to fit
 * inside height × width without changing its aspect ratio, warped with a
 * perspective transform and placed at the top-left of a canvas filled with
 * the fill color.
 */
import { ImageError, regionPoints, solidImage, type FillColor, type Point, type Region, type RgbImage } from "@ocrsets/core";
import { applyHomography, boxSize, perspectiveTransform, rotatedBox, type Homography } from "./geometry.js";

const EPS = 1e-6;

/** Bilinear sample at (sx, sy); outside the image the fill color is used. */
function sample(image: RgbImage, sx: number, sy: number, fill: FillColor, out: Uint8Array, o: number): void {
  const { width: w, height: h, data } = image;
  if (!(sx >= -EPS && sy >= -EPS && sx <= w - 1 + EPS && sy <= h - 1 + EPS)) {
    out[o] = fill[0];
    out[o + 1] = fill[1];
    out[o + 2] = fill[2];
    return;
  }
  sx = Math.min(Math.max(sx, 0), w - 1);
  sy = Math.min(Math.max(sy, 0), h - 1);
  const x0 = Math.floor(sx);
  const y0 = Math.floor(sy);
  const x1 = Math.min(x0 + 1, w - 1);
  const y1 = Math.min(y0 + 1, h - 1);
  const fx = sx - x0;
  const fy = sy - y0;
  for (let c = 0; c < 3; c++) {
    const a = data[(y0 * w + x0) * 3 + c];
    const b = data[(y0 * w + x1) * 3 + c];
    const d = data[(y1 * w + x0) * 3 + c];
    const e = data[(y1 * w + x1) * 3 + c];
    const top = a + (b - a) * fx;
    const bottom = d + (e - d) * fx;
    out[o + c] = Math.round(top + (bottom - top) * fy);
  }
}

/**
 * Inverse-map every pixel of a cropW × cropH window through `toSource` and
 * write it into `canvas` at the top-left.
 */
function warpInto(image: RgbImage, toSource: Homography, cropW: number, cropH: number, canvas: RgbImage, fill: FillColor): void {
  for (let y = 0; y < cropH; y++) {
    for (let x = 0; x < cropW; x++) {
      const [sx, sy] = applyHomography(toSource, x, y);
      sample(image, sx, sy, fill, canvas.data, (y * canvas.width + x) * 3);
    }
  }
}

export function warpBox(
  image: RgbImage,
  region: Region,
  targetHeight: number,
  targetWidth: number,
  fill: FillColor,
): RgbImage {
  const box = rotatedBox(regionPoints(region));
  const { width: w, height: h } = boxSize(box);
  if (w < 1 || h < 1) {
    throw new ImageError({ message: `Degenerate region: ${w}×${h} pixels` });
  }
  const scale = Math.min(targetWidth / w, targetHeight / h);
  const cropW = Math.min(targetWidth, Math.trunc(scale * w + 1e-6));
  const cropH = Math.min(targetHeight, Math.trunc(scale * h + 1e-6));
  const dst: Point[] = [[0, 0], [scale * w, 0], [scale * w, scale * h], [0, scale * h]];

  const canvas = solidImage(targetWidth, targetHeight, fill);
  warpInto(image, perspectiveTransform(dst, box), cropW, cropH, canvas, fill);
  return canvas;
}
