/**
 * Core types for the ocrsets system.
 */

// ── Geometry ───────────────────────────────────────────────────────────────
export type Point = readonly [x: number, y: number];

/** A text instance inside a larger image, in pixel coordinates. */
export type Region =
  | { readonly kind: "polygon"; readonly points: readonly Point[] }
  | {
      readonly kind: "box";
      readonly x: number;
      readonly y: number;
      readonly width: number;
      readonly height: number;
    };

export function polygon(points: readonly Point[]): Region {
  return { kind: "polygon", points };
}

/** Corner points of a region, clockwise from the first vertex. */
export function regionPoints(region: Region): Point[] {
  switch (region.kind) {
    case "polygon":
      return region.points.map(([x, y]) => [x, y] as const);
    case "box": {
      const { x, y, width, height } = region;
      return [[x, y], [x + width, y], [x + width, y + height], [x, y + height]];
    }
  }
}

// ── Labels ─────────────────────────────────────────────────────────────────

/**
 * One recognizer training instance. `region` is null when the image is
 * already cropped to the text.
 */
export interface LabelEntry {
  readonly imagePath: string;
  readonly region: Region | null;
  readonly text: string;
}

export type Dataset = readonly LabelEntry[];

// ── Images ─────────────────────────────────────────────────────────────────

/** 8-bit RGB pixels, row-major, 3 bytes per pixel. */
export interface RgbImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type FillColor = readonly [r: number, g: number, b: number];

export function solidImage(width: number, height: number, fill: FillColor): RgbImage {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < data.length; i += 3) {
    data[i] = fill[0];
    data[i + 1] = fill[1];
    data[i + 2] = fill[2];
  }
  return { width, height, data };
}

/** Read the RGB triple at (x, y). */
export function pixelAt(image: RgbImage, x: number, y: number): FillColor {
  const o = (y * image.width + x) * 3;
  return [image.data[o], image.data[o + 1], image.data[o + 2]];
}
