/**
 * Image decode, fit and encode on top of sharp.
 */
import sharp from "sharp";
import { ImageError, type FillColor, type ImageOps, type Region, type RgbImage } from "@ocrsets/core";
import { warpBox } from "./warp.js";

/** Collapse 1, 2 or 4 channel raw pixels to RGB. */
function toRgb(data: Uint8Array, width: number, height: number, channels: number): RgbImage {
  if (channels === 3) return { width, height, data };
  const out = new Uint8Array(width * height * 3);
  for (let i = 0, o = 0; o < out.length; i += channels, o += 3) {
    if (channels < 3) {
      out[o] = out[o + 1] = out[o + 2] = data[i];
    } else {
      out[o] = data[i];
      out[o + 1] = data[i + 1];
      out[o + 2] = data[i + 2];
    }
  }
  return { width, height, data: out };
}

async function decode(pipeline: sharp.Sharp, what: string): Promise<RgbImage> {
  try {
    const { data, info } = await pipeline.removeAlpha().raw().toBuffer({ resolveWithObject: true });
    return toRgb(data, info.width, info.height, info.channels);
  } catch (cause) {
    throw new ImageError({ message: `Cannot decode ${what}`, cause });
  }
}

function fromRaw(image: RgbImage): sharp.Sharp {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: { width: image.width, height: image.height, channels: 3 },
  });
}

/** Decode an image file to RGB, applying its EXIF orientation. */
export function readImage(path: string): Promise<RgbImage> {
  return decode(sharp(path).rotate(), path);
}

/**
 * Scale `source` to fit inside width × height keeping its aspect ratio and
 * pad the rest with `fill`, anchored top-left.
 */
export function readAndFit(source: string | RgbImage, width: number, height: number, fill: FillColor): Promise<RgbImage> {
  const input = typeof source === "string" ? sharp(source).rotate() : fromRaw(source);
  const what = typeof source === "string" ? source : `${source.width}×${source.height} image`;
  return decode(
    input.resize(width, height, {
      fit: "contain",
      position: "left top",
      background: { r: fill[0], g: fill[1], b: fill[2], alpha: 1 },
    }),
    what,
  );
}

export async function writePng(image: RgbImage, path: string): Promise<void> {
  try {
    await fromRaw(image).png().toFile(path);
  } catch (cause) {
    throw new ImageError({ message: `Cannot write ${path}`, cause });
  }
}

/** Default ImageOps: sharp for I/O, the TS perspective warp for regions. */
export class SharpImageOps implements ImageOps {
  read(path: string): Promise<RgbImage> {
    return readImage(path);
  }

  readAndFit(source: string | RgbImage, width: number, height: number, fill: FillColor): Promise<RgbImage> {
    return readAndFit(source, width, height, fill);
  }

  async rectify(image: RgbImage, region: Region, height: number, width: number, fill: FillColor): Promise<RgbImage> {
    return warpBox(image, region, height, width, fill);
  }
}
