import { describe, it, expect } from "vitest";
import { join } from "node:path";
import sharp from "sharp";
import { pixelAt, polygon, solidImage } from "@ocrsets/core";
import { SharpImageOps, readAndFit, readImage, writePng } from "@ocrsets/imaging";
import { withTempDir } from "./helpers.js";

describe("sharp image ops", () => {
  it("writes and reads back a PNG", () =>
    withTempDir(async (dir) => {
      const path = join(dir, "solid.png");
      const image = solidImage(3, 2, [12, 34, 56]);
      await writePng(image, path);
      const back = await readImage(path);
      expect([back.width, back.height]).toEqual([3, 2]);
      expect(Array.from(back.data)).toEqual(Array.from(image.data));
    }));

  it("drops the alpha channel", () =>
    withTempDir(async (dir) => {
      const path = join(dir, "rgba.png");
      await sharp({ create: { width: 2, height: 2, channels: 4, background: { r: 200, g: 100, b: 50, alpha: 1 } } })
        .png()
        .toFile(path);
      const image = await readImage(path);
      expect(image.data.length).toBe(2 * 2 * 3);
      expect(pixelAt(image, 1, 1)).toEqual([200, 100, 50]);
    }));

  it("fits a file inside the target and pads bottom and right", () =>
    withTempDir(async (dir) => {
      const path = join(dir, "red.png");
      await sharp({ create: { width: 2, height: 1, channels: 3, background: { r: 255, g: 0, b: 0 } } })
        .png()
        .toFile(path);

      const out = await readAndFit(path, 4, 4, [0, 0, 255]);

      expect(out.width).toBe(4);
      expect(out.height).toBe(4);
      const [r, g, b] = pixelAt(out, 0, 0);
      expect(r).toBeGreaterThan(250);
      expect(g).toBeLessThan(5);
      expect(b).toBeLessThan(5);
      expect(pixelAt(out, 0, 3)).toEqual([0, 0, 255]);
      expect(pixelAt(out, 3, 3)).toEqual([0, 0, 255]);
    }));

  it("rectifies a region through the perspective warp", async () => {
    const ops = new SharpImageOps();
    const source = solidImage(10, 10, [7, 7, 7]);
    const out = await ops.rectify(source, polygon([[1, 1], [7, 1], [7, 4], [1, 4]]), 3, 12, [0, 0, 0]);
    expect(out.width).toBe(12);
    expect(out.height).toBe(3);
    expect(pixelAt(out, 0, 0)).toEqual([7, 7, 7]);
    expect(pixelAt(out, 11, 2)).toEqual([0, 0, 0]);
  });
});
