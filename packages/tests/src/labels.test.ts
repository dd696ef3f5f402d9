import { describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import {
  decodeCocoTextLabels, parseBornDigitalLabels, readBornDigitalLabels, selectCocoTextLabels,
  type CocoTextFilter,
} from "@ocrsets/datasets";
import { cocoIndex } from "./fixtures.js";
import { withTempDir } from "./helpers.js";

describe("parseBornDigitalLabels", () => {
  it("splits at the first comma and strips the quotes", async () => {
    const entries = await Effect.runPromise(parseBornDigitalLabels('img1.jpg,"hello, world"', "/data"));
    expect(entries).toEqual([{ imagePath: "/data/img1.jpg", region: null, text: "hello, world" }]);
  });

  it("handles a BOM, CRLF endings, padding and blank lines", async () => {
    const content = '\uFEFFword_1.png, "Tiredness"\r\nword_2.png, "kills"\r\n\r\n';
    const entries = await Effect.runPromise(parseBornDigitalLabels(content, "/root"));
    expect(entries.map((e) => e.imagePath)).toEqual(["/root/word_1.png", "/root/word_2.png"]);
    expect(entries.map((e) => e.text)).toEqual(["Tiredness", "kills"]);
  });

  it("keeps text that is not fully quoted as-is", async () => {
    const entries = await Effect.runPromise(parseBornDigitalLabels('a.png, "quoted" tail', "/r"));
    expect(entries[0]?.text).toBe('"quoted" tail');
  });

  it("rejects a line without a comma", async () => {
    const err = await Effect.runPromise(Effect.flip(parseBornDigitalLabels('a.png, "ok"\nbroken line', "/r", "gt.txt")));
    expect(err._tag).toBe("LabelParseError");
    expect(err.line).toBe(2);
    expect(err.source).toBe("gt.txt");
  });

  it("rejects an empty label", async () => {
    const err = await Effect.runPromise(Effect.flip(parseBornDigitalLabels('a.png, ""', "/r")));
    expect(err.line).toBe(1);
  });

  it("reads labels from a file", () =>
    withTempDir(async (dir) => {
      const path = join(dir, "gt.txt");
      await writeFile(path, 'w.png, "Sale"\n');
      const entries = await Effect.runPromise(readBornDigitalLabels(path, dir));
      expect(entries).toEqual([{ imagePath: join(dir, "w.png"), region: null, text: "Sale" }]);
    }));

  it("reports a missing labels file", async () => {
    const err = await Effect.runPromise(Effect.flip(readBornDigitalLabels("/nonexistent/gt.txt", "/r")));
    expect(err.source).toBe("/nonexistent/gt.txt");
  });
});

describe("COCO-Text labels", () => {
  const labels = Effect.runSync(decodeCocoTextLabels(JSON.stringify(cocoIndex)));
  const select = (filter: CocoTextFilter) =>
    Effect.runSync(selectCocoTextLabels(labels, "/imgs", filter));

  it("rejects JSON that is not a COCO-Text index", async () => {
    const err = await Effect.runPromise(Effect.flip(decodeCocoTextLabels('{"imgs": {}}', "bad.json")));
    expect(err._tag).toBe("LabelParseError");
    expect(err.source).toBe("bad.json");
  });

  it("rejects malformed JSON", async () => {
    const err = await Effect.runPromise(Effect.flip(decodeCocoTextLabels("{", "bad.json")));
    expect(err.message).toBe("Invalid JSON in bad.json");
  });

  it("walks the split's images in numeric id order", () => {
    const { entries, fileNames } = select({ split: "train" });
    expect(fileNames).toEqual(["c1.jpg", "c3.jpg", "c10.jpg"]);
    // annotation 32 has no text and is skipped
    expect(entries.map((e) => e.text)).toEqual(["hello", "bonjour", "blur"]);
    expect(entries[0]).toEqual({
      imagePath: "/imgs/c1.jpg",
      region: { kind: "polygon", points: [[0, 0], [10, 0], [10, 5], [0, 5]] },
      text: "hello",
    });
  });

  it("combines both sets for trainval", () => {
    expect(select({ split: "trainval" }).entries.map((e) => e.text)).toEqual(["hello", "bonjour", "val", "blur"]);
  });

  it("selects the validation set", () => {
    expect(select({ split: "val" }).entries.map((e) => e.text)).toEqual(["val"]);
  });

  it("filters by language and legibility", () => {
    expect(select({ split: "train", englishOnly: true }).entries.map((e) => e.text)).toEqual(["hello", "blur"]);
    expect(select({ split: "train", legibleOnly: true }).entries.map((e) => e.text)).toEqual(["hello", "bonjour"]);
    expect(select({ split: "train", englishOnly: true, legibleOnly: true }).entries.map((e) => e.text)).toEqual(["hello"]);
  });

  it("caps images, not annotations, and prunes the index", () => {
    const { entries, fileNames, labels: pruned } = select({ split: "train", limit: 1 });
    expect(fileNames).toEqual(["c1.jpg"]);
    expect(entries.map((e) => e.text)).toEqual(["hello", "bonjour"]);
    expect(Object.keys(pruned.imgs)).toEqual(["1"]);
    expect(Object.keys(pruned.imgToAnns)).toEqual(["1"]);
    expect(Object.keys(pruned.anns).sort()).toEqual(["11", "12"]);
  });

  it("leaves the index whole without a limit", () => {
    expect(select({ split: "train" }).labels).toBe(labels);
  });

  it("fails on an annotation the index does not contain", async () => {
    const broken = { ...labels, imgToAnns: { ...labels.imgToAnns, "1": [99] } };
    const err = await Effect.runPromise(Effect.flip(selectCocoTextLabels(broken, "/imgs", { split: "train" })));
    expect(err.message).toBe("Image 1 references missing annotation 99");
  });

  it("fails on an odd-length mask", async () => {
    const broken = { ...labels, anns: { ...labels.anns, "11": { ...cocoIndex.anns["11"], mask: [1, 2, 3] } } };
    const err = await Effect.runPromise(Effect.flip(selectCocoTextLabels(broken, "/imgs", { split: "train" })));
    expect(err.message).toBe("Annotation 11 has an odd-length mask");
  });
});
