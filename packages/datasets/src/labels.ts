/**
 * Label parsers: native dataset label formats → LabelEntry[].
 */
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect, Schema } from "effect";
import { LabelParseError, polygon, type LabelEntry, type Point } from "@ocrsets/core";
import type { CocoTextSplit } from "./types.js";

// ── Born-Digital (delimited text) ──────────────────────────────────────────

function unquote(text: string): string {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"') ? text.slice(1, -1) : text;
}

/**
 * Parse `image.png, "text"` lines. The text may itself contain commas; only
 * the first comma separates the file name.
 */
export function parseBornDigitalLabels(
  content: string,
  imageRoot: string,
  source = "<labels>",
): Effect.Effect<LabelEntry[], LabelParseError> {
  return Effect.suspend(() => {
    const lines = content.replace(/^\uFEFF/, "").split(/\r?\n/);
    const entries: LabelEntry[] = [];
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      const comma = line.indexOf(",");
      if (comma < 0) {
        return Effect.fail(new LabelParseError({ source, line: i + 1, message: `Expected "file,text" at line ${i + 1}: ${line}` }));
      }
      const text = unquote(line.slice(comma + 1).trim());
      if (!text) {
        return Effect.fail(new LabelParseError({ source, line: i + 1, message: `Empty label at line ${i + 1}` }));
      }
      entries.push({ imagePath: join(imageRoot, line.slice(0, comma).trim()), region: null, text });
    }
    return Effect.succeed(entries);
  });
}

export function readBornDigitalLabels(
  labelsPath: string,
  imageRoot: string,
): Effect.Effect<LabelEntry[], LabelParseError> {
  return Effect.tryPromise({
    try: () => readFile(labelsPath, "utf-8"),
    catch: (cause) => new LabelParseError({ source: labelsPath, message: `Cannot read ${labelsPath}`, cause }),
  }).pipe(Effect.flatMap((content) => parseBornDigitalLabels(content, imageRoot, labelsPath)));
}

// ── COCO-Text (JSON index) ─────────────────────────────────────────────────

const CocoImage = Schema.Struct({
  id: Schema.optional(Schema.Number),
  set: Schema.String,
  file_name: Schema.String,
  width: Schema.optional(Schema.Number),
  height: Schema.optional(Schema.Number),
});

const CocoAnnotation = Schema.Struct({
  id: Schema.optional(Schema.Number),
  image_id: Schema.optional(Schema.Number),
  mask: Schema.Array(Schema.Number),
  bbox: Schema.optional(Schema.Array(Schema.Number)),
  class: Schema.optional(Schema.String),
  language: Schema.optional(Schema.String),
  legibility: Schema.optional(Schema.String),
  utf8_string: Schema.optional(Schema.String),
  area: Schema.optional(Schema.Number),
});

/** The parts of `cocotext.v2.json` this package reads. */
export const CocoTextLabels = Schema.Struct({
  imgs: Schema.Record({ key: Schema.String, value: CocoImage }),
  imgToAnns: Schema.Record({ key: Schema.String, value: Schema.Array(Schema.Number) }),
  anns: Schema.Record({ key: Schema.String, value: CocoAnnotation }),
});
export type CocoTextLabels = Schema.Schema.Type<typeof CocoTextLabels>;

export function decodeCocoTextLabels(
  input: string | Buffer,
  source = "cocotext.v2.json",
): Effect.Effect<CocoTextLabels, LabelParseError> {
  return Effect.try({
    try: (): unknown => JSON.parse(input.toString()),
    catch: (cause) => new LabelParseError({ source, message: `Invalid JSON in ${source}`, cause }),
  }).pipe(
    Effect.flatMap(Schema.decodeUnknown(CocoTextLabels)),
    Effect.mapError((e) =>
      e instanceof LabelParseError ? e : new LabelParseError({ source, message: e.message, cause: e }),
    ),
  );
}

const SPLIT_SETS: Record<CocoTextSplit, readonly string[]> = {
  train: ["train"],
  val: ["val"],
  trainval: ["train", "val"],
};

export interface CocoTextFilter {
  readonly split: CocoTextSplit;
  /** Keep only the first `limit` selected images. */
  readonly limit?: number;
  readonly legibleOnly?: boolean;
  readonly englishOnly?: boolean;
}

export interface CocoTextSelection {
  readonly entries: LabelEntry[];
  /** File names of every selected image, in selection order. */
  readonly fileNames: string[];
  /** The index, pruned to the selected images when `limit` applies. */
  readonly labels: CocoTextLabels;
}

function byNumericId(a: string, b: string): number {
  return Number(a) - Number(b) || a.localeCompare(b);
}

function maskToPoints(mask: readonly number[]): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < mask.length; i += 2) points.push([mask[i], mask[i + 1]]);
  return points;
}

function pickKeys<V>(record: { readonly [k: string]: V }, keep: ReadonlySet<string>): { [k: string]: V } {
  const out: { [k: string]: V } = {};
  for (const [k, v] of Object.entries(record)) if (keep.has(k)) out[k] = v;
  return out;
}

/**
 * Resolve the images of `split` and their annotations into entries.
 * `limit` truncates the image-ID list, so it caps images, not entries.
 */
export function selectCocoTextLabels(
  labels: CocoTextLabels,
  imagesDir: string,
  filter: CocoTextFilter,
  source = "cocotext.v2.json",
): Effect.Effect<CocoTextSelection, LabelParseError> {
  return Effect.suspend(() => {
    const sets = SPLIT_SETS[filter.split];
    let ids = Object.keys(labels.imgs)
      .filter((id) => sets.includes(labels.imgs[id].set))
      .sort(byNumericId);

    let index = labels;
    if (filter.limit) {
      ids = ids.slice(0, filter.limit);
      const kept = new Set(ids);
      const imgToAnns = pickKeys(labels.imgToAnns, kept);
      const annIds = new Set(Object.values(imgToAnns).flatMap((anns) => anns.map(String)));
      index = { imgs: pickKeys(labels.imgs, kept), imgToAnns, anns: pickKeys(labels.anns, annIds) };
    }

    const entries: LabelEntry[] = [];
    const fileNames: string[] = [];
    for (const id of ids) {
      const fileName = index.imgs[id].file_name;
      fileNames.push(fileName);
      const imagePath = join(imagesDir, fileName);
      for (const annId of index.imgToAnns[id] ?? []) {
        const ann = index.anns[String(annId)];
        if (ann === undefined) {
          return Effect.fail(new LabelParseError({ source, message: `Image ${id} references missing annotation ${annId}` }));
        }
        if (filter.englishOnly && ann.language !== "english") continue;
        if (filter.legibleOnly && ann.legibility !== "legible") continue;
        const text = ann.utf8_string ?? "";
        if (!text) continue;
        if (ann.mask.length % 2 !== 0) {
          return Effect.fail(new LabelParseError({ source, message: `Annotation ${annId} has an odd-length mask` }));
        }
        entries.push({ imagePath, region: polygon(maskToPoints(ann.mask)), text });
      }
    }
    return Effect.succeed({ entries, fileNames, labels: index });
  });
}
