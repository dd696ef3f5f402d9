/**
 * COCO-Text recognizer dataset.
 *
 * Only the annotation index ships as an archive; images are fetched one by
 * one from the COCO image host after the index has been filtered.
 */
import { join } from "node:path";
import { Effect } from "effect";
import {
  ArchiveService, oneOf,
  type HttpService,
  type ArchiveError, type Dataset, type FetchError, type InvalidArgumentError,
  type LabelParseError, type VerificationError,
} from "@ocrsets/core";
import { downloadAndVerify, fetchAll } from "@ocrsets/cache";
import { decodeCocoTextLabels, selectCocoTextLabels } from "./labels.js";
import {
  COCO_TEXT_FILES, COCO_TEXT_LABELS_MEMBER, COCO_TEXT_SPLITS,
  defaultCacheDir,
  type CocoTextOptions, type CocoTextWithRaw,
} from "./types.js";

export type CocoTextError =
  | InvalidArgumentError | FetchError | VerificationError | ArchiveError | LabelParseError;

type Requirements = HttpService | ArchiveService;

function assemble(opts: CocoTextOptions): Effect.Effect<CocoTextWithRaw, CocoTextError, Requirements> {
  return Effect.gen(function* () {
    const split = yield* oneOf("COCO-Text split", opts.split ?? "train", COCO_TEXT_SPLITS);
    const mainDir = join(opts.cacheDir ?? defaultCacheDir(), "coco-text");
    const imagesDir = join(mainDir, "images");
    const files = { ...COCO_TEXT_FILES, ...opts.files };

    const labelsZip = yield* downloadAndVerify({
      url: files.labels.url,
      sha256: files.labels.sha256,
      cacheDir: mainDir,
      timeoutMs: opts.timeoutMs,
      verbose: true,
    });
    const archive = yield* ArchiveService;
    const json = yield* archive.readEntry(labelsZip, COCO_TEXT_LABELS_MEMBER);
    const labels = yield* decodeCocoTextLabels(json, COCO_TEXT_LABELS_MEMBER);

    const selection = yield* selectCocoTextLabels(labels, imagesDir, {
      split,
      limit: opts.limit,
      legibleOnly: opts.legibleOnly,
      englishOnly: opts.englishOnly,
    });
    yield* Effect.logInfo(
      `${selection.fileNames.length} images, ${selection.entries.length} text instances selected`,
    );

    const distinct = [...new Set(selection.fileNames)];
    yield* fetchAll(
      distinct.map((fileName) => ({
        url: `${files.imagesBaseUrl}/${fileName}`,
        cacheDir: imagesDir,
        timeoutMs: opts.timeoutMs,
      })),
      { concurrency: opts.concurrency, onProgress: opts.onProgress, phase: "Downloading images" },
    );

    const dataset: Dataset = selection.entries;
    return { dataset, raw: { labels: selection.labels, imagesDir } };
  }).pipe(Effect.annotateLogs({ dataset: "cocotext" }));
}

/**
 * Get `(imagePath, polygon, text)` entries from COCO-Text.
 *
 * With `returnRawLabels: true` the pruned raw index and the image directory
 * come back alongside the dataset.
 */
export function getCocoTextRecognizerDataset(
  opts: CocoTextOptions & { readonly returnRawLabels: true },
): Effect.Effect<CocoTextWithRaw, CocoTextError, Requirements>;
export function getCocoTextRecognizerDataset(
  opts?: CocoTextOptions & { readonly returnRawLabels?: false },
): Effect.Effect<Dataset, CocoTextError, Requirements>;
export function getCocoTextRecognizerDataset(
  opts: CocoTextOptions = {},
): Effect.Effect<Dataset | CocoTextWithRaw, CocoTextError, Requirements> {
  const result = assemble(opts);
  return opts.returnRawLabels ? result : Effect.map(result, (r) => r.dataset);
}
