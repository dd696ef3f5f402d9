/**
 * @ocrsets/datasets -- dataset assemblers and label parsers.
 *
 * Each assembler fetches (and verifies) its archives through
 * `@ocrsets/cache`, extracts them under the cache root, and normalizes the
 * labels into `LabelEntry` records. `datasetRegistry` looks them up by name.
 */
import { Effect } from "effect";
import { Registry, type ArchiveService, type Dataset, type HttpService } from "@ocrsets/core";
import { getBornDigitalRecognizerDataset, type BornDigitalError } from "./borndigital.js";
import { getCocoTextRecognizerDataset, type CocoTextError } from "./cocotext.js";
import { BORN_DIGITAL_SPLITS, COCO_TEXT_SPLITS, type CocoTextOptions } from "./types.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { getCocoTextRecognizerDataset, type CocoTextError } from "./cocotext.js";
export { getBornDigitalRecognizerDataset, type BornDigitalError } from "./borndigital.js";
export {
  parseBornDigitalLabels,
  readBornDigitalLabels,
  decodeCocoTextLabels,
  selectCocoTextLabels,
  CocoTextLabels,
  type CocoTextFilter,
  type CocoTextSelection,
} from "./labels.js";
export * from "./types.js";

// ── Dataset registry ──────────────────────────────────────────────────────

/** Options every registered dataset accepts; unsupported filters are ignored. */
export type DatasetLoadOptions = Omit<CocoTextOptions, "returnRawLabels" | "files">;

export interface DatasetSource {
  readonly name: string;
  readonly description: string;
  readonly splits: readonly string[];
  load(
    opts: DatasetLoadOptions,
  ): Effect.Effect<Dataset, CocoTextError | BornDigitalError, HttpService | ArchiveService>;
}

/**
 * Pre-registered datasets:
 * - `"cocotext"`    -- COCO-Text v2, polygons on full COCO images
 * - `"borndigital"` -- ICDAR 2013 Born-Digital, pre-cropped words
 */
export const datasetRegistry = new Registry<DatasetSource>("dataset");

datasetRegistry.register("cocotext", {
  name: "cocotext",
  description: "COCO-Text v2 word instances on COCO train2014 images",
  splits: COCO_TEXT_SPLITS,
  load: (opts) => getCocoTextRecognizerDataset({ ...opts, returnRawLabels: false }),
});

/** COCO-Text filters that have no meaning for pre-cropped Born-Digital words. */
const BORN_DIGITAL_UNSUPPORTED = ["limit", "legibleOnly", "englishOnly", "concurrency"] as const;

datasetRegistry.register("borndigital", {
  name: "borndigital",
  description: "ICDAR 2013 Born-Digital cropped words",
  splits: BORN_DIGITAL_SPLITS,
  load: (opts) => {
    const ignored = BORN_DIGITAL_UNSUPPORTED.filter((key) => opts[key] !== undefined && opts[key] !== false);
    const warn = ignored.length > 0
      ? Effect.logWarning(`borndigital ignores unsupported options: ${ignored.join(", ")}`)
      : Effect.void;
    return Effect.zipRight(
      warn,
      getBornDigitalRecognizerDataset({ split: opts.split, cacheDir: opts.cacheDir, timeoutMs: opts.timeoutMs }),
    );
  },
});
