/**
 * ICDAR 2013 Born-Digital word recognition dataset. Images come pre-cropped,
 * so every entry has a null region.
 */
import { join } from "node:path";
import { Effect } from "effect";
import {
  ArchiveService, oneOf,
  type HttpService,
  type ArchiveError, type Dataset, type FetchError, type InvalidArgumentError,
  type LabelEntry, type LabelParseError, type VerificationError,
} from "@ocrsets/core";
import { downloadAndVerify } from "@ocrsets/cache";
import { readBornDigitalLabels } from "./labels.js";
import {
  BORN_DIGITAL_FILES, BORN_DIGITAL_SPLITS,
  defaultCacheDir,
  type BornDigitalOptions,
} from "./types.js";

export type BornDigitalError =
  | InvalidArgumentError | FetchError | VerificationError | ArchiveError | LabelParseError;

export function getBornDigitalRecognizerDataset(
  opts: BornDigitalOptions = {},
): Effect.Effect<Dataset, BornDigitalError, HttpService | ArchiveService> {
  return Effect.gen(function* () {
    const split = yield* oneOf("Born-Digital split", opts.split ?? "train", BORN_DIGITAL_SPLITS);
    const mainDir = join(opts.cacheDir ?? defaultCacheDir(), "borndigital");
    const files = { ...BORN_DIGITAL_FILES, ...opts.files };
    const archive = yield* ArchiveService;
    const data: LabelEntry[] = [];

    if (split === "train" || split === "traintest") {
      const trainDir = join(mainDir, "train");
      const zip = yield* downloadAndVerify({ ...files.train, cacheDir: mainDir, timeoutMs: opts.timeoutMs, verbose: true });
      yield* archive.extractAll(zip, trainDir);
      data.push(...(yield* readBornDigitalLabels(join(trainDir, "gt.txt"), trainDir)));
    }

    if (split === "test" || split === "traintest") {
      const testDir = join(mainDir, "test");
      const zip = yield* downloadAndVerify({ ...files.testImages, cacheDir: mainDir, timeoutMs: opts.timeoutMs, verbose: true });
      yield* archive.extractAll(zip, testDir);
      // ground truth for the test split is published separately
      const gt = yield* downloadAndVerify({ ...files.testGroundTruth, cacheDir: testDir, timeoutMs: opts.timeoutMs, verbose: true });
      data.push(...(yield* readBornDigitalLabels(gt, testDir)));
    }

    yield* Effect.logInfo(`${data.length} text instances (${split})`);
    return data;
  }).pipe(Effect.annotateLogs({ dataset: "borndigital" }));
}
