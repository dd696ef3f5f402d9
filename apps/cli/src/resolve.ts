/**
 * Build the Effect runtime for a command from its CLI args.
 */
import { Effect, Layer } from "effect";
import { DatasetsLive, RngLive, loggingLayer, parseLogLevel, withSpan } from "@ocrsets/effect-runtime";
import { datasetRegistry, defaultCacheDir, type DatasetLoadOptions } from "@ocrsets/datasets";
import { timeSeed } from "@ocrsets/core";
import { boolArg, intArg, optIntArg, strArg } from "./parse.js";

export function resolveLogLevel(kv: Record<string, string>) {
  return parseLogLevel(strArg(kv, "logLevel", process.env.OCRSETS_LOG_LEVEL ?? "info"));
}

/** Live HTTP + archive services, a seeded RNG and the pretty logger. */
export function commandLayer(kv: Record<string, string>) {
  return Layer.mergeAll(
    DatasetsLive,
    RngLive(intArg(kv, "seed", timeSeed())),
    loggingLayer(resolveLogLevel(kv)),
  );
}

function progressPrinter(phase: string, done: number, total: number): void {
  process.stdout.write(`\r${phase}: ${done}/${total}`);
  if (done === total) process.stdout.write("\n");
}

export function datasetOptions(kv: Record<string, string>): DatasetLoadOptions {
  return {
    split: strArg(kv, "split", "train"),
    cacheDir: strArg(kv, "cache", defaultCacheDir()),
    limit: optIntArg(kv, "limit"),
    legibleOnly: boolArg(kv, "legibleOnly", false),
    englishOnly: boolArg(kv, "englishOnly", false),
    concurrency: optIntArg(kv, "concurrency"),
    timeoutMs: optIntArg(kv, "timeout"),
    onProgress: progressPrinter,
  };
}

/** Look up `--dataset` and assemble it. */
export function loadDataset(kv: Record<string, string>) {
  const name = strArg(kv, "dataset", "borndigital");
  return withSpan(
    `dataset.${name}`,
    Effect.flatMap(datasetRegistry.get(name), (source) => source.load(datasetOptions(kv))),
  );
}

export function listDatasets(): string {
  return datasetRegistry
    .list()
    .map((name) => Effect.runSync(datasetRegistry.get(name)))
    .map((d) => `  ${d.name.padEnd(12)} ${d.description} (splits: ${d.splits.join(", ")})`)
    .join("\n");
}
