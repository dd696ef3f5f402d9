/**
 * Command: ocrsets fetch
 *
 * Download, verify and parse a dataset into the cache; optionally dump the
 * normalized labels as JSON lines.
 */
import { Effect } from "effect";
import { parseKV, loadConfig } from "../parse.js";
import { commandLayer, loadDataset } from "../resolve.js";

export async function fetchCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const outPath = kv["out"];

  const dataset = await Effect.runPromise(loadDataset(kv).pipe(Effect.provide(commandLayer(kv))));
  console.log(`${dataset.length} labelled text instances`);

  if (outPath) {
    const fs = await import("node:fs/promises");
    const lines = dataset.map((entry) => JSON.stringify(entry)).join("\n");
    await fs.writeFile(outPath, lines + "\n", "utf-8");
    console.log(`Labels written to ${outPath}`);
  }
}
