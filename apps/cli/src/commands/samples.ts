/**
 * Command: ocrsets samples
 *
 * Pull samples from the recognizer generator and write them as PNG files
 * with a tab-separated labels.txt beside them.
 */
import { Effect } from "effect";
import { SharpImageOps, writePng } from "@ocrsets/imaging";
import { makeRecognizerGenerator } from "@ocrsets/train";
import { parseKV, loadConfig, intArg, strArg, requireArg } from "../parse.js";
import { commandLayer, loadDataset } from "../resolve.js";

export async function samplesCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const alphabet = requireArg(kv, "alphabet", "characters the recognizer supports");
  const height = intArg(kv, "height", 31);
  const width = intArg(kv, "width", 200);
  const count = intArg(kv, "count", 16);
  const outDir = strArg(kv, "out", "samples");

  const program = Effect.gen(function* () {
    const dataset = yield* loadDataset(kv);
    return yield* makeRecognizerGenerator({ dataset, height, width, alphabet, imageOps: new SharpImageOps() });
  });
  const generator = await Effect.runPromise(program.pipe(Effect.provide(commandLayer(kv))));

  const fs = await import("node:fs/promises");
  const path = await import("node:path");
  await fs.mkdir(outDir, { recursive: true });

  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    const { image, text } = await generator.nextSample();
    const file = `${String(i).padStart(5, "0")}.png`;
    await writePng(image, path.join(outDir, file));
    lines.push(`${file}\t${text}`);
  }
  await fs.writeFile(path.join(outDir, "labels.txt"), lines.join("\n") + "\n", "utf-8");
  console.log(`${count} samples (${width}×${height}) written to ${outDir}`);
}
