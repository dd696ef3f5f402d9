#!/usr/bin/env node
/**
 * ocrsets CLI: the main entry point.
 *
 * Commands: fetch, samples, datasets
 */
import { existsSync, readFileSync } from "node:fs";

// Load .env.local (optional; existing environment wins)
if (existsSync(".env.local")) {
  const envContent = readFileSync(".env.local", "utf8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}
import { fetchCmd } from "./commands/fetch.js";
import { samplesCmd } from "./commands/samples.js";
import { listDatasets } from "./resolve.js";

const USAGE = `
ocrsets: verified OCR recognizer datasets and training samples

Commands:
  fetch            Download, verify and parse a dataset
  samples          Write augmented recognizer samples as PNG files
  datasets         List available datasets

Options:
  --dataset=NAME   cocotext | borndigital (default: borndigital)
  --split=NAME     dataset split (default: train)
  --cache=DIR      cache root (default: $OCRSETS_CACHE_DIR or ~/.ocrsets)
  --config=FILE    JSON file with default options
  --logLevel=LVL   debug | info | warn | error
  --help, -h       Show this help

Examples:
  ocrsets fetch --dataset=borndigital --split=traintest --out=labels.jsonl
  ocrsets fetch --dataset=cocotext --split=val --limit=100 --legibleOnly --englishOnly
  ocrsets samples --dataset=borndigital --alphabet=0123456789abcdefghijklmnopqrstuvwxyz --count=32 --out=samples
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "fetch") {
    await fetchCmd(args.slice(1));
  } else if (command === "samples") {
    await samplesCmd(args.slice(1));
  } else if (command === "datasets") {
    console.log(listDatasets());
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
