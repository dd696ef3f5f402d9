/**
 * Recognizer sample stream.
 *
 * Cycles a labelled dataset forever: reshuffle at the start of every pass,
 * crop or fit each image to height × width, keep only characters in the
 * alphabet, optionally augment, and hand out (image, text) pairs.
 */
import { Effect } from "effect";
import {
  InvalidArgumentError, RngService,
  type Augmenter, type Dataset, type FillColor, type ImageOps, type LabelEntry, type Rng, type RgbImage,
} from "@ocrsets/core";

export interface RecognizerSample {
  readonly image: RgbImage;
  readonly text: string;
}

export interface RecognizerGeneratorOptions {
  readonly dataset: Dataset;
  readonly height: number;
  readonly width: number;
  /** Characters the recognizer supports; anything else is dropped from labels. */
  readonly alphabet: string | Iterable<string>;
  readonly imageOps: ImageOps;
  readonly augment?: Augmenter;
}

function toCharSet(alphabet: string | Iterable<string>): ReadonlySet<string> {
  return new Set(typeof alphabet === "string" ? Array.from(alphabet) : alphabet);
}

export function filterText(text: string, alphabet: ReadonlySet<string>): string {
  return Array.from(text).filter((c) => alphabet.has(c)).join("");
}

/** Entries with at least one character outside the alphabet. */
export function countIllegal(dataset: Dataset, alphabet: ReadonlySet<string>): number {
  return dataset.filter((e) => Array.from(e.text).some((c) => !alphabet.has(c))).length;
}

export class RecognizerGenerator implements AsyncIterableIterator<RecognizerSample> {
  private readonly labels: LabelEntry[];
  private readonly alphabet: ReadonlySet<string>;
  private readonly height: number;
  private readonly width: number;
  private readonly imageOps: ImageOps;
  private readonly augment: Augmenter | undefined;
  private readonly rng: Rng;
  private index = 0;
  private _epoch = 0;

  /** Entries with characters outside the alphabet, counted at construction. */
  readonly illegalCount: number;

  constructor(opts: RecognizerGeneratorOptions, rng: Rng) {
    if (opts.height < 1 || opts.width < 1) {
      throw new InvalidArgumentError({ message: `Sample size must be positive, got ${opts.height}×${opts.width}` });
    }
    if (opts.dataset.length === 0) {
      throw new InvalidArgumentError({ message: "Cannot generate samples from an empty dataset" });
    }
    this.alphabet = toCharSet(opts.alphabet);
    if (!opts.dataset.some((e) => filterText(e.text, this.alphabet).length > 0)) {
      throw new InvalidArgumentError({ message: "No label keeps any character after alphabet filtering" });
    }
    this.labels = [...opts.dataset];
    this.height = opts.height;
    this.width = opts.width;
    this.imageOps = opts.imageOps;
    this.augment = opts.augment;
    this.rng = rng;
    this.illegalCount = countIllegal(this.labels, this.alphabet);
  }

  /** Number of shuffles so far; the first pull performs the first one. */
  get epoch(): number {
    return this._epoch;
  }

  get size(): number {
    return this.labels.length;
  }

  private fillColor(): FillColor {
    return [this.rng.int(0, 256), this.rng.int(0, 256), this.rng.int(0, 256)];
  }

  private async render(entry: LabelEntry, fill: FillColor): Promise<RgbImage> {
    if (entry.region === null) {
      return this.imageOps.readAndFit(entry.imagePath, this.width, this.height, fill);
    }
    const source = await this.imageOps.read(entry.imagePath);
    return this.imageOps.rectify(source, entry.region, this.height, this.width, fill);
  }

  /** Pull the next sample. Never finishes; image errors reject. */
  async nextSample(): Promise<RecognizerSample> {
    for (;;) {
      if (this.index === 0) {
        this.rng.shuffle(this.labels);
        this._epoch++;
      }
      const entry = this.labels[this.index];
      this.index = (this.index + 1) % this.labels.length;

      const text = filterText(entry.text, this.alphabet);
      if (!text) continue;

      const fill = this.fillColor();
      let image = await this.render(entry, fill);
      if (this.augment) image = await this.augment(image, this.rng);
      return { image, text };
    }
  }

  async next(): Promise<IteratorResult<RecognizerSample>> {
    return { done: false, value: await this.nextSample() };
  }

  /** Pull `n` samples in order. */
  async take(n: number): Promise<RecognizerSample[]> {
    const out: RecognizerSample[] = [];
    for (let i = 0; i < n; i++) out.push(await this.nextSample());
    return out;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Build a generator using the RNG from context and report, without failing,
 * how many labels carry characters outside the alphabet.
 */
export function makeRecognizerGenerator(
  opts: RecognizerGeneratorOptions,
): Effect.Effect<RecognizerGenerator, InvalidArgumentError, RngService> {
  return Effect.gen(function* () {
    const rng = yield* RngService;
    const gen = yield* Effect.try({
      try: () => new RecognizerGenerator(opts, rng),
      catch: (e) => (e instanceof InvalidArgumentError ? e : new InvalidArgumentError({ message: String(e) })),
    });
    if (gen.illegalCount > 0) {
      yield* Effect.logInfo(`${gen.illegalCount} / ${gen.size} instances have illegal characters.`);
    }
    return gen;
  });
}
