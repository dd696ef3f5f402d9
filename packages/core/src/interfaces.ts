/**
 * Subsystem interfaces (ports). Every external collaborator implements one of these.
 */
import { Context, Effect } from "effect";
import type { ArchiveError } from "./errors.js";
import type { FillColor, Region, RgbImage } from "./types.js";

// ── HTTP ───────────────────────────────────────────────────────────────────
export interface HttpRequestInit {
  readonly headers: Readonly<Record<string, string>>;
  readonly signal: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly body: AsyncIterable<Uint8Array>;
}

export interface HttpClient {
  readonly name: string;
  get(url: string, init: HttpRequestInit): Promise<HttpResponse>;
}

export class HttpService extends Context.Tag("HttpService")<
  HttpService,
  HttpClient
>() {}

// ── Archives ───────────────────────────────────────────────────────────────
export interface Archive {
  /** Extract every member under `dest`, overwriting what is already there. */
  extractAll(archivePath: string, dest: string): Effect.Effect<void, ArchiveError>;
  /** Read one member into memory. */
  readEntry(archivePath: string, member: string): Effect.Effect<Buffer, ArchiveError>;
}

export class ArchiveService extends Context.Tag("ArchiveService")<
  ArchiveService,
  Archive
>() {}

// ── Images ─────────────────────────────────────────────────────────────────
export interface ImageOps {
  read(path: string): Promise<RgbImage>;
  /** Resize to fit inside width × height, anchored top-left, padding with `fill`. */
  readAndFit(source: string | RgbImage, width: number, height: number, fill: FillColor): Promise<RgbImage>;
  /** Warp `region` of `image` into an axis-aligned height × width canvas. */
  rectify(image: RgbImage, region: Region, height: number, width: number, fill: FillColor): Promise<RgbImage>;
}

export type Augmenter = (image: RgbImage, rng: Rng) => RgbImage | Promise<RgbImage>;

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Returns a number in [0, 1). */
  next(): number;
  /** Returns an integer in [min, max). */
  int(min: number, max: number): number;
  /** Fisher-Yates shuffle in place. */
  shuffle<T>(arr: T[]): T[];
  state(): number;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
