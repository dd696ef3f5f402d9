/**
 * Verified fetch: a content-checked, resumable download cache.
 *
 * A URL maps to `<cacheDir>/<filename>`. A cached file is trusted only when
 * its SHA-256 matches the expected digest (or no digest is given). Downloads
 * stream into `<filename>.part` beside the target and are renamed into place
 * only after the digest checks out, so the canonical path never holds a
 * partial or corrupt file.
 */
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { pipeline } from "node:stream/promises";
import { Duration, Effect } from "effect";
import { FetchError, HttpService, VerificationError } from "@ocrsets/core";
import { digestsEqual, sha256File } from "./digest.js";

export interface DownloadOptions {
  readonly url: string;
  readonly cacheDir: string;
  /** Expected lowercase hex SHA-256. Omit to trust any cached copy. */
  readonly sha256?: string;
  /** Cache file name. Defaults to the last URL path segment. */
  readonly filename?: string;
  readonly verbose?: boolean;
  /** Re-download even when a verified copy exists. */
  readonly force?: boolean;
  /** Bound on a single attempt. */
  readonly timeoutMs?: number;
  /** Extra attempts after a FetchError. Digest mismatches are never retried. */
  readonly retries?: number;
}

/** Deterministic cache file name for a URL. */
export function cacheFilename(url: string): string {
  const name = basename(new URL(url).pathname);
  if (!name) throw new TypeError(`Cannot derive a file name from ${url}`);
  return name;
}

export function cachePath(opts: Pick<DownloadOptions, "url" | "cacheDir" | "filename">): string {
  return join(opts.cacheDir, opts.filename ?? cacheFilename(opts.url));
}

const ioError = (url: string, what: string) => (cause: unknown) =>
  new FetchError({ url, message: `${what}: ${cause instanceof Error ? cause.message : String(cause)}`, cause });

async function sizeOf(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch {
    return undefined;
  }
}

const digestOf = (url: string, path: string) =>
  Effect.tryPromise({
    try: () => sha256File(path),
    catch: ioError(url, `Failed to read cached file ${path}`),
  });

/**
 * Stream `url` into `partPath`, resuming from whatever is already there.
 */
const streamToPart = (url: string, partPath: string) =>
  Effect.flatMap(HttpService, (http) =>
    Effect.tryPromise({
      try: async (signal) => {
        let have = (await sizeOf(partPath)) ?? 0;
        let res = await http.get(url, { headers: have > 0 ? { Range: `bytes=${have}-` } : {}, signal });

        // Range past the end: the part belongs to some other body, start over.
        if (res.status === 416 && have > 0) {
          await rm(partPath, { force: true });
          have = 0;
          res = await http.get(url, { headers: {}, signal });
        }
        if (res.status !== 200 && res.status !== 206) {
          throw new FetchError({ url, status: res.status, message: `HTTP ${res.status} ${res.statusText} fetching ${url}` });
        }

        const flags = res.status === 206 && have > 0 ? "a" : "w";
        await pipeline(res.body, createWriteStream(partPath, { flags }), { signal });
      },
      catch: (cause) => (cause instanceof FetchError ? cause : ioError(url, `Download of ${url} failed`)(cause)),
    }),
  );

/**
 * Return a local path for `url`, downloading it into `cacheDir` unless a
 * verified copy is already cached.
 */
export function downloadAndVerify(
  opts: DownloadOptions,
): Effect.Effect<string, FetchError | VerificationError, HttpService> {
  const { url, cacheDir, sha256, verbose = false, force = false } = opts;

  return Effect.gen(function* () {
    const target = yield* Effect.try({
      try: () => cachePath(opts),
      catch: (cause) => new FetchError({ url, message: `Invalid URL: ${url}`, cause }),
    });
    const partPath = `${target}.part`;
    const log = verbose ? Effect.logInfo : Effect.logDebug;

    yield* Effect.tryPromise({
      try: () => mkdir(cacheDir, { recursive: true }),
      catch: ioError(url, `Failed to create cache directory ${cacheDir}`),
    });

    if (!force && (yield* Effect.promise(() => sizeOf(target))) !== undefined) {
      // without a digest, existence is enough and the file is not read
      if (sha256 === undefined || digestsEqual(sha256, yield* digestOf(url, target))) {
        yield* Effect.logDebug(`cache hit ${target}`);
        return target;
      }
      yield* Effect.logWarning(`Cached ${target} failed verification, downloading again`);
    }

    yield* log(`Downloading ${url}`);
    let attempt = streamToPart(url, partPath);
    if (opts.timeoutMs !== undefined) {
      attempt = attempt.pipe(
        Effect.timeoutFail({
          duration: Duration.millis(opts.timeoutMs),
          onTimeout: () => new FetchError({ url, message: `Timed out after ${opts.timeoutMs}ms fetching ${url}` }),
        }),
      );
    }
    yield* attempt.pipe(Effect.retry({ times: opts.retries ?? 0 }));

    const actual = yield* Effect.tryPromise({
      try: () => sha256File(partPath),
      catch: ioError(url, `Failed to hash ${partPath}`),
    });
    if (sha256 !== undefined && !digestsEqual(sha256, actual)) {
      // neither the download nor an older cached copy may stay behind
      yield* Effect.tryPromise({
        try: () => Promise.all([rm(partPath, { force: true }), rm(target, { force: true })]),
        catch: ioError(url, `Failed to discard ${partPath}`),
      });
      return yield* Effect.fail(VerificationError.mismatch(url, sha256, actual));
    }

    yield* Effect.tryPromise({
      try: () => rename(partPath, target),
      catch: ioError(url, `Failed to move ${partPath} into place`),
    });
    yield* log(`Saved ${target}`);
    return target;
  }).pipe(Effect.annotateLogs({ url }));
}
