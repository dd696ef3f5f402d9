/**
 * Concurrent verified downloads with progress and fail-fast semantics.
 */
import { availableParallelism } from "node:os";
import { Effect } from "effect";
import type { FetchError, HttpService, VerificationError } from "@ocrsets/core";
import { downloadAndVerify, type DownloadOptions } from "./download.js";

export type ProgressFn = (phase: string, done: number, total: number) => void;

export interface FetchAllOptions {
  /** Parallel downloads. Defaults to min(32, cores + 4). */
  readonly concurrency?: number;
  readonly onProgress?: ProgressFn;
  /** Label passed to `onProgress`. */
  readonly phase?: string;
}

export function defaultConcurrency(): number {
  return Math.min(32, availableParallelism() + 4);
}

/**
 * Download every request. The first failure interrupts the downloads still
 * in flight and fails the whole call; paths come back in request order.
 */
export function fetchAll(
  requests: readonly DownloadOptions[],
  opts: FetchAllOptions = {},
): Effect.Effect<string[], FetchError | VerificationError, HttpService> {
  const total = requests.length;
  const phase = opts.phase ?? "download";
  let done = 0;

  return Effect.suspend(() => {
    done = 0;
    opts.onProgress?.(phase, 0, total);
    return Effect.forEach(
      requests,
      (req) =>
        downloadAndVerify(req).pipe(
          Effect.tap(() =>
            Effect.sync(() => {
              done++;
              opts.onProgress?.(phase, done, total);
            }),
          ),
        ),
      { concurrency: opts.concurrency ?? defaultConcurrency() },
    );
  });
}
