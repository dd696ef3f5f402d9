/**
 * Effect layers for dependency injection.
 *
 * Each external collaborator gets a Layer: a live one for real runs and a
 * `...From` variant that wraps a ready-made instance (tests, custom backends).
 */
import { Layer } from "effect";
import {
  ArchiveService, HttpService, RngService,
  type Archive, type HttpClient,
  SeededRng,
} from "@ocrsets/core";
import { FetchHttpClient, ZipArchive } from "@ocrsets/cache";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number) =>
  Layer.succeed(RngService, new SeededRng(seed));

// ── HTTP Layer ─────────────────────────────────────────────────────────────

export const HttpLive = Layer.sync(HttpService, () => new FetchHttpClient());

export const HttpFrom = (client: HttpClient) =>
  Layer.succeed(HttpService, client);

// ── Archive Layer ──────────────────────────────────────────────────────────

export const ArchiveLive = Layer.sync(ArchiveService, () => new ZipArchive());

export const ArchiveFrom = (archive: Archive) =>
  Layer.succeed(ArchiveService, archive);

/** Everything the dataset assemblers need for a real run. */
export const DatasetsLive = Layer.mergeAll(HttpLive, ArchiveLive);
