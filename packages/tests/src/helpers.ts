/**
 * Shared fixtures: an in-process HTTP server stand-in, temp dirs and runners
 * that provide the dataset layers with logging silenced.
 */
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Layer } from "effect";
import type { ArchiveService, HttpClient, HttpRequestInit, HttpResponse, HttpService } from "@ocrsets/core";
import { ZipArchive } from "@ocrsets/cache";
import { ArchiveFrom, HttpFrom, loggingLayer, parseLogLevel } from "@ocrsets/effect-runtime";

export type Route = Uint8Array | ((init: HttpRequestInit) => Promise<HttpResponse>);

async function* chunks(bytes: Uint8Array): AsyncGenerator<Uint8Array> {
  const mid = Math.floor(bytes.length / 2);
  if (mid > 0) yield bytes.subarray(0, mid);
  yield bytes.subarray(mid);
}

export function respond(status: number, bytes: Uint8Array = new Uint8Array()): HttpResponse {
  return { status, statusText: status === 404 ? "Not Found" : "OK", body: chunks(bytes) };
}

/** Serves fixed routes, 404 for anything else, and records every request. */
export class FakeHttp implements HttpClient {
  readonly name = "fake";
  readonly requests: { url: string; headers: Record<string, string> }[] = [];
  private readonly routes = new Map<string, Route>();

  route(url: string, body: Route | string): this {
    this.routes.set(url, typeof body === "string" ? Buffer.from(body) : body);
    return this;
  }

  async get(url: string, init: HttpRequestInit): Promise<HttpResponse> {
    this.requests.push({ url, headers: { ...init.headers } });
    const route = this.routes.get(url);
    if (route === undefined) return respond(404);
    if (typeof route === "function") return route(init);
    return respond(200, route);
  }

  count(url: string): number {
    return this.requests.filter((r) => r.url === url).length;
  }
}

function layers(http: HttpClient) {
  return Layer.mergeAll(HttpFrom(http), ArchiveFrom(new ZipArchive()), loggingLayer(parseLogLevel("none")));
}

export function runWith<A, E>(
  effect: Effect.Effect<A, E, HttpService | ArchiveService>,
  http: HttpClient,
): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(layers(http))));
}

/** Run an effect that is expected to fail and return its error. */
export function failWith<A, E>(
  effect: Effect.Effect<A, E, HttpService | ArchiveService>,
  http: HttpClient,
): Promise<E> {
  return Effect.runPromise(Effect.flip(effect).pipe(Effect.provide(layers(http))));
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "ocrsets-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
