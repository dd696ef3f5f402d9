/**
 * HttpClient over the global fetch (undici in Node 20).
 */
import type { HttpClient, HttpRequestInit, HttpResponse } from "@ocrsets/core";

async function* emptyBody(): AsyncGenerator<Uint8Array> {}

export class FetchHttpClient implements HttpClient {
  readonly name = "fetch";

  async get(url: string, init: HttpRequestInit): Promise<HttpResponse> {
    const res = await fetch(url, { headers: { ...init.headers }, signal: init.signal, redirect: "follow" });
    return {
      status: res.status,
      statusText: res.statusText,
      body: res.body ?? emptyBody(),
    };
  }
}
