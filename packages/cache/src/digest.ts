/**
 * SHA-256 helpers for cache verification.
 */
import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export function sha256Hex(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Stream a file through SHA-256; archives can be several GB. */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function digestsEqual(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.toLowerCase();
}
