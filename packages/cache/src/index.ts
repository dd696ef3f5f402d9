/**
 * @ocrsets/cache -- verified downloads and archive access.
 */
export { downloadAndVerify, cacheFilename, cachePath, type DownloadOptions } from "./download.js";
export { fetchAll, defaultConcurrency, type FetchAllOptions, type ProgressFn } from "./fanout.js";
export { sha256Hex, sha256File, digestsEqual } from "./digest.js";
export { FetchHttpClient } from "./http.js";
export { ZipArchive } from "./archive.js";
