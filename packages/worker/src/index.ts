/**
 * Page generator: batches app IDs, fetches metadata and trailer manifests
 * with bounded concurrency, and writes one HTML page per batch.
 */
export { chunk, mapWithConcurrency } from "./batch.js";
export { ConfigError, loadConfig, trailerSources } from "./config.js";
export type { RunConfig, TrailerSource } from "./config.js";
export { DASHJS_URL, buildHtml, escapeHtml, renderRow, renderTrailerCell } from "./html.js";
export { processAppId } from "./process.js";
export type { WorkerDeps } from "./process.js";
export { generatePages, outputFileName } from "./run.js";
export type { BatchSummary, GenerateOptions } from "./run.js";
export { DEFAULT_APPIDS, main, resolveAppIds } from "./cli.js";
export type { AppIdSource } from "./cli.js";
