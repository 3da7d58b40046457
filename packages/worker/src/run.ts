import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { logEvent } from "@trailerbin/scraper";
import { chunk, mapWithConcurrency } from "./batch.js";
import { buildHtml } from "./html.js";
import { processAppId, type WorkerDeps } from "./process.js";

export interface GenerateOptions {
  chunkSize: number;
  concurrency: number;
  outputDir: string;
  outputPrefix: string;
}

export interface BatchSummary {
  file: string;
  games: number;
  trailersFound: number;
}

export function outputFileName(prefix: string, batchNumber: number): string {
  return `${prefix}_${batchNumber}.html`;
}

/**
 * Processes `appids` in batches of `chunkSize` and writes one page per batch
 * as `<outputDir>/<prefix>_<n>.html`, n starting at 1.
 */
export async function generatePages(
  appids: readonly number[],
  options: GenerateOptions,
  deps: WorkerDeps,
): Promise<BatchSummary[]> {
  const batches = chunk(appids, options.chunkSize);
  logEvent("run-started", {
    appids: appids.length,
    files: batches.length,
    chunkSize: options.chunkSize,
    concurrency: options.concurrency,
  });

  await mkdir(options.outputDir, { recursive: true });
  const summaries: BatchSummary[] = [];

  for (const [i, batch] of batches.entries()) {
    const fileName = outputFileName(options.outputPrefix, i + 1);
    logEvent("batch-started", { batch: i + 1, of: batches.length, file: fileName, games: batch.length });

    const results = await mapWithConcurrency(batch, options.concurrency, (appid, index) =>
      processAppId(deps, appid, index),
    );
    results.sort((a, b) => a.index - b.index);

    const file = join(options.outputDir, fileName);
    await writeFile(file, buildHtml(results, fileName), "utf-8");

    const trailersFound = results.filter((r) => r.mpdUrl).length;
    logEvent("batch-written", { file, trailersFound, games: results.length });
    summaries.push({ file, games: results.length, trailersFound });
  }

  logEvent("run-complete", { files: summaries.length });
  return summaries;
}
