import { access } from "node:fs/promises";
import { chromium, type Browser } from "playwright-core";
import {
  BrowserTrailerResolver,
  SlidingWindowRateLimiter,
  SteamStoreClient,
  loadAppIdsFromFile,
  logError,
  logEvent,
  parseAppIdArgs,
  prepareContext,
  type TrailerResolver,
} from "@trailerbin/scraper";
import { loadConfig, type RunConfig } from "./config.js";
import { generatePages } from "./run.js";

export const DEFAULT_APPIDS: readonly number[] = [4050060];

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
  "AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/122.0.0.0 Safari/537.36";

export type AppIdSource = "args" | "file" | "default";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Command-line arguments win over the app ID file, which wins over the built-in list. */
export async function resolveAppIds(
  args: readonly string[],
  appidsFile: string,
): Promise<{ appids: number[]; source: AppIdSource }> {
  if (args.length > 0) {
    return { appids: parseAppIdArgs(args), source: "args" };
  }
  if (await exists(appidsFile)) {
    return { appids: await loadAppIdsFromFile(appidsFile), source: "file" };
  }
  return { appids: [...DEFAULT_APPIDS], source: "default" };
}

async function launchResolver(config: RunConfig): Promise<{ browser: Browser; trailers: TrailerResolver }> {
  const browser = await chromium.launch({
    headless: true,
    ...(config.chromiumExecutablePath ? { executablePath: config.chromiumExecutablePath } : {}),
  });
  const context = await browser.newContext({
    viewport: { width: 1280, height: 800 },
    userAgent: USER_AGENT,
  });
  await prepareContext(context);
  return { browser, trailers: new BrowserTrailerResolver(context, { mpdWaitMs: config.mpdWaitMs }) };
}

/** Runs the whole pipeline and resolves with the process exit code. */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const config = loadConfig(env);
  const { appids, source } = await resolveAppIds(args, config.appidsFile);
  logEvent("appids-loaded", { count: appids.length, source });

  if (appids.length === 0) {
    logError(
      "no-appids",
      new Error("No appids found. Pass them as arguments or list them in the app ID file."),
      { appidsFile: config.appidsFile },
    );
    return 1;
  }

  const limiter = new SlidingWindowRateLimiter({
    maxCalls: config.apiMaxCalls,
    periodMs: config.apiPeriodMs,
  });
  const steam = new SteamStoreClient({ limiter, maxRetries: config.apiMaxRetries });

  let browser: Browser | undefined;
  try {
    let trailers: TrailerResolver | undefined;
    if (config.trailerSource !== "api") {
      ({ browser, trailers } = await launchResolver(config));
    }

    const summaries = await generatePages(
      appids,
      {
        chunkSize: config.chunkSize,
        concurrency: config.concurrency,
        outputDir: config.outputDir,
        outputPrefix: config.outputPrefix,
      },
      {
        steam,
        trailerSource: config.trailerSource,
        jitterMaxMs: config.jitterMaxMs,
        trailers,
      },
    );
    logEvent("done", { files: summaries.map((s) => s.file) });
  } finally {
    await browser?.close();
  }
  return 0;
}
