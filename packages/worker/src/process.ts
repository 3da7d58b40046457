import {
  logError,
  logEvent,
  steamStoreUrl,
  type GameMetadata,
  type GameResult,
  type SteamAppData,
  type TrailerResolver,
} from "@trailerbin/scraper";
import type { TrailerSource } from "./config.js";

/** What a worker needs to turn one app ID into a page row. */
export interface WorkerDeps {
  steam: {
    fetchAppDetails(appid: number): Promise<SteamAppData | null>;
    normalizeGame(appid: number, data: SteamAppData | null): GameMetadata;
  };
  /** Required unless `trailerSource` is "api". */
  trailers?: TrailerResolver;
  trailerSource: TrailerSource;
  /** Upper bound of the random delay before each game starts. */
  jitterMaxMs: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Row for a game whose metadata could not be turned into a page entry. */
export function fallbackGame(appid: number): GameMetadata {
  return { appid, name: `App ${appid}`, storeUrl: steamStoreUrl(appid), headerImage: "" };
}

function describeGame(deps: WorkerDeps, appid: number, data: SteamAppData | null): GameMetadata {
  try {
    return deps.steam.normalizeGame(appid, data);
  } catch (err) {
    logError("normalize-failed", err, { appid });
    return fallbackGame(appid);
  }
}

async function resolveTrailer(deps: WorkerDeps, game: GameMetadata): Promise<string | null> {
  if (deps.trailerSource === "api") return game.manifestUrl ?? null;
  if (deps.trailerSource === "auto" && game.manifestUrl) return game.manifestUrl;
  if (!deps.trailers) return null;
  try {
    return await deps.trailers.resolve(game.appid);
  } catch (err) {
    logError("trailer-failed", err, { appid: game.appid });
    return null;
  }
}

/** Turns one app ID into a page row; a failing game still yields a row with defaults. */
export async function processAppId(deps: WorkerDeps, appid: number, index: number): Promise<GameResult> {
  logEvent("processing", { appid, index });

  // spread the first burst of requests out a little
  const jitterMs = Math.floor((deps.random ?? Math.random)() * deps.jitterMaxMs);
  if (jitterMs > 0) await (deps.sleep ?? sleep)(jitterMs);

  const data = await deps.steam.fetchAppDetails(appid);
  const game = describeGame(deps, appid, data);
  const mpdUrl = await resolveTrailer(deps, game);

  return { ...game, index, mpdUrl };
}
