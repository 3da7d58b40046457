/**
 * Scraper package entry point.
 *
 * Everything the page generator needs to talk to Steam:
 *  - SlidingWindowRateLimiter → shared quota for the Store API
 *  - SteamStoreClient         → appdetails with retry/backoff
 *  - BrowserTrailerResolver   → Playwright, for the trailer manifest the API may not expose
 */
export { BaseScraper } from "./types.js";
export type { GameMetadata, GameResult, ScraperConfig, SteamAppData } from "./types.js";
export { Mutex } from "./mutex.js";
export { SlidingWindowRateLimiter, rateLimiterConfigSchema } from "./rate-limiter.js";
export type {
  RateLimiter,
  RateLimiterConfig,
  RateLimiterOptions,
  RateLimitWaitEvent,
} from "./rate-limiter.js";
export {
  appDetailsEntrySchema,
  appDetailsResponseSchema,
  gameMetadataSchema,
  steamAppDataSchema,
  steamMovieSchema,
} from "./schemas.js";
export { SteamStoreClient, pickManifestUrl, steamStoreUrl, steamWidgetUrl } from "./steam.js";
export {
  BANNER_SELECTORS,
  BrowserTrailerResolver,
  PLAY_SELECTORS,
  STEAM_COOKIES,
  prepareContext,
} from "./trailer.js";
export type { TrailerResolver, TrailerResolverOptions } from "./trailer.js";
export { loadAppIdsFromFile, parseAppIdArgs, parseAppIds } from "./appids.js";
export type { ParsedAppIds } from "./appids.js";
export {
  HttpError,
  InvalidAppIdError,
  InvalidRateLimiterConfigError,
  SteamApiError,
} from "./errors.js";
export { describeError, logError, logEvent, logWarn } from "./logger.js";
export type { LogFields } from "./logger.js";
