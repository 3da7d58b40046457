import { SteamApiError } from "./errors.js";
import { logError } from "./logger.js";
import { appDetailsResponseSchema, gameMetadataSchema } from "./schemas.js";
import { BaseScraper, type GameMetadata, type ScraperConfig, type SteamAppData } from "./types.js";

const STEAM_STORE = "https://store.steampowered.com";
const STEAM_API = `${STEAM_STORE}/api`;

export function steamStoreUrl(appid: number): string {
  return `${STEAM_STORE}/app/${appid}/`;
}

export function steamWidgetUrl(appid: number): string {
  return `${STEAM_STORE}/widget/${appid}/`;
}

/** First DASH manifest among the app's movies, preferring H.264 over AV1. */
export function pickManifestUrl(data: SteamAppData | null): string | undefined {
  for (const movie of data?.movies ?? []) {
    const url = movie.dash_h264 ?? movie.dash_av1;
    if (url) return url;
  }
  return undefined;
}

export class SteamStoreClient extends BaseScraper {
  constructor(config: ScraperConfig = {}) {
    super({
      headers: { Accept: "application/json" },
      maxRetries: 5,
      ...config,
    });
  }

  /**
   * Fetches store metadata for one app. `success: false` is Steam's usual
   * answer when throttling, so it is retried like a 5xx.
   * Resolves null once every attempt has failed.
   */
  async fetchAppDetails(appid: number): Promise<SteamAppData | null> {
    const url = `${STEAM_API}/appdetails?appids=${appid}`;
    try {
      return await this.fetchWithRetry(`appdetails ${appid}`, url, async (res) => {
        const body = appDetailsResponseSchema.parse(await res.json());
        const entry = body[String(appid)];
        if (!entry?.success || !entry.data) throw new SteamApiError(appid);
        return entry.data;
      });
    } catch (err) {
      logError("appdetails-give-up", err, { appid, maxRetries: this.maxRetries });
      return null;
    }
  }

  /** Maps a (possibly missing) appdetails payload to the fields a page row needs. */
  normalizeGame(appid: number, data: SteamAppData | null): GameMetadata {
    const manifestUrl = pickManifestUrl(data);
    return gameMetadataSchema.parse({
      appid,
      name: data?.name || `App ${appid}`,
      storeUrl: steamStoreUrl(appid),
      headerImage: data?.header_image ?? "",
      ...(manifestUrl ? { manifestUrl } : {}),
    });
  }
}

export default SteamStoreClient;
