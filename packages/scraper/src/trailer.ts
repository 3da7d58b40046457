import { errors, type BrowserContext, type Page, type Request } from "playwright-core";
import { describeError, logEvent, logWarn } from "./logger.js";
import { steamStoreUrl } from "./steam.js";

/** Cookies that skip the age gate and mature-content interstitials. */
export const STEAM_COOKIES = [
  { name: "birthtime", value: "0", domain: ".steampowered.com", path: "/" },
  { name: "mature_content", value: "1", domain: ".steampowered.com", path: "/" },
  { name: "lastagecheckage", value: "1-0-1990", domain: ".steampowered.com", path: "/" },
];

export const BANNER_SELECTORS = [
  "#cookieAgreementPopup .btn_medium",
  ".agegate_text_container .btn_medium",
  "#age_gate_btn_continue",
];

export const PLAY_SELECTORS = [
  "[data-trailer-player] .vXKdKnTS2vXaw2YxC0Yc1",
  "[data-trailer-player]",
];

export interface TrailerResolverOptions {
  /** How long to wait for a manifest request after clicking play. */
  mpdWaitMs?: number;
  navigationTimeoutMs?: number;
  playTimeoutMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/** Anything that can find a trailer stream manifest for an app. */
export interface TrailerResolver {
  resolve(appid: number): Promise<string | null>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function prepareContext(context: BrowserContext): Promise<void> {
  await context.addCookies(STEAM_COOKIES);
}

/**
 * Opens the store page in a shared browser context, clicks the trailer's play
 * button and captures the first `.mpd` request the player makes.
 */
export class BrowserTrailerResolver implements TrailerResolver {
  private readonly mpdWaitMs: number;
  private readonly navigationTimeoutMs: number;
  private readonly playTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly context: BrowserContext,
    options: TrailerResolverOptions = {},
  ) {
    this.mpdWaitMs = options.mpdWaitMs ?? 15_000;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
    this.playTimeoutMs = options.playTimeoutMs ?? 8_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async resolve(appid: number): Promise<string | null> {
    const captured: { url: string | null } = { url: null };
    let page: Page | undefined;

    try {
      page = await this.context.newPage();
      page.on("request", (request: Request) => {
        const url = request.url();
        if (captured.url === null && url.includes(".mpd")) {
          captured.url = url;
          logEvent("mpd-intercepted", { appid, url });
        }
      });

      logEvent("navigating", { appid });
      await page.goto(steamStoreUrl(appid), {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });

      for (const selector of BANNER_SELECTORS) {
        try {
          const button = page.locator(selector).first();
          if (await button.isVisible()) await button.click();
        } catch {
          // banner vanished between the check and the click
        }
      }

      let clicked = false;
      for (const selector of PLAY_SELECTORS) {
        try {
          const player = page.locator(selector).first();
          await player.waitFor({ state: "visible", timeout: this.playTimeoutMs });
          await player.click();
          logEvent("play-clicked", { appid, selector });
          clicked = true;
          break;
        } catch {
          continue;
        }
      }
      if (!clicked) logWarn("play-not-found", { appid });

      const deadline = this.now() + this.mpdWaitMs;
      while (captured.url === null && this.now() < deadline) {
        await this.sleep(this.pollIntervalMs);
      }
      if (captured.url === null) {
        logWarn("mpd-not-found", { appid, waitedMs: this.mpdWaitMs });
      }
    } catch (err) {
      const kind = err instanceof errors.TimeoutError ? "browser-timeout" : "browser-error";
      logWarn(kind, { appid, error: describeError(err) });
    } finally {
      await page?.close().catch((err: unknown) => {
        logWarn("page-close-failed", { appid, error: describeError(err) });
      });
    }

    return captured.url;
  }
}
