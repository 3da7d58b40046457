import { z } from "zod";
import { HttpError } from "./errors.js";
import { describeError, logWarn } from "./logger.js";
import type { RateLimiter } from "./rate-limiter.js";
import { gameMetadataSchema, steamAppDataSchema } from "./schemas.js";

export type SteamAppData = z.infer<typeof steamAppDataSchema>;
export type GameMetadata = z.infer<typeof gameMetadataSchema>;

/** One processed game, ready to render. */
export interface GameResult extends GameMetadata {
  /** Position inside its batch, used to restore input order. */
  index: number;
  mpdUrl: string | null;
}

export interface ScraperConfig {
  /** Shared quota gate, acquired once before every attempt. */
  limiter?: RateLimiter;
  headers?: Record<string, string>;
  /** Total attempts per call, including the first. */
  maxRetries?: number;
  /** Wait after failed attempt n is `backoffBaseMs * 2^n`. */
  backoffBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(err: unknown): boolean {
  return err instanceof HttpError ? err.retryable : true;
}

/**
 * Abstract base for HTTP clients of rate-limited store APIs.
 * Subclasses issue requests through fetchWithRetry(), or wrap custom calls
 * in withRetry() and call throttle() inside it.
 */
export abstract class BaseScraper {
  protected readonly headers: Record<string, string>;
  protected readonly maxRetries: number;
  private readonly limiter: RateLimiter | undefined;
  private readonly backoffBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: ScraperConfig = {}) {
    this.limiter = config.limiter;
    this.headers = config.headers ?? {};
    this.maxRetries = Math.max(1, config.maxRetries ?? 5);
    this.backoffBaseMs = config.backoffBaseMs ?? 1000;
    this.sleep = config.sleep ?? sleep;
  }

  /** Waits for the shared limiter, if one was injected. */
  protected async throttle(): Promise<void> {
    if (this.limiter) await this.limiter.acquire();
  }

  /**
   * Runs `fn` until it resolves or attempts run out, backing off
   * exponentially between attempts. Non-retryable HTTP errors (4xx other
   * than 429) fail immediately. The last error is rethrown.
   */
  protected async withRetry<T>(label: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        lastError = err;
        if (!isRetryable(err) || attempt === this.maxRetries) break;

        const waitMs = this.backoffBaseMs * Math.pow(2, attempt);
        logWarn("retry", {
          label,
          attempt,
          maxRetries: this.maxRetries,
          waitMs,
          error: describeError(err),
        });
        await this.sleep(waitMs);
      }
    }
    throw lastError;
  }

  /**
   * GETs `url` with the configured headers, throttling before every attempt.
   * A non-2xx status becomes an `HttpError`; `read` runs inside the retry
   * loop, so a body it rejects is retried too.
   */
  protected fetchWithRetry<T>(label: string, url: string, read: (res: Response) => Promise<T>): Promise<T> {
    return this.withRetry(label, async () => {
      await this.throttle();
      const res = await fetch(url, { headers: this.headers });
      if (!res.ok) throw new HttpError(res.status, url);
      return read(res);
    });
  }
}
