import { z } from "zod";
import { InvalidRateLimiterConfigError } from "./errors.js";
import { logEvent } from "./logger.js";
import { Mutex } from "./mutex.js";

export const rateLimiterConfigSchema = z.object({
  maxCalls: z.number().int().positive(),
  periodMs: z.number().finite().positive(),
});

export type RateLimiterConfig = z.infer<typeof rateLimiterConfigSchema>;

export interface RateLimitWaitEvent {
  /** How long the caller is about to sleep before re-checking the window. */
  waitMs: number;
  /** Callers inside `acquire()` at the time, including this one. */
  pending: number;
  maxCalls: number;
  periodMs: number;
}

export interface RateLimiterOptions {
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onWait?: (event: RateLimitWaitEvent) => void;
}

/** Anything that can gate a quota-governed call. */
export interface RateLimiter {
  acquire(): Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function logWait(event: RateLimitWaitEvent): void {
  logEvent("rate-limit-wait", {
    waitMs: Math.round(event.waitMs),
    pending: event.pending,
    maxCalls: event.maxCalls,
    periodMs: event.periodMs,
  });
}

/**
 * Admits at most `maxCalls` grants inside any trailing `periodMs` window,
 * shared by every caller holding the instance.
 *
 * The purge/check/append sequence runs under a mutex. A caller that finds the
 * window full releases the mutex before sleeping, so callers with quota
 * available are never queued behind a sleeper, and re-checks the window after
 * waking before it appends.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  readonly maxCalls: number;
  readonly periodMs: number;

  private readonly calls: number[] = [];
  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onWait: (event: RateLimitWaitEvent) => void;
  private inFlight = 0;

  constructor(config: RateLimiterConfig, options: RateLimiterOptions = {}) {
    const parsed = rateLimiterConfigSchema.safeParse(config);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new InvalidRateLimiterConfigError(`Invalid rate limiter config (${detail})`);
    }

    this.maxCalls = parsed.data.maxCalls;
    this.periodMs = parsed.data.periodMs;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? sleep;
    this.onWait = options.onWait ?? logWait;
  }

  /** Grants currently inside the window, as of the last admission check. */
  get size(): number {
    return this.calls.length;
  }

  /** Callers currently suspended in or passing through `acquire()`. */
  get pending(): number {
    return this.inFlight;
  }

  async acquire(): Promise<void> {
    this.inFlight++;
    try {
      for (;;) {
        const waitMs = await this.mutex.runExclusive(() => this.tryAdmit());
        if (waitMs === null) return;

        this.onWait({
          waitMs,
          pending: this.inFlight,
          maxCalls: this.maxCalls,
          periodMs: this.periodMs,
        });
        await this.sleep(waitMs);
      }
    } finally {
      this.inFlight--;
    }
  }

  /** Returns null when a slot was granted, otherwise how long to wait. Caller holds the mutex. */
  private tryAdmit(): number | null {
    const now = this.now();
    this.purge(now);

    if (this.calls.length < this.maxCalls) {
      this.calls.push(now);
      return null;
    }

    const oldest = this.calls[0] ?? now;
    return Math.max(0, oldest + this.periodMs - now);
  }

  private purge(now: number): void {
    let expired = 0;
    while (expired < this.calls.length && now - (this.calls[expired] ?? now) >= this.periodMs) {
      expired++;
    }
    if (expired > 0) this.calls.splice(0, expired);
  }
}
