import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SlidingWindowRateLimiter, type RateLimitWaitEvent } from "../src/rate-limiter.js";
import { InvalidRateLimiterConfigError } from "../src/errors.js";

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Largest number of grants falling inside any window [t, t + periodMs). */
function maxGrantsPerWindow(grants: number[], periodMs: number): number {
  let max = 0;
  for (const start of grants) {
    const inWindow = grants.filter((t) => t >= start && t < start + periodMs).length;
    max = Math.max(max, inWindow);
  }
  return max;
}

describe("SlidingWindowRateLimiter", () => {
  describe("constructor", () => {
    it("stores maxCalls and periodMs", () => {
      const limiter = new SlidingWindowRateLimiter({ maxCalls: 195, periodMs: 300_000 });
      expect(limiter.maxCalls).toBe(195);
      expect(limiter.periodMs).toBe(300_000);
      expect(limiter.size).toBe(0);
    });

    it.each([
      { maxCalls: 0, periodMs: 1000 },
      { maxCalls: -1, periodMs: 1000 },
      { maxCalls: 1.5, periodMs: 1000 },
      { maxCalls: 1, periodMs: 0 },
      { maxCalls: 1, periodMs: -500 },
      { maxCalls: 1, periodMs: Number.NaN },
      { maxCalls: 1, periodMs: Number.POSITIVE_INFINITY },
    ])("rejects $maxCalls calls per $periodMs ms", (config) => {
      expect(() => new SlidingWindowRateLimiter(config)).toThrow(InvalidRateLimiterConfigError);
    });

    it("names the failing field in the error message", () => {
      expect(() => new SlidingWindowRateLimiter({ maxCalls: 0, periodMs: 1000 })).toThrow(/maxCalls/);
    });
  });

  describe("acquire() with fake timers", () => {
    let waits: RateLimitWaitEvent[];

    beforeEach(() => {
      vi.useFakeTimers();
      waits = [];
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    function makeLimiter(maxCalls: number, periodMs: number): SlidingWindowRateLimiter {
      return new SlidingWindowRateLimiter(
        { maxCalls, periodMs },
        { now: () => Date.now(), onWait: (event) => waits.push(event) },
      );
    }

    it("admits two of three simultaneous callers and holds the third for a full period", async () => {
      const limiter = makeLimiter(2, 1000);
      const start = Date.now();
      const grants: number[] = [];
      const calls = [1, 2, 3].map(() =>
        limiter.acquire().then(() => {
          grants.push(Date.now() - start);
        }),
      );

      await vi.advanceTimersByTimeAsync(0);
      expect(grants).toEqual([0, 0]);

      await vi.advanceTimersByTimeAsync(999);
      expect(grants).toEqual([0, 0]);

      await vi.advanceTimersByTimeAsync(1);
      await Promise.all(calls);
      expect(grants).toEqual([0, 0, 1000]);
    });

    it("reports a wait event when a caller has to sleep", async () => {
      const limiter = makeLimiter(2, 1000);
      const calls = [1, 2, 3].map(() => limiter.acquire());

      await vi.advanceTimersByTimeAsync(0);
      expect(waits).toHaveLength(1);
      expect(waits[0]).toMatchObject({ waitMs: 1000, maxCalls: 2, periodMs: 1000 });
      expect(Object.keys(waits[0] ?? {}).sort()).toEqual(["maxCalls", "pending", "periodMs", "waitMs"]);

      await vi.advanceTimersByTimeAsync(1000);
      await Promise.all(calls);
      expect(waits).toHaveLength(1);
    });

    it("lets sequential callers spaced a period apart through without waiting", async () => {
      const limiter = makeLimiter(1, 500);

      for (let i = 0; i < 5; i++) {
        const before = Date.now();
        await limiter.acquire();
        expect(Date.now() - before).toBe(0);
        await vi.advanceTimersByTimeAsync(500);
      }

      expect(waits).toHaveLength(0);
    });

    it("fully decays after an idle period", async () => {
      const limiter = makeLimiter(3, 1000);
      await limiter.acquire();
      await limiter.acquire();
      await limiter.acquire();
      expect(limiter.size).toBe(3);

      await vi.advanceTimersByTimeAsync(1000);

      const before = Date.now();
      await limiter.acquire();
      expect(Date.now() - before).toBe(0);
      expect(limiter.size).toBe(1);
      expect(waits).toHaveLength(0);
    });

    it("waits for the oldest grant to age out, not the whole window", async () => {
      const limiter = makeLimiter(2, 1000);
      const start = Date.now();
      await limiter.acquire();
      await vi.advanceTimersByTimeAsync(400);
      await limiter.acquire();

      let grantedAt: number | null = null;
      const third = limiter.acquire().then(() => {
        grantedAt = Date.now() - start;
      });

      await vi.advanceTimersByTimeAsync(0);
      expect(waits[0]?.waitMs).toBe(600);

      await vi.advanceTimersByTimeAsync(600);
      await third;
      expect(grantedAt).toBe(1000);
    });

    it("serves ten queued callers one per period with max 1", async () => {
      const limiter = makeLimiter(1, 1000);
      const start = Date.now();
      const grants: number[] = [];
      const calls = Array.from({ length: 10 }, () =>
        limiter.acquire().then(() => {
          grants.push(Date.now() - start);
        }),
      );

      await vi.advanceTimersByTimeAsync(9000);
      await Promise.all(calls);

      expect(grants).toEqual([0, 1000, 2000, 3000, 4000, 5000, 6000, 7000, 8000, 9000]);
      expect(maxGrantsPerWindow(grants, 1000)).toBe(1);
      expect(limiter.pending).toBe(0);
    });

    it("never exceeds the quota in any window under staggered contention", async () => {
      const limiter = makeLimiter(3, 1000);
      const start = Date.now();
      const grants: number[] = [];
      const calls: Promise<void>[] = [];

      for (let i = 0; i < 20; i++) {
        calls.push(
          limiter.acquire().then(() => {
            grants.push(Date.now() - start);
          }),
        );
        await vi.advanceTimersByTimeAsync(i % 3 === 0 ? 150 : 20);
      }

      await vi.advanceTimersByTimeAsync(10_000);
      await Promise.all(calls);

      expect(grants).toHaveLength(20);
      expect(maxGrantsPerWindow(grants, 1000)).toBeLessThanOrEqual(3);
      for (let i = 1; i < grants.length; i++) {
        expect(grants[i]).toBeGreaterThanOrEqual(grants[i - 1] ?? 0);
      }
    });
  });

  describe("acquire() with a manual clock", () => {
    it("does not hold the lock while a caller sleeps and re-checks after waking", async () => {
      let time = 0;
      const sleeps: { ms: number; wake: () => void }[] = [];
      const limiter = new SlidingWindowRateLimiter(
        { maxCalls: 1, periodMs: 1000 },
        {
          now: () => time,
          sleep: (ms) => new Promise<void>((resolve) => sleeps.push({ ms, wake: resolve })),
          onWait: () => {},
        },
      );

      await limiter.acquire();

      let secondGranted = false;
      const second = limiter.acquire().then(() => {
        secondGranted = true;
      });
      await flush();
      expect(sleeps.map((s) => s.ms)).toEqual([1000]);

      // the window opens while the second caller is still asleep
      time = 1000;
      await limiter.acquire();
      expect(secondGranted).toBe(false);

      sleeps[0]?.wake();
      await flush();
      expect(secondGranted).toBe(false);
      expect(sleeps.map((s) => s.ms)).toEqual([1000, 1000]);

      time = 2000;
      sleeps[1]?.wake();
      await second;
      expect(secondGranted).toBe(true);
      expect(limiter.size).toBe(1);
    });

    it("leaves the log untouched while callers are suspended", async () => {
      let time = 0;
      const limiter = new SlidingWindowRateLimiter(
        { maxCalls: 2, periodMs: 1000 },
        {
          now: () => time,
          sleep: () => new Promise<void>(() => {}),
          onWait: () => {},
        },
      );

      await limiter.acquire();
      await limiter.acquire();
      void limiter.acquire();
      void limiter.acquire();
      await flush();

      expect(limiter.size).toBe(2);
      expect(limiter.pending).toBe(2);

      time = 1000;
      await limiter.acquire();
      expect(limiter.size).toBe(1);
    });

    it("propagates errors from the sleep primitive unchanged", async () => {
      const failure = new Error("runtime shutting down");
      const limiter = new SlidingWindowRateLimiter(
        { maxCalls: 1, periodMs: 1000 },
        { now: () => 0, sleep: () => Promise.reject(failure), onWait: () => {} },
      );

      await limiter.acquire();
      await expect(limiter.acquire()).rejects.toBe(failure);
      expect(limiter.size).toBe(1);
      expect(limiter.pending).toBe(0);
    });
  });

  describe("default wait observer", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
      vi.restoreAllMocks();
    });

    it("writes a rate-limit-wait JSON line", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const limiter = new SlidingWindowRateLimiter(
        { maxCalls: 1, periodMs: 2500 },
        { now: () => Date.now() },
      );

      await limiter.acquire();
      const second = limiter.acquire();
      await vi.advanceTimersByTimeAsync(0);

      expect(log).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(log.mock.calls[0]?.[0])) as Record<string, unknown>;
      expect(line).toMatchObject({ event: "rate-limit-wait", waitMs: 2500, maxCalls: 1, periodMs: 2500 });

      await vi.advanceTimersByTimeAsync(2500);
      await second;
    });
  });
});
