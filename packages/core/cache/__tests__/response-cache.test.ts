/**
 * RESPONSE CACHE TESTS
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ResponseCache, cacheKey, isEntryValid } from "../response-cache";

type Rows = ReadonlyArray<{ station: string }>;

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("ResponseCache", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  describe("TTL", () => {
    it("serves a second call within the TTL without fetching", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const fetchFn = vi.fn(async (): Promise<Rows> => [{ station: "강남" }]);

      await cache.getOrFetch("k", 60_000, fetchFn);
      now += 59_999;
      await cache.getOrFetch("k", 60_000, fetchFn);

      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(cache.stats().hits).toBe(1);
    });

    it("refetches once the entry reaches fetchedAt + ttl", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const fetchFn = vi.fn(async (): Promise<Rows> => [{ station: "강남" }]);

      await cache.getOrFetch("k", 60_000, fetchFn);
      now += 60_000;
      await cache.getOrFetch("k", 60_000, fetchFn);

      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it("isEntryValid is strict at the boundary", () => {
      const entry = { key: "k", payload: [], fetchedAt: 100, ttlMs: 50 };
      expect(isEntryValid(entry, 149)).toBe(true);
      expect(isEntryValid(entry, 150)).toBe(false);
    });

    it("returns the identical payload on a hit", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const first = await cache.getOrFetch("k", 60_000, async () => [{ station: "강남" }, { station: "역삼" }]);
      const second = await cache.getOrFetch("k", 60_000, async () => []);

      expect(second).toBe(first);
      expect(second).toEqual([{ station: "강남" }, { station: "역삼" }]);
    });
  });

  describe("Single-flight", () => {
    it("issues exactly one fetch for concurrent callers on a cold key", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const pending = deferred<Rows>();
      const fetchFn = vi.fn(() => pending.promise);

      const callers = Array.from({ length: 5 }, () => cache.getOrFetch("k", 60_000, fetchFn));
      expect(cache.stats().inFlight).toBe(1);

      pending.resolve([{ station: "강남" }]);
      const results = await Promise.all(callers);

      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(results.every((r) => r === results[0])).toBe(true);
      expect(cache.stats().inFlight).toBe(0);
    });

    it("fetches unrelated keys in parallel", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const a = deferred<Rows>();
      const b = deferred<Rows>();
      const fetchA = vi.fn(() => a.promise);
      const fetchB = vi.fn(() => b.promise);

      const first = cache.getOrFetch("a", 60_000, fetchA);
      const second = cache.getOrFetch("b", 60_000, fetchB);
      expect(cache.stats().inFlight).toBe(2);

      b.resolve([{ station: "역삼" }]);
      a.resolve([{ station: "강남" }]);

      expect(await first).toEqual([{ station: "강남" }]);
      expect(await second).toEqual([{ station: "역삼" }]);
    });

    it("shares a failure with every waiter and clears the in-flight slot", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      const pending = deferred<Rows>();
      const fetchFn = vi.fn(() => pending.promise);

      const callers = [cache.getOrFetch("k", 60_000, fetchFn), cache.getOrFetch("k", 60_000, fetchFn)];
      pending.reject(new Error("down"));

      const settled = await Promise.allSettled(callers);
      expect(settled.map((s) => s.status)).toEqual(["rejected", "rejected"]);
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(cache.stats().inFlight).toBe(0);
    });
  });

  describe("Stale-on-error", () => {
    it("serves the expired entry when its refresh fails", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      await cache.getOrFetch("k", 60_000, async () => [{ station: "강남" }]);
      const fetchedAt = now;

      now += 120_000;
      const lookup = await cache.lookup("k", 60_000, async () => {
        throw new Error("upstream down");
      });

      expect(lookup.source).toBe("stale");
      expect(lookup.value).toEqual([{ station: "강남" }]);
      expect(lookup.fetchedAt).toBe(fetchedAt);
      expect(lookup.staleError?.message).toBe("upstream down");
      expect(cache.stats().staleServed).toBe(1);
    });

    it("propagates the error when no entry ever existed", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      await expect(
        cache.getOrFetch("k", 60_000, async () => {
          throw new Error("upstream down");
        })
      ).rejects.toThrow("upstream down");
      expect(cache.size).toBe(0);
    });

    it("never returns an expired entry from peek", async () => {
      const cache = new ResponseCache<Rows>({ clock });
      await cache.getOrFetch("k", 1_000, async () => [{ station: "강남" }]);
      expect(cache.peek("k")).toBeDefined();

      now += 1_000;
      expect(cache.peek("k")).toBeUndefined();
    });
  });

  describe("LRU bound", () => {
    it("evicts the least recently used entry beyond maxEntries", async () => {
      const cache = new ResponseCache<Rows>({ clock, maxEntries: 2 });
      await cache.getOrFetch("a", 60_000, async () => [{ station: "a" }]);
      await cache.getOrFetch("b", 60_000, async () => [{ station: "b" }]);
      // touch a so b becomes the oldest
      await cache.getOrFetch("a", 60_000, async () => []);
      await cache.getOrFetch("c", 60_000, async () => [{ station: "c" }]);

      expect(cache.size).toBe(2);
      expect(cache.peek("a")).toBeDefined();
      expect(cache.peek("b")).toBeUndefined();
      expect(cache.peek("c")).toBeDefined();
      expect(cache.stats().evictions).toBe(1);
    });
  });
});

describe("cacheKey", () => {
  it("is independent of parameter order and drops undefined values", () => {
    expect(cacheKey("live", "realtimeStationArrival", { key: "강남", positional: undefined })).toBe(
      "live|realtimeStationArrival|key=강남"
    );
    expect(cacheKey("catalog", "getWksnWhcllift", { b: 2, a: "x" })).toBe("catalog|getWksnWhcllift|a=x|b=2");
  });
});
