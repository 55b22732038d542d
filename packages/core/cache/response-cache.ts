/**
 * RESPONSE CACHE
 *
 * TTL-keyed store shared by every upstream adapter.
 * - Per-call TTL (supplied from the resource's ServiceDescriptor)
 * - Single-flight: one upstream call per key, concurrent callers share it
 * - Stale-on-error: an expired entry is served when its refresh fails
 * - LRU bound on entry count; expiry itself is lazy, on read
 */

import type { Logger } from "../logger";
import { silentLogger } from "../logger";

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface CacheEntry<V> {
  key: string;
  payload: V;
  fetchedAt: number;
  ttlMs: number;
}

export type CacheSource = "hit" | "fetched" | "stale";

export interface CacheLookup<V> {
  value: V;
  source: CacheSource;
  fetchedAt: number;
  /** Set when an expired entry was served because the refresh failed */
  staleError?: Error;
}

export interface CacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  staleServed: number;
  evictions: number;
}

export interface ResponseCacheOptions {
  maxEntries?: number;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_MAX_ENTRIES = 500;

export function isEntryValid(entry: CacheEntry<unknown>, now: number): boolean {
  return now < entry.fetchedAt + entry.ttlMs;
}

export class ResponseCache<V> {
  // Map iteration order doubles as recency order (oldest first)
  private entries = new Map<string, CacheEntry<V>>();
  private inFlight = new Map<string, Promise<CacheLookup<V>>>();
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private counters = { hits: 0, misses: 0, staleServed: 0, evictions: 0 };

  constructor(options: ResponseCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async getOrFetch(key: string, ttlMs: number, fetchFn: () => Promise<V>): Promise<V> {
    const result = await this.lookup(key, ttlMs, fetchFn);
    return result.value;
  }

  /**
   * Like getOrFetch, but reports where the value came from so callers can
   * attach a degraded-data warning when a stale entry was served.
   */
  lookup(key: string, ttlMs: number, fetchFn: () => Promise<V>): Promise<CacheLookup<V>> {
    const entry = this.entries.get(key);
    if (entry && isEntryValid(entry, this.clock())) {
      this.touch(entry);
      this.counters.hits++;
      this.logger.debug(`Cache hit: ${key}`);
      return Promise.resolve({ value: entry.payload, source: "hit", fetchedAt: entry.fetchedAt });
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug(`Joining in-flight fetch: ${key}`);
      return pending;
    }

    this.counters.misses++;
    const flight = this.refresh(key, ttlMs, fetchFn).finally(() => {
      this.inFlight.delete(key);
    });
    // Registered synchronously so a concurrent caller in the same tick joins it
    this.inFlight.set(key, flight);
    return flight;
  }

  /** Valid entry for a key, without touching recency or fetching */
  peek(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    return entry && isEntryValid(entry, this.clock()) ? entry : undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      inFlight: this.inFlight.size,
      ...this.counters,
    };
  }

  private async refresh(
    key: string,
    ttlMs: number,
    fetchFn: () => Promise<V>
  ): Promise<CacheLookup<V>> {
    try {
      const payload = await fetchFn();
      const fetchedAt = this.clock();
      this.store({ key, payload, fetchedAt, ttlMs });
      return { value: payload, source: "fetched", fetchedAt };
    } catch (error) {
      const previous = this.entries.get(key);
      if (!previous) {
        throw error;
      }

      const staleError = error instanceof Error ? error : new Error(String(error));
      this.counters.staleServed++;
      this.logger.warn(`Serving stale entry after failed refresh: ${key}`, {
        error: staleError.message,
        ageMs: this.clock() - previous.fetchedAt,
      });
      return { value: previous.payload, source: "stale", fetchedAt: previous.fetchedAt, staleError };
    }
  }

  private store(entry: CacheEntry<V>): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.counters.evictions++;
      this.logger.debug(`Evicted least-recently-used entry: ${oldest.value}`);
    }
  }

  private touch(entry: CacheEntry<V>): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
  }
}

/**
 * Stable key for (provider, resource, parameters). Parameter order does not
 * matter; undefined parameters are dropped.
 */
export function cacheKey(
  provider: string,
  resource: string,
  params: Record<string, string | number | undefined> = {}
): string {
  const parts = Object.keys(params)
    .sort()
    .filter((name) => params[name] !== undefined)
    .map((name) => `${name}=${String(params[name])}`);
  return [provider, resource, ...parts].join("|");
}
