/**
 * UPSTREAM CLIENT
 *
 * fetch(resource, params) → NormalizedRows, through the shared ResponseCache.
 * The descriptor decides the adapter variant and the TTL; callers only name
 * the resource.
 *
 * fetchOutcome() is the non-throwing form used by the guidance pipeline:
 * upstream failures become a degraded or unavailable outcome with a warning.
 */

import type { CacheSource, ResponseCache } from "@core/cache/response-cache";
import { cacheKey } from "@core/cache/response-cache";
import { isUpstreamError, type UpstreamError } from "@core/errors";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import { sweepPages } from "./adapters/catalog";
import { getService } from "./services";
import { normalizeStationKey } from "./station-key";
import type {
  CatalogAdapter,
  LiveAdapter,
  NormalizedRows,
  ResourceName,
  ServiceDescriptor,
  Transport,
} from "./types";

export interface FetchParams {
  /** Station key of a live resource */
  key?: string;
  /** Extra positional path segments of a catalog resource */
  positional?: readonly string[];
}

export type FetchOutcome =
  | { status: "ok"; rows: NormalizedRows; source: Exclude<CacheSource, "stale">; fetchedAt: number }
  | { status: "degraded"; rows: NormalizedRows; source: "stale"; fetchedAt: number; warning: string }
  | { status: "unavailable"; rows: NormalizedRows; error: UpstreamError; warning: string };

export interface UpstreamClientOptions {
  catalog: CatalogAdapter;
  live: LiveAdapter;
  transport: Transport;
  cache: ResponseCache<NormalizedRows>;
  logger?: Logger;
}

export class UpstreamClient {
  private readonly catalog: CatalogAdapter;
  private readonly live: LiveAdapter;
  private readonly transport: Transport;
  private readonly cache: ResponseCache<NormalizedRows>;
  private readonly logger: Logger;

  constructor(options: UpstreamClientOptions) {
    this.catalog = options.catalog;
    this.live = options.live;
    this.transport = options.transport;
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
  }

  /** Throws UpstreamUnavailable / MalformedEnvelope / UpstreamRejected when nothing is cached */
  async fetch(resource: ResourceName, params: FetchParams = {}): Promise<NormalizedRows> {
    const descriptor = getService(resource);
    const lookup = await this.cache.lookup(
      this.keyFor(descriptor, params),
      descriptor.ttlMs,
      () => this.load(descriptor, params)
    );
    return lookup.value;
  }

  async fetchOutcome(resource: ResourceName, params: FetchParams = {}): Promise<FetchOutcome> {
    const descriptor = getService(resource);
    try {
      const lookup = await this.cache.lookup(
        this.keyFor(descriptor, params),
        descriptor.ttlMs,
        () => this.load(descriptor, params)
      );

      if (lookup.source === "stale") {
        const reason = lookup.staleError?.message ?? "refresh failed";
        return {
          status: "degraded",
          rows: lookup.value,
          source: "stale",
          fetchedAt: lookup.fetchedAt,
          warning: `${resource}: ${new Date(lookup.fetchedAt).toISOString()} 기준 데이터 (${reason})`,
        };
      }

      return { status: "ok", rows: lookup.value, source: lookup.source, fetchedAt: lookup.fetchedAt };
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      this.logger.warn(`${resource} unavailable`, { code: error.code, error: error.message });
      return {
        status: "unavailable",
        rows: [],
        error,
        warning: `${resource}: 실시간 정보를 가져오지 못했습니다 (${error.code})`,
      };
    }
  }

  private keyFor(descriptor: ServiceDescriptor, params: FetchParams): string {
    const positional = params.positional && params.positional.length > 0 ? params.positional.join("/") : undefined;
    return cacheKey(descriptor.family, descriptor.resource, {
      key: params.key === undefined ? undefined : normalizeStationKey(params.key),
      positional,
    });
  }

  private async load(descriptor: ServiceDescriptor, params: FetchParams): Promise<NormalizedRows> {
    switch (descriptor.family) {
      case "catalog": {
        const rows = await sweepPages(
          descriptor,
          async (range) => {
            const request = this.catalog.buildRequest(descriptor, range);
            const body = await this.transport(request);
            return this.catalog.parseEnvelope(descriptor, body);
          },
          params.positional
        );
        this.logger.info(`Fetched ${rows.length} rows from ${descriptor.resource}`);
        return rows;
      }
      case "live": {
        if (params.key === undefined) {
          throw new Error(`${descriptor.resource} requires a key`);
        }
        const request = this.live.buildRequest(descriptor, { key: params.key });
        const body = await this.transport(request);
        const { rows } = this.live.parseEnvelope(descriptor, body);
        this.logger.debug(`Fetched ${rows.length} live rows from ${descriptor.resource}`);
        return rows;
      }
    }
  }
}
