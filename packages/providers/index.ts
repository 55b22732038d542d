/**
 * UPSTREAM PROVIDERS
 *
 * Catalog (paginated open-data inventories) and live (per-station realtime)
 * adapters, their service descriptors, and the cached client in front of them.
 */

export * from "./types";
export * from "./services";
export * from "./station-key";
export * from "./transport";
export * from "./client";
export { SeoulCatalogAdapter, sweepPages, CATALOG_SUCCESS_CODES, type PageFetcher } from "./adapters/catalog";
export { SeoulLiveAdapter, LIVE_TIMEOUT_CAP_MS } from "./adapters/live";
export * from "./row-access";
