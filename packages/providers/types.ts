/**
 * UPSTREAM PROVIDER TYPES
 *
 * Two provider families with incompatible contracts:
 * - catalog: large, slow-changing datasets behind paginated range requests
 * - live: small per-station datasets, one un-paginated request
 *
 * Each resource is described once by a ServiceDescriptor; adapters turn
 * provider envelopes into NormalizedRows validated against it.
 */

import { z } from "zod";

// ============================================
// ROWS
// ============================================

export type ProviderFamily = "catalog" | "live";

export type RowValue = string | number | boolean | null;

/**
 * One normalized upstream record. `station` is the normalized station key.
 * Only adapters produce these.
 */
export type NormalizedRow = Readonly<{ station: string } & Record<string, RowValue>>;

export type NormalizedRows = readonly NormalizedRow[];

// ============================================
// SERVICE DESCRIPTOR
// ============================================

export type CatalogResource =
  | "SeoulMetroFaciInfo"
  | "getWksnWhclCharge"
  | "getWksnWhcllift"
  | "getWksnSafePlfm"
  | "TbSubwayLineDetail";

export type LiveResource = "realtimeStationArrival";

export type ResourceName = CatalogResource | LiveResource;

export type RowParseResult =
  | { ok: true; row: NormalizedRow }
  | { ok: false; issues: string };

export interface ServiceDescriptor {
  readonly family: ProviderFamily;
  readonly resource: ResourceName;
  readonly description: string;
  /** Key under which the provider nests its rows */
  readonly envelopeKey: string;
  readonly ttlMs: number;
  /** First index of a range request (catalog 1, live 0) */
  readonly firstIndex: number;
  readonly pageSize: number;
  /** Upper bound of a catalog sweep; live requests ignore it */
  readonly maxTotal: number;
  readonly parseRow: (raw: unknown) => RowParseResult;
}

export interface ServiceDefinition<S extends z.ZodTypeAny>
  extends Omit<ServiceDescriptor, "parseRow"> {
  rowSchema: S;
  normalize: (raw: z.output<S>) => NormalizedRow;
}

export function defineService<S extends z.ZodTypeAny>(
  definition: ServiceDefinition<S>
): ServiceDescriptor {
  const { rowSchema, normalize, ...descriptor } = definition;
  return Object.freeze({
    ...descriptor,
    parseRow: (raw: unknown): RowParseResult => {
      const parsed = rowSchema.safeParse(raw);
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        };
      }
      return { ok: true, row: Object.freeze(normalize(parsed.data)) };
    },
  });
}

// ============================================
// REQUESTS & ENVELOPES
// ============================================

export interface UpstreamRequest {
  url: string;
  /** Same URL with the credential masked, safe for logs and errors */
  redactedUrl: string;
  timeoutMs: number;
}

export interface ParsedEnvelope {
  rows: NormalizedRow[];
  /** Provider-reported total, when the envelope carries one */
  totalCount?: number;
}

export interface CatalogRequestParams {
  start: number;
  end: number;
  positional?: readonly string[];
}

export interface LiveRequestParams {
  /** Normalized station key */
  key: string;
}

/**
 * Closed set of adapter variants. Each knows how to build its family's
 * request and parse its family's envelope; nothing is shared between them.
 */
export interface CatalogAdapter {
  readonly kind: "catalog";
  buildRequest(descriptor: ServiceDescriptor, params: CatalogRequestParams): UpstreamRequest;
  parseEnvelope(descriptor: ServiceDescriptor, body: unknown): ParsedEnvelope;
}

export interface LiveAdapter {
  readonly kind: "live";
  buildRequest(descriptor: ServiceDescriptor, params: LiveRequestParams): UpstreamRequest;
  parseEnvelope(descriptor: ServiceDescriptor, body: unknown): ParsedEnvelope;
}

export type UpstreamAdapter = CatalogAdapter | LiveAdapter;

/** Performs one HTTP GET and returns the decoded JSON body */
export type Transport = (request: UpstreamRequest) => Promise<unknown>;

export interface ProviderEndpoint {
  baseUrl: string;
  credential: string;
  timeoutMs: number;
}

export function redactCredential(url: string, credential: string): string {
  if (!credential) return url;
  return url.split(`/${credential}/`).join("/****/");
}
