/**
 * CATALOG ADAPTER — Seoul Open Data (openapi.seoul.go.kr)
 *
 * Request:  base/{credential}/json/{resource}/{start}/{end}/[positional/...]
 * Envelope: { [resource]: { list_total_count, RESULT: { CODE, MESSAGE }, row: [...] } }
 *
 * Large inventories are read with a pagination sweep; only the assembled
 * sweep is ever cached, never a single page.
 */

import { z } from "zod";
import { MalformedEnvelope, UpstreamRejected } from "@core/errors";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import type {
  CatalogAdapter,
  CatalogRequestParams,
  NormalizedRow,
  ParsedEnvelope,
  ProviderEndpoint,
  ServiceDescriptor,
  UpstreamRequest,
} from "../types";
import { redactCredential } from "../types";
import { parseRows } from "./rows";

export const CATALOG_SUCCESS_CODES = ["INFO-000", "INFO-200"] as const;
const NO_DATA_CODE = "INFO-200";

const resultSchema = z.object({
  CODE: z.string(),
  MESSAGE: z.string().optional(),
});

const sectionSchema = z.object({
  list_total_count: z.coerce.number().int().nonnegative().optional(),
  RESULT: resultSchema,
  row: z.unknown().optional(),
});

type CatalogResult = z.infer<typeof resultSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SeoulCatalogAdapter implements CatalogAdapter {
  readonly kind = "catalog" as const;
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: ProviderEndpoint,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  buildRequest(descriptor: ServiceDescriptor, params: CatalogRequestParams): UpstreamRequest {
    const base = this.endpoint.baseUrl.replace(/\/+$/, "");
    let url = `${base}/${this.endpoint.credential}/json/${descriptor.resource}/${params.start}/${params.end}/`;

    const positional = (params.positional ?? []).filter((p) => p !== "");
    if (positional.length > 0) {
      url += positional.map((p) => encodeURIComponent(p)).join("/");
    }

    return {
      url,
      redactedUrl: redactCredential(url, this.endpoint.credential),
      timeoutMs: this.endpoint.timeoutMs,
    };
  }

  parseEnvelope(descriptor: ServiceDescriptor, body: unknown): ParsedEnvelope {
    if (!isRecord(body)) {
      throw new MalformedEnvelope(`${descriptor.resource}: response is not a JSON object`);
    }

    const rawSection = body[descriptor.envelopeKey];
    if (rawSection === undefined) {
      // Provider-level answer (bad key, no data for the whole service)
      const topLevel = resultSchema.safeParse(body.RESULT);
      if (!topLevel.success) {
        throw new MalformedEnvelope(`${descriptor.resource}: envelope key "${descriptor.envelopeKey}" missing`);
      }
      this.assertSuccess(descriptor, topLevel.data);
      if (topLevel.data.CODE !== NO_DATA_CODE) {
        throw new MalformedEnvelope(
          `${descriptor.resource}: ${topLevel.data.CODE} without envelope key "${descriptor.envelopeKey}"`
        );
      }
      return { rows: [], totalCount: 0 };
    }

    const section = sectionSchema.safeParse(rawSection);
    if (!section.success) {
      throw new MalformedEnvelope(`${descriptor.resource}: envelope section does not match`, {
        issues: section.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    this.assertSuccess(descriptor, section.data.RESULT);
    if (section.data.RESULT.CODE === NO_DATA_CODE) {
      return { rows: [], totalCount: 0 };
    }

    const rawRows = section.data.row;
    const totalCount = section.data.list_total_count;
    let candidates: unknown[];
    if (rawRows === undefined || rawRows === null) {
      if (totalCount !== undefined && totalCount > 0) {
        throw new MalformedEnvelope(`${descriptor.resource}: ${totalCount} rows reported but "row" is missing`);
      }
      candidates = [];
    } else if (Array.isArray(rawRows)) {
      candidates = rawRows;
    } else if (isRecord(rawRows)) {
      candidates = [rawRows];
    } else {
      throw new MalformedEnvelope(`${descriptor.resource}: "row" is neither a list nor an object`);
    }

    return {
      rows: parseRows(descriptor, candidates),
      totalCount,
    };
  }

  private assertSuccess(descriptor: ServiceDescriptor, result: CatalogResult): void {
    const allowed: readonly string[] = CATALOG_SUCCESS_CODES;
    if (allowed.includes(result.CODE)) {
      if (result.CODE === NO_DATA_CODE) {
        this.logger.debug(`${descriptor.resource}: no data`, { code: result.CODE });
      }
      return;
    }
    throw new UpstreamRejected(
      result.CODE,
      `${descriptor.resource} rejected: ${result.CODE}${result.MESSAGE ? ` ${result.MESSAGE}` : ""}`
    );
  }
}

// ============================================
// PAGINATION SWEEP
// ============================================

export type PageFetcher = (params: CatalogRequestParams) => Promise<ParsedEnvelope>;

/**
 * Reads successive pages starting at the descriptor's first index. Stops on a
 * short page, on the provider-reported total, or at the descriptor's maxTotal.
 */
export async function sweepPages(
  descriptor: ServiceDescriptor,
  fetchPage: PageFetcher,
  positional?: readonly string[]
): Promise<NormalizedRow[]> {
  const rows: NormalizedRow[] = [];
  let start = descriptor.firstIndex;

  while (start <= descriptor.maxTotal) {
    const end = Math.min(start + descriptor.pageSize - 1, descriptor.maxTotal);
    const page = await fetchPage({ start, end, positional });
    rows.push(...page.rows);

    const requested = end - start + 1;
    if (page.rows.length < requested) break;
    if (page.totalCount !== undefined && end >= page.totalCount) break;

    start = end + 1;
  }

  return rows;
}
