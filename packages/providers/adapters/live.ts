/**
 * LIVE-STATUS ADAPTER — Seoul realtime subway (swopenAPI.seoul.go.kr)
 *
 * Request:  base/{credential}/json/{resource}/{first}/{last}/{station-key}
 * Envelope: { errorMessage: {...}, [resource]List: [...] }
 *
 * No result-code wrapper. An object (or nothing) where the list should be is
 * the provider's "no trains now" answer and yields zero rows.
 */

import { MalformedEnvelope } from "@core/errors";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import type {
  LiveAdapter,
  LiveRequestParams,
  ParsedEnvelope,
  ProviderEndpoint,
  ServiceDescriptor,
  UpstreamRequest,
} from "../types";
import { redactCredential } from "../types";
import { normalizeStationKey } from "../station-key";
import { parseRows } from "./rows";

export const LIVE_TIMEOUT_CAP_MS = 5000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SeoulLiveAdapter implements LiveAdapter {
  readonly kind = "live" as const;
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: ProviderEndpoint,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  buildRequest(descriptor: ServiceDescriptor, params: LiveRequestParams): UpstreamRequest {
    const base = this.endpoint.baseUrl.replace(/\/+$/, "");
    const first = descriptor.firstIndex;
    const last = descriptor.firstIndex + descriptor.pageSize;
    const url =
      `${base}/${this.endpoint.credential}/json/${descriptor.resource}/${first}/${last}/` +
      encodeURIComponent(normalizeStationKey(params.key));

    return {
      url,
      redactedUrl: redactCredential(url, this.endpoint.credential),
      timeoutMs: Math.min(LIVE_TIMEOUT_CAP_MS, this.endpoint.timeoutMs),
    };
  }

  parseEnvelope(descriptor: ServiceDescriptor, body: unknown): ParsedEnvelope {
    if (!isRecord(body)) {
      throw new MalformedEnvelope(`${descriptor.resource}: response is not a JSON object`);
    }

    const list = body[descriptor.envelopeKey];

    if (Array.isArray(list)) {
      return { rows: parseRows(descriptor, list), totalCount: list.length };
    }

    if (list === undefined || list === null || isRecord(list)) {
      const errorMessage = body.errorMessage;
      this.logger.debug(`${descriptor.resource}: no rows in live envelope`, {
        code: isRecord(errorMessage) ? errorMessage.code : undefined,
      });
      return { rows: [], totalCount: 0 };
    }

    throw new MalformedEnvelope(
      `${descriptor.resource}: "${descriptor.envelopeKey}" is neither a list nor an object`
    );
  }
}
