/**
 * HTTP transport used by both adapter families in production.
 * Tests inject their own Transport instead.
 */

import { MalformedEnvelope, UpstreamUnavailable } from "@core/errors";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import { withTimeout } from "@core/utils/timeout";
import type { Transport, UpstreamRequest } from "./types";

type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  text: () => Promise<string>;
}>;

export function createHttpTransport(
  logger: Logger = silentLogger,
  fetchImpl: FetchLike = (url, init) => fetch(url, init)
): Transport {
  return async (request: UpstreamRequest): Promise<unknown> => {
    logger.info(`API call: ${request.redactedUrl}`);

    const outcome = await withTimeout(async (signal) => {
      const response = await fetchImpl(request.url, {
        signal,
        headers: { Accept: "application/json" },
      });
      if (!response.ok) {
        throw new UpstreamUnavailable(`HTTP ${response.status} from ${request.redactedUrl}`, {
          status: response.status,
        });
      }
      return response.text();
    }, request.timeoutMs);

    if (outcome.status === "timeout") {
      throw new UpstreamUnavailable(`Timed out after ${request.timeoutMs}ms: ${request.redactedUrl}`);
    }
    if (outcome.status === "error") {
      if (outcome.error instanceof UpstreamUnavailable) throw outcome.error;
      throw new UpstreamUnavailable(`Network error: ${request.redactedUrl}`, {
        cause: outcome.error.message,
      });
    }

    try {
      return JSON.parse(outcome.value);
    } catch {
      throw new MalformedEnvelope(`Response is not valid JSON: ${request.redactedUrl}`);
    }
  };
}
