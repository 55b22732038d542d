/**
 * TRANSIT ERROR TAXONOMY
 *
 * Every failure the pipeline can raise. Upstream errors are usually absorbed
 * by the response cache; StationNotFound and NoDirectRoute end the request.
 */

export type TransitErrorCode =
  | "UPSTREAM_UNAVAILABLE"
  | "MALFORMED_ENVELOPE"
  | "UPSTREAM_REJECTED"
  | "STATION_NOT_FOUND"
  | "NO_DIRECT_ROUTE"
  | "TRIP_NOT_FOUND"
  | "RETRIEVAL_UNAVAILABLE"
  | "SYNTHESIS_TIMEOUT";

export class TransitError extends Error {
  constructor(
    public readonly code: TransitErrorCode,
    message: string,
    public readonly httpStatus: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TransitError";
  }
}

// ============================================
// UPSTREAM (absorbed by stale-on-error when possible)
// ============================================

export class UpstreamUnavailable extends TransitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("UPSTREAM_UNAVAILABLE", message, 502, details);
    this.name = "UpstreamUnavailable";
  }
}

export class MalformedEnvelope extends TransitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MALFORMED_ENVELOPE", message, 502, details);
    this.name = "MalformedEnvelope";
  }
}

export class UpstreamRejected extends TransitError {
  constructor(
    public readonly resultCode: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super("UPSTREAM_REJECTED", message, 502, { resultCode, ...details });
    this.name = "UpstreamRejected";
  }
}

export type UpstreamError = UpstreamUnavailable | MalformedEnvelope | UpstreamRejected;

export function isUpstreamError(error: unknown): error is UpstreamError {
  return (
    error instanceof UpstreamUnavailable ||
    error instanceof MalformedEnvelope ||
    error instanceof UpstreamRejected
  );
}

// ============================================
// REQUEST-FATAL
// ============================================

export class StationNotFound extends TransitError {
  constructor(public readonly stationName: string) {
    super("STATION_NOT_FOUND", `역을 찾을 수 없습니다: ${stationName}`, 404, { stationName });
    this.name = "StationNotFound";
  }
}

export class NoDirectRoute extends TransitError {
  constructor(startStation: string, endStation: string) {
    super(
      "NO_DIRECT_ROUTE",
      `직통 경로가 없습니다 (환승 필요): ${startStation} → ${endStation}`,
      404,
      { startStation, endStation }
    );
    this.name = "NoDirectRoute";
  }
}

export class TripNotFound extends TransitError {
  constructor(tripId: string) {
    super("TRIP_NOT_FOUND", `Trip not found or expired: ${tripId}`, 404, { tripId });
    this.name = "TripNotFound";
  }
}

// ============================================
// DEGRADATION (never fail a request)
// ============================================

export class RetrievalUnavailable extends TransitError {
  constructor(reason: string) {
    super("RETRIEVAL_UNAVAILABLE", `Passage retrieval unavailable: ${reason}`, 503);
    this.name = "RetrievalUnavailable";
  }
}

export class SynthesisTimeout extends TransitError {
  constructor(budgetMs: number) {
    super("SYNTHESIS_TIMEOUT", `Narrative generation exceeded ${budgetMs}ms`, 504, { budgetMs });
    this.name = "SynthesisTimeout";
  }
}
