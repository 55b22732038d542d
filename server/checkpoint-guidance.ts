/**
 * CHECKPOINT GUIDANCE
 *
 * Per-checkpoint pipeline:
 * facility record → live snapshot → passage retrieval → synthesis.
 *
 * Retrieval and narrative generation degrade to template-only guidance;
 * only StationNotFound and TripNotFound end the request.
 */

import type { CheckpointGuideRequest } from "@shared/schema";
import {
  buildRetrievalQuery,
  type FacilityRecord,
  type GuidanceResult,
  type GuidanceSynthesizer,
  type LiveStatusSnapshot,
} from "@core/guidance";
import type { PassageIndex, ScoredPassage } from "@core/knowledge";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import {
  CHARGING_RADIUS_METERS,
  CHECKPOINT_LABELS,
  CHECKPOINT_TYPES,
  DEFAULT_RADIUS_METERS,
  type AdvanceSignal,
  type Checkpoint,
  type CheckpointType,
  type GeoPoint,
  type TransitionTrigger,
  type TripSession,
  type TripSessionStore,
} from "@core/trip";
import type { IFacilityStore } from "./facility-store";
import type { LiveStatusService, SnapshotPart } from "./live-status";

const PASSAGES_PER_QUERY = 3;

export function snapshotPartsFor(type: CheckpointType): SnapshotPart[] {
  switch (type) {
    case "origin_platform":
      return ["elevators", "closures", "arrivals", "safetyPlatforms"];
    case "platform_wait":
    case "boarding":
      return ["elevators", "closures", "arrivals"];
    case "destination_platform":
      return ["elevators", "closures", "safetyPlatforms"];
    case "charging_station":
      return ["elevators", "closures", "chargers"];
    default:
      return ["elevators", "closures", "lifts"];
  }
}

/** Checkpoint for a guide request that carries no trip */
export function checkpointFromRequest(request: CheckpointGuideRequest): Checkpoint {
  const type = CHECKPOINT_TYPES[request.checkpoint_id];
  return {
    id: request.checkpoint_id,
    type,
    label: CHECKPOINT_LABELS[type],
    radiusMeters: type === "charging_station" ? CHARGING_RADIUS_METERS : DEFAULT_RADIUS_METERS,
    optional: type === "charging_station",
    data: {
      stationName: request.station_name,
      exitNumber: request.exit_number ?? null,
      line: request.line ?? null,
      direction: request.direction ?? null,
    },
  };
}

export type PositionReport =
  | { status: "checkpoint_reached"; checkpoint: Checkpoint; complete: boolean; guidance: GuidanceResult }
  | { status: "approaching"; next: Checkpoint; distanceMeters: number; direction: string }
  | { status: "awaiting_signal"; next: Checkpoint }
  | { status: "complete" };

export type AdvanceReport =
  | {
      status: "advanced";
      checkpoint: Checkpoint;
      trigger: TransitionTrigger;
      complete: boolean;
      guidance: GuidanceResult;
    }
  | { status: "complete" };

export interface StationRealtimeInfo {
  station: string;
  live: LiveStatusSnapshot;
}

export interface CheckpointGuidanceDeps {
  facilities: IFacilityStore;
  liveStatus: LiveStatusService;
  sessions: TripSessionStore;
  index: PassageIndex;
  synthesizer: GuidanceSynthesizer;
  retrievalTimeoutMs: number;
  logger?: Logger;
}

export class CheckpointGuidanceService {
  private readonly logger: Logger;

  constructor(private readonly deps: CheckpointGuidanceDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async guide(request: CheckpointGuideRequest): Promise<GuidanceResult> {
    if (request.trip_id) {
      const session = this.deps.sessions.get(request.trip_id);
      const checkpoint = session.checkpoint(request.checkpoint_id) ?? checkpointFromRequest(request);
      return this.guideCheckpoint(checkpoint, request.need_elevator || session.context.needElevator, session);
    }
    return this.guideCheckpoint(checkpointFromRequest(request), request.need_elevator);
  }

  async reportPosition(tripId: string, location: GeoPoint): Promise<PositionReport> {
    const session = this.deps.sessions.get(tripId);
    const outcome = session.reportPosition(location);

    switch (outcome.status) {
      case "approaching":
        return {
          status: "approaching",
          next: outcome.next,
          distanceMeters: outcome.distanceMeters,
          direction: outcome.direction,
        };
      case "awaiting_signal":
        return { status: "awaiting_signal", next: outcome.next };
      case "complete":
        this.finish(session);
        return { status: "complete" };
      case "advanced": {
        const guidance = await this.guideCheckpoint(outcome.checkpoint, session.context.needElevator, session);
        if (outcome.complete) this.finish(session);
        return { status: "checkpoint_reached", checkpoint: outcome.checkpoint, complete: outcome.complete, guidance };
      }
    }
  }

  async advance(tripId: string, signal: AdvanceSignal): Promise<AdvanceReport> {
    const session = this.deps.sessions.get(tripId);
    const outcome = session.advance(signal);

    if (outcome.status === "complete") {
      this.finish(session);
      return outcome;
    }

    const guidance = await this.guideCheckpoint(outcome.checkpoint, session.context.needElevator, session);
    if (outcome.complete) this.finish(session);
    return { ...outcome, guidance };
  }

  async realtime(stationName: string): Promise<StationRealtimeInfo> {
    const station = await this.deps.facilities.getFacilityRecord(stationName);
    const live = await this.deps.liveStatus.snapshot(station.station.name, [
      "elevators",
      "closures",
      "chargers",
      "arrivals",
    ]);
    return { station: station.station.name, live };
  }

  private async guideCheckpoint(
    checkpoint: Checkpoint,
    needElevator: boolean,
    session?: TripSession
  ): Promise<GuidanceResult> {
    const { facilities, liveStatus, synthesizer } = this.deps;

    const facility = await facilities.getFacilityRecord(checkpoint.data.stationName);
    const live = await liveStatus.snapshot(facility.station.name, snapshotPartsFor(checkpoint.type));
    const passages = await this.retrieve(checkpoint, facility, live, needElevator);

    return synthesizer.synthesize({
      checkpoint,
      facility,
      live,
      passages,
      needElevator,
      trip: session?.context,
    });
  }

  private async retrieve(
    checkpoint: Checkpoint,
    facility: FacilityRecord,
    live: LiveStatusSnapshot,
    needElevator: boolean
  ): Promise<ScoredPassage[]> {
    const query = buildRetrievalQuery(checkpoint, facility, live, needElevator, facility.station.name);
    const outcome = await this.deps.index.retrieve(query, PASSAGES_PER_QUERY, this.deps.retrievalTimeoutMs);
    if (outcome.status === "unavailable") {
      this.logger.info(`Checkpoint ${checkpoint.id}: no passages (${outcome.reason})`);
      return [];
    }
    return outcome.passages;
  }

  private finish(session: TripSession): void {
    if (this.deps.sessions.remove(session.id)) {
      this.logger.info(`Trip ${session.id} complete`);
    }
  }
}
