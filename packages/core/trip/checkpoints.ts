/**
 * CHECKPOINT CONSTRUCTION
 *
 * Builds the ordered checkpoint list of a trip once, at route-search time.
 * Ids are the array positions 0..7; the charging checkpoint is appended only
 * when the rider asked for charging information.
 */

import {
  CHARGING_RADIUS_METERS,
  CHECKPOINT_LABELS,
  DEFAULT_RADIUS_METERS,
  type Checkpoint,
  type CheckpointData,
  type CheckpointType,
  type GeoPoint,
} from "./types";

export interface CheckpointStation {
  name: string;
  line: string;
  location: GeoPoint;
}

export interface CheckpointExit {
  exitNumber: string;
  location: GeoPoint | null;
}

export interface CheckpointPlan {
  riderLocation: GeoPoint;
  startStation: CheckpointStation;
  endStation: CheckpointStation;
  startExit: CheckpointExit | null;
  endExit: CheckpointExit | null;
  /** "잠실 방면" */
  direction: string;
  includeCharging: boolean;
  /** Charger position when known; the end station's otherwise */
  chargerLocation?: GeoPoint | null;
}

interface CheckpointSpec {
  type: CheckpointType;
  gps?: GeoPoint;
  data: CheckpointData;
}

export function buildCheckpoints(plan: CheckpointPlan): Checkpoint[] {
  const { startStation, endStation, startExit, endExit, direction } = plan;

  const atStart = (exitNumber: string | null): CheckpointData => ({
    stationName: startStation.name,
    exitNumber,
    line: startStation.line,
    direction,
  });
  const atEnd = (exitNumber: string | null): CheckpointData => ({
    stationName: endStation.name,
    exitNumber,
    line: endStation.line,
    direction,
  });

  const startExitNumber = startExit?.exitNumber ?? null;
  const endExitNumber = endExit?.exitNumber ?? null;

  const specs: CheckpointSpec[] = [
    { type: "origin", gps: plan.riderLocation, data: atStart(startExitNumber) },
    { type: "origin_exit", gps: startExit?.location ?? undefined, data: atStart(startExitNumber) },
    { type: "origin_platform", gps: startStation.location, data: atStart(null) },
    { type: "platform_wait", data: atStart(null) },
    { type: "boarding", data: atEnd(null) },
    { type: "destination_platform", gps: endStation.location, data: atEnd(endExitNumber) },
    { type: "destination_exit", gps: endExit?.location ?? undefined, data: atEnd(endExitNumber) },
  ];

  if (plan.includeCharging) {
    specs.push({
      type: "charging_station",
      gps: plan.chargerLocation ?? endStation.location,
      data: atEnd(null),
    });
  }

  return specs.map((spec, id) => ({
    id,
    type: spec.type,
    label: CHECKPOINT_LABELS[spec.type],
    ...(spec.gps ? { gps: { ...spec.gps } } : {}),
    radiusMeters: spec.type === "charging_station" ? CHARGING_RADIUS_METERS : DEFAULT_RADIUS_METERS,
    optional: spec.type === "charging_station",
    data: spec.data,
  }));
}
