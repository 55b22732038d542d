/**
 * TRIP ASSEMBLY (route search)
 *
 * start/end station + rider GPS + accessibility tags → a registered trip:
 * 1. Facility lookup of both stations (StationNotFound)
 * 2. Same-line check (NoDirectRoute otherwise)
 * 3. Live status of both stations
 * 4. Exit selection by score at each end
 * 5. Boarding cars, ride estimate, walking guide
 * 6. Checkpoints, session registration, summary and warnings
 */

import type { Exit } from "@shared/schema";
import type { RouteSearchRequest } from "@shared/schema";
import { NoDirectRoute } from "@core/errors";
import {
  accessibleCars,
  arrivalsToward,
  exitLocation,
  stationLabel,
  type ElevatorStatus,
  type FacilityRecord,
  type LiveStatusSnapshot,
} from "@core/guidance";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import {
  buildCheckpoints,
  compassDirection,
  haversineMeters,
  walkingMinutes,
  type CompassDirection,
  type GeoPoint,
  type TripContext,
  type TripSession,
  type TripSessionStore,
} from "@core/trip";
import type { IFacilityStore } from "./facility-store";
import type { LiveStatusService } from "./live-status";

// ============================================
// TYPES
// ============================================

export interface BoardingPlan {
  start: number;
  end: number;
  reason: string;
}

export interface WalkingGuide {
  distanceMeters: number;
  minutes: number;
  direction: CompassDirection;
  text: string;
  hasSlope: boolean;
  slopeWarning: string | null;
  landmarks: string[];
}

export interface StationElevatorSummary {
  name: string;
  elevators: ElevatorStatus[];
  allWorking: boolean;
}

export interface RealtimeTrain {
  arrivalMinutes: number;
  arrivalSeconds: number;
  arrivalMessage: string;
  terminalStation: string;
  trainStatus: string;
  isLastTrain: boolean;
  currentLocation: string;
}

export type RouteStatus = "정상" | "주의";

export interface AssembledTrip {
  session: TripSession;
  startStation: string;
  endStation: string;
  line: string;
  direction: string;
  distanceMeters: number;
  estimatedMinutes: number;
  startExit: Exit | null;
  endExit: Exit | null;
  boarding: BoardingPlan;
  walkingGuide: WalkingGuide | null;
  elevatorStatus: { start: StationElevatorSummary; end: StationElevatorSummary };
  realtimeTrain: RealtimeTrain | null;
  warnings: string[];
  status: RouteStatus;
}

// ============================================
// SCORING & ESTIMATES
// ============================================

const SUBWAY_METERS_PER_MINUTE = 40000 / 60;
const MIN_RIDE_MINUTES = 5;

export function estimateRideMinutes(distanceMeters: number): number {
  return Math.max(MIN_RIDE_MINUTES, Math.floor(distanceMeters / SUBWAY_METERS_PER_MINUTE));
}

/**
 * Highest-scoring exit with coordinates. Base 100, plus up to 100 for
 * closeness to the rider (0 at 1 km), +100 for a reported working elevator,
 * +30 for any other elevator, -200 when the only elevator is reported down
 * and the rider needs one. Scores below zero never win. A rider who needs an
 * elevator skips exits without one; when nothing else qualifies, the exit
 * nearest to the rider is used.
 */
export function selectExit(
  exits: readonly Exit[],
  elevators: readonly ElevatorStatus[],
  needElevator: boolean,
  riderLocation: GeoPoint | null
): Exit | null {
  const working = new Set<string>();
  const broken = new Set<string>();
  for (const elevator of elevators) {
    if (!elevator.exitNumber) continue;
    (elevator.operating ? working : broken).add(elevator.exitNumber);
  }

  let best: Exit | null = null;
  let bestScore = -1;
  let fallback: { exit: Exit; distance: number } | null = null;

  for (const exit of exits) {
    const location = exitLocation(exit);
    if (!location) continue;

    const distance = riderLocation ? haversineMeters(riderLocation, location) : null;
    const hasWorking = working.has(exit.exitNumber);
    const hasBroken = broken.has(exit.exitNumber);
    const hasAny = hasWorking || hasBroken || exit.hasElevator;

    let score = 100;
    if (needElevator) {
      if (hasBroken && !hasWorking) {
        score -= 200;
      } else if (!hasAny) {
        if (distance !== null && (fallback === null || distance < fallback.distance)) {
          fallback = { exit, distance };
        }
        continue;
      }
    }

    if (distance !== null) score += Math.max(0, 100 - distance / 10);
    if (hasWorking) score += 100;
    else if (hasAny) score += 30;

    if (score > bestScore) {
      bestScore = score;
      best = exit;
    }
  }

  return best ?? fallback?.exit ?? null;
}

/** Wide-gap, low-step cars at the destination; otherwise near its elevator, else mid-train */
export function planBoarding(destination: FacilityRecord, endExit: Exit | null): BoardingPlan {
  const cars = accessibleCars(destination.edges).filter((n) => n > 0);

  const exitName = endExit ? `${endExit.exitNumber}번 출구` : "출구";

  if (cars.length > 0) {
    return {
      start: cars[0],
      end: cars.length > 1 ? cars[1] : cars[0],
      reason: `도착역 ${exitName} 엘리베이터와 가깝고, 승강장과 열차 간격이 좁아 승하차가 편한 위치`,
    };
  }
  if (endExit?.hasElevator) {
    return { start: 7, end: 8, reason: `${exitName} 엘리베이터와 가까운 위치` };
  }
  return { start: 5, end: 6, reason: "승강장 중앙 위치" };
}

export function buildWalkingGuide(rider: GeoPoint, exit: Exit, stationName: string): WalkingGuide | null {
  const target = exitLocation(exit);
  if (!target) return null;

  const distance = Math.floor(haversineMeters(rider, target));
  const direction = compassDirection(rider, target);

  const parts = [`${direction}으로 약 ${distance}m 직진하시면 ${stationLabel(stationName)} ${exit.exitNumber}번 출구가 있습니다.`];
  if (exit.hasElevator) {
    parts.push(exit.elevatorLocation ? `엘리베이터는 ${exit.elevatorLocation}에 있습니다.` : "이 출구에 엘리베이터가 있습니다.");
  }
  if (exit.landmark) parts.push(`(${exit.landmark} 근처)`);

  return {
    distanceMeters: distance,
    minutes: walkingMinutes(distance),
    direction,
    text: parts.join(" "),
    hasSlope: exit.hasSlope,
    slopeWarning: exit.slopeInfo,
    landmarks: exit.landmark ? [exit.landmark] : [],
  };
}

export function firstTrainToward(live: LiveStatusSnapshot, direction: string): RealtimeTrain | null {
  const first = arrivalsToward(live.arrivals, direction)[0];
  if (!first) return null;
  return {
    arrivalMinutes: first.arrivalMinutes,
    arrivalSeconds: first.arrivalSeconds,
    arrivalMessage: first.arrivalMessage,
    terminalStation: first.terminalStation,
    trainStatus: first.trainStatus,
    isLastTrain: first.isLastTrain,
    currentLocation: first.arrivalDetail,
  };
}

function summarizeElevators(name: string, live: LiveStatusSnapshot): StationElevatorSummary {
  return { name, elevators: live.elevators, allWorking: live.elevators.every((e) => e.operating) };
}

// ============================================
// SERVICE
// ============================================

export interface TripAssemblyDeps {
  facilities: IFacilityStore;
  liveStatus: LiveStatusService;
  sessions: TripSessionStore;
  logger?: Logger;
}

export class TripAssemblyService {
  private readonly logger: Logger;

  constructor(private readonly deps: TripAssemblyDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async assemble(request: RouteSearchRequest): Promise<AssembledTrip> {
    const { facilities, liveStatus, sessions } = this.deps;
    const tags = request.user_tags;

    const [start, end] = await Promise.all([
      facilities.getFacilityRecord(request.start_station),
      facilities.getFacilityRecord(request.end_station),
    ]);
    if (start.station.line !== end.station.line) {
      throw new NoDirectRoute(start.station.name, end.station.name);
    }

    const line = start.station.line;
    const direction = `${end.station.name} 방면`;
    const startPoint = { lat: start.station.latitude, lon: start.station.longitude };
    const endPoint = { lat: end.station.latitude, lon: end.station.longitude };
    const distanceMeters = Math.floor(haversineMeters(startPoint, endPoint));
    const estimatedMinutes = estimateRideMinutes(distanceMeters);

    const [startLive, endLive] = await Promise.all([
      liveStatus.snapshot(start.station.name, ["elevators", "closures", "arrivals"]),
      liveStatus.snapshot(end.station.name, ["elevators", "chargers"]),
    ]);

    const startExit = selectExit(start.exits, startLive.elevators, tags.need_elevator, request.user_location);
    const endExit = selectExit(end.exits, endLive.elevators, tags.need_elevator, null);
    const boarding = planBoarding(end, endExit);

    const charger = end.chargers.find((c) => c.available && c.latitude !== null && c.longitude !== null);
    const checkpoints = buildCheckpoints({
      riderLocation: request.user_location,
      startStation: { name: start.station.name, line, location: startPoint },
      endStation: { name: end.station.name, line, location: endPoint },
      startExit: startExit ? { exitNumber: startExit.exitNumber, location: exitLocation(startExit) } : null,
      endExit: endExit ? { exitNumber: endExit.exitNumber, location: exitLocation(endExit) } : null,
      direction,
      includeCharging: tags.need_charging_info,
      chargerLocation:
        charger && charger.latitude !== null && charger.longitude !== null
          ? { lat: charger.latitude, lon: charger.longitude }
          : null,
    });

    const context: TripContext = {
      startStation: start.station.name,
      endStation: end.station.name,
      line,
      direction,
      startExit: startExit?.exitNumber ?? null,
      endExit: endExit?.exitNumber ?? null,
      needElevator: tags.need_elevator,
      boardingCars: { start: boarding.start, end: boarding.end },
      estimatedMinutes,
    };

    const session = sessions.create({ riderKey: request.rider_id, checkpoints, context });

    const elevatorStatus = {
      start: summarizeElevators(start.station.name, startLive),
      end: summarizeElevators(end.station.name, endLive),
    };

    const warnings: string[] = [];
    let status: RouteStatus = "정상";
    if (!elevatorStatus.start.allWorking) {
      warnings.push(`${start.station.name} 엘리베이터 일부 점검 중`);
      status = "주의";
    }
    if (!elevatorStatus.end.allWorking) {
      warnings.push(`${end.station.name} 엘리베이터 일부 점검 중`);
      status = "주의";
    }
    for (const closure of startLive.closures) {
      warnings.push(`출입구 폐쇄: ${closure.reason || closure.location}`);
      status = "주의";
    }
    warnings.push(...startLive.warnings, ...endLive.warnings);

    this.logger.info(`Trip ${session.id}: ${start.station.name} → ${end.station.name}`, {
      checkpoints: checkpoints.length,
      startExit: context.startExit,
      endExit: context.endExit,
      status,
    });

    return {
      session,
      startStation: start.station.name,
      endStation: end.station.name,
      line,
      direction,
      distanceMeters,
      estimatedMinutes,
      startExit,
      endExit,
      boarding,
      walkingGuide: startExit ? buildWalkingGuide(request.user_location, startExit, start.station.name) : null,
      elevatorStatus,
      realtimeTrain: firstTrainToward(startLive, direction),
      warnings,
      status,
    };
  }
}
