/**
 * GUIDANCE TYPES
 */

import type {
  ChargingStation,
  ElevatorExitMapping,
  Exit,
  Platform,
  PlatformEdge,
  Station,
  StationFacility,
} from "@shared/schema";
import type { ScoredPassage } from "../knowledge/types";
import type { Checkpoint, CheckpointType, GeoPoint, TripContext } from "../trip/types";

export type GuidanceStatus = "정상" | "주의" | "경고";

// ============================================
// INPUTS
// ============================================

/** Read-only facility records of one station */
export interface FacilityRecord {
  station: Station;
  facility: StationFacility | null;
  exits: Exit[];
  platforms: Platform[];
  edges: PlatformEdge[];
  mappings: ElevatorExitMapping[];
  chargers: ChargingStation[];
}

export interface ElevatorStatus {
  name: string;
  location: string;
  exitNumber: string | null;
  operating: boolean;
  floors: string;
}

export interface ExitClosure {
  location: string;
  reason: string;
  alternative: string;
  startDate: string;
  endDate: string;
  exitNumber: string | null;
}

export interface TrainArrival {
  direction: string;
  trainLineName: string;
  terminalStation: string;
  trainStatus: string;
  trainNo: string;
  arrivalSeconds: number;
  arrivalMinutes: number;
  arrivalMessage: string;
  arrivalDetail: string;
  arrivalCode: string;
  isLastTrain: boolean;
}

export interface ChargerStatus {
  location: string;
  floor: string;
  usageFee: string;
  chargerCount: number;
}

export interface LiftStatus {
  name: string;
  exitNumber: string | null;
  operating: boolean;
}

/** Boarding plate kept at the station for the wheelchair gap */
export interface SafetyPlatformStatus {
  name: string;
  line: string;
}

/** Live status of one station at one instant, valid for its cache TTL */
export interface LiveStatusSnapshot {
  station: string;
  elevators: ElevatorStatus[];
  closures: ExitClosure[];
  arrivals: TrainArrival[];
  chargers: ChargerStatus[];
  lifts: LiftStatus[];
  safetyPlatforms: SafetyPlatformStatus[];
  /** Degraded-data notes from the upstream client */
  warnings: string[];
}

export interface SynthesisInput {
  checkpoint: Checkpoint;
  facility: FacilityRecord;
  live: LiveStatusSnapshot;
  passages: readonly ScoredPassage[];
  needElevator: boolean;
  trip?: TripContext;
}

// ============================================
// OUTPUT
// ============================================

export interface AlternativeRoute {
  exitNumber: string;
  reason: string;
  /** Null when either exit lacks coordinates */
  distanceMeters: number | null;
  elevatorLocation?: string;
  position?: GeoPoint;
  closureEndDate?: string;
}

export type NarrativeSource = "generated" | "template";

export interface GuidanceResult {
  checkpointId: number;
  checkpointType: CheckpointType;
  checkpointLabel: string;
  /** Paragraphs separated by blank lines; safe to pass to speech synthesis */
  text: string;
  status: GuidanceStatus;
  alternativeRoute?: AlternativeRoute;
  warnings: string[];
  narrative: NarrativeSource;
  passagesUsed: string[];
}
