/**
 * TRIP TYPES
 *
 * A trip is an ordered, immutable list of checkpoints created at route-search
 * time. Only the session's current index moves, and only forward.
 */

export const CHECKPOINT_TYPES = [
  "origin",
  "origin_exit",
  "origin_platform",
  "platform_wait",
  "boarding",
  "destination_platform",
  "destination_exit",
  "charging_station",
] as const;

export type CheckpointType = (typeof CHECKPOINT_TYPES)[number];

/** Labels shown to riders and read out by speech synthesis */
export const CHECKPOINT_LABELS: Record<CheckpointType, string> = {
  origin: "출발지",
  origin_exit: "출발역_출구",
  origin_platform: "출발역_승강장",
  platform_wait: "승강장_대기",
  boarding: "열차_탑승",
  destination_platform: "도착역_승강장",
  destination_exit: "도착역_출구",
  charging_station: "충전소",
};

export const DEFAULT_RADIUS_METERS = 30;
export const CHARGING_RADIUS_METERS = 50;

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface CheckpointData {
  stationName: string;
  exitNumber: string | null;
  line: string | null;
  direction: string | null;
}

export interface Checkpoint {
  id: number;
  type: CheckpointType;
  label: string;
  /** Absent for checkpoints that advance only on an explicit signal */
  gps?: GeoPoint;
  radiusMeters: number;
  optional: boolean;
  data: CheckpointData;
}

/** Trip facts every checkpoint's guidance may need */
export interface TripContext {
  startStation: string;
  endStation: string;
  line: string;
  direction: string;
  startExit: string | null;
  endExit: string | null;
  needElevator: boolean;
  boardingCars: { start: number; end: number } | null;
  estimatedMinutes: number;
}

export type AdvanceSignal = "timer" | "rider";
