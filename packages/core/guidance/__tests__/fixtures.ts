/**
 * Facility and live-status fixtures for guidance tests.
 */

import type {
  ChargingStation,
  ElevatorExitMapping,
  Exit,
  Platform,
  PlatformEdge,
  Station,
} from "@shared/schema";
import { CHECKPOINT_LABELS, type Checkpoint, type CheckpointData, type CheckpointType } from "../../trip/types";
import type { ElevatorStatus, FacilityRecord, LiveStatusSnapshot, TrainArrival } from "../types";

export const GANGNAM: Station = {
  id: 1,
  name: "강남",
  line: "2호선",
  stationCode: "222",
  latitude: 37.497942,
  longitude: 127.027621,
};

export const JAMSIL: Station = {
  id: 2,
  name: "잠실",
  line: "2호선",
  stationCode: "216",
  latitude: 37.513282,
  longitude: 127.10015,
};

export function makeExit(stationId: number, exitNumber: string, overrides: Partial<Exit> = {}): Exit {
  return {
    id: stationId * 100 + exitNumber.length,
    stationId,
    exitNumber,
    hasElevator: false,
    elevatorType: null,
    latitude: null,
    longitude: null,
    floorLevel: null,
    description: null,
    elevatorLocation: null,
    elevatorButtonInfo: null,
    elevatorTimeSeconds: null,
    gateDirection: null,
    landmark: null,
    hasSlope: false,
    slopeInfo: null,
    ...overrides,
  };
}

export const EXIT_3 = makeExit(1, "3", {
  hasElevator: true,
  latitude: 37.49805,
  longitude: 127.0286275,
  floorLevel: "B2",
  elevatorLocation: "3번 출구 왼쪽 10m",
  elevatorTimeSeconds: 45,
  landmark: "강남대로",
});

/** Nearest to exit 3, no elevator */
export const EXIT_2 = makeExit(1, "2", { latitude: 37.49795, longitude: 127.0285 });

export const EXIT_12 = makeExit(1, "12", {
  hasElevator: true,
  latitude: 37.4983,
  longitude: 127.029,
  elevatorLocation: "12번 출구 앞",
});

export const EXIT_10 = makeExit(1, "10", { hasElevator: true, latitude: 37.4995, longitude: 127.03 });

export function gangnamFacility(exits: Exit[], extra: Partial<FacilityRecord> = {}): FacilityRecord {
  return {
    station: GANGNAM,
    facility: null,
    exits,
    platforms: [],
    edges: [],
    mappings: [],
    chargers: [],
    ...extra,
  };
}

export const GANGNAM_PLATFORM: Platform = {
  id: 1,
  stationId: 1,
  line: "2호선",
  direction: "잠실 방면",
  platformType: "섬식",
  floorLevel: "B2",
};

export function makeEdge(carNumber: number, gapWidth: string, heightDiff: string): PlatformEdge {
  return {
    id: carNumber,
    stationId: 1,
    platformId: 1,
    carPosition: `본선 잠실 방면 ${carNumber}-1`,
    carNumber,
    doorNumber: 1,
    gapWidth,
    heightDiff,
    platformShape: "직선",
  };
}

export const JAMSIL_EXIT_8 = makeExit(2, "8", {
  hasElevator: true,
  latitude: 37.51401,
  longitude: 127.10192,
});

export const JAMSIL_MAPPING: ElevatorExitMapping = {
  id: 1,
  stationId: 2,
  connectedExit: "8",
  carPositionStart: 7,
  carPositionEnd: 8,
  directionFromTrain: "우측",
  elevatorLocation: "승강장 중앙",
  walkingDistanceMeters: 120,
  walkingTimeSeconds: 150,
  walkingDirection: null,
};

export const JAMSIL_CHARGER: ChargingStation = {
  id: 1,
  stationId: 2,
  location: "대합실 고객안내센터 옆",
  floorLevel: "B1",
  chargerCount: 1,
  available: true,
  chargingTimeMinutes: null,
  latitude: null,
  longitude: null,
};

export function jamsilFacility(extra: Partial<FacilityRecord> = {}): FacilityRecord {
  return {
    station: JAMSIL,
    facility: null,
    exits: [JAMSIL_EXIT_8],
    platforms: [],
    edges: [],
    mappings: [],
    chargers: [],
    ...extra,
  };
}

export function emptyLive(station: string, overrides: Partial<LiveStatusSnapshot> = {}): LiveStatusSnapshot {
  return {
    station,
    elevators: [],
    closures: [],
    arrivals: [],
    chargers: [],
    lifts: [],
    safetyPlatforms: [],
    warnings: [],
    ...overrides,
  };
}

export function elevatorAt(exitNumber: string, operating: boolean): ElevatorStatus {
  return {
    name: `${exitNumber}번 엘리베이터`,
    location: `${exitNumber}번 출입구`,
    exitNumber,
    operating,
    floors: "B2-1F",
  };
}

export function makeCheckpoint(
  id: number,
  type: CheckpointType,
  data: Partial<CheckpointData> = {},
  gps?: { lat: number; lon: number }
): Checkpoint {
  return {
    id,
    type,
    label: CHECKPOINT_LABELS[type],
    ...(gps ? { gps } : {}),
    radiusMeters: 30,
    optional: type === "charging_station",
    data: { stationName: "강남", exitNumber: null, line: "2호선", direction: "잠실 방면", ...data },
  };
}

export function makeArrival(overrides: Partial<TrainArrival> = {}): TrainArrival {
  return {
    direction: "내선",
    trainLineName: "성수행 - 역삼방면",
    terminalStation: "성수",
    trainStatus: "일반",
    trainNo: "2001",
    arrivalSeconds: 0,
    arrivalMinutes: 0,
    arrivalMessage: "",
    arrivalDetail: "",
    arrivalCode: "99",
    isLastTrain: false,
    ...overrides,
  };
}
