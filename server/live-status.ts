/**
 * LIVE STATUS SERVICE
 *
 * Builds a station's LiveStatusSnapshot from cached upstream rows:
 * - elevators: SeoulMetroFaciInfo rows of kind EV (escalators excluded)
 * - closures: TbSubwayLineDetail rows; the exit number comes from "3번" in the location
 * - arrivals: realtimeStationArrival for the station
 * - chargers: getWksnWhclCharge rows
 * - lifts: getWksnWhcllift rows (oprtngSitu "M" means operating)
 * - safetyPlatforms: getWksnSafePlfm rows that report a plate
 *
 * Upstream failures never fail the snapshot; they become warnings and the
 * affected list stays empty.
 */

import type {
  ChargerStatus,
  ElevatorStatus,
  ExitClosure,
  LiftStatus,
  LiveStatusSnapshot,
  SafetyPlatformStatus,
  TrainArrival,
} from "@core/guidance";
import type { Logger } from "@core/logger";
import { silentLogger } from "@core/logger";
import {
  normalizeStationKey,
  rowBoolean,
  rowNumber,
  rowOptionalString,
  rowString,
  type FetchOutcome,
  type FetchParams,
  type NormalizedRow,
  type ResourceName,
  type UpstreamClient,
} from "../packages/providers";

export const SNAPSHOT_PARTS = ["elevators", "closures", "arrivals", "chargers", "lifts", "safetyPlatforms"] as const;
export type SnapshotPart = (typeof SNAPSHOT_PARTS)[number];

const ELEVATOR_KIND = "EV";
const CLOSURE_EXIT = /(\d+(?:-\d+)?)번/;

export function closureExitNumber(location: string): string | null {
  const match = location.match(CLOSURE_EXIT);
  return match ? match[1] : null;
}

export function toElevatorStatus(row: NormalizedRow): ElevatorStatus {
  return {
    name: rowString(row, "name"),
    location: rowString(row, "location"),
    exitNumber: rowOptionalString(row, "exitNumber"),
    operating: rowBoolean(row, "operating"),
    floors: rowString(row, "floors"),
  };
}

export function toExitClosure(row: NormalizedRow): ExitClosure {
  const location = rowString(row, "location");
  return {
    location,
    reason: rowString(row, "reason"),
    alternative: rowString(row, "alternative"),
    startDate: rowString(row, "startDate"),
    endDate: rowString(row, "endDate"),
    exitNumber: closureExitNumber(location),
  };
}

export function toTrainArrival(row: NormalizedRow): TrainArrival {
  return {
    direction: rowString(row, "direction"),
    trainLineName: rowString(row, "trainLineName"),
    terminalStation: rowString(row, "terminalStation"),
    trainStatus: rowString(row, "trainStatus", "일반"),
    trainNo: rowString(row, "trainNo"),
    arrivalSeconds: rowNumber(row, "arrivalSeconds"),
    arrivalMinutes: rowNumber(row, "arrivalMinutes"),
    arrivalMessage: rowString(row, "arrivalMessage"),
    arrivalDetail: rowString(row, "arrivalDetail"),
    arrivalCode: rowString(row, "arrivalCode", "99"),
    isLastTrain: rowBoolean(row, "isLastTrain"),
  };
}

export function toChargerStatus(row: NormalizedRow): ChargerStatus {
  return {
    location: rowString(row, "location"),
    floor: rowString(row, "floor"),
    usageFee: rowString(row, "usageFee", "무료"),
    chargerCount: rowNumber(row, "chargerCount"),
  };
}

export function toLiftStatus(row: NormalizedRow): LiftStatus {
  return {
    name: rowString(row, "facilityName"),
    exitNumber: rowOptionalString(row, "exitNumber"),
    operating: rowBoolean(row, "operating"),
  };
}

export function toSafetyPlatform(row: NormalizedRow): SafetyPlatformStatus {
  return { name: rowString(row, "facilityName"), line: rowString(row, "line") };
}

interface PartResult<T> {
  items: T[];
  warning?: string;
}

export class LiveStatusService {
  private readonly logger: Logger;

  constructor(
    private readonly client: UpstreamClient,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  async snapshot(
    stationName: string,
    parts: readonly SnapshotPart[] = SNAPSHOT_PARTS
  ): Promise<LiveStatusSnapshot> {
    const station = normalizeStationKey(stationName);
    const want = (part: SnapshotPart) => parts.includes(part);
    const none = <T>(): Promise<PartResult<T>> => Promise.resolve({ items: [] });

    const [elevators, closures, arrivals, chargers, lifts, safetyPlatforms] = await Promise.all([
      want("elevators") ? this.elevators(station) : none<ElevatorStatus>(),
      want("closures") ? this.closures(station) : none<ExitClosure>(),
      want("arrivals") ? this.arrivals(station) : none<TrainArrival>(),
      want("chargers") ? this.chargers(station) : none<ChargerStatus>(),
      want("lifts") ? this.lifts(station) : none<LiftStatus>(),
      want("safetyPlatforms") ? this.safetyPlatforms(station) : none<SafetyPlatformStatus>(),
    ]);

    const warnings = [elevators, closures, arrivals, chargers, lifts, safetyPlatforms]
      .map((p) => p.warning)
      .filter((w): w is string => w !== undefined);

    if (warnings.length > 0) {
      this.logger.warn(`Degraded live status for ${station}`, { warnings });
    }

    return {
      station,
      elevators: elevators.items,
      closures: closures.items,
      arrivals: arrivals.items,
      chargers: chargers.items,
      lifts: lifts.items,
      safetyPlatforms: safetyPlatforms.items,
      warnings,
    };
  }

  async elevators(station: string): Promise<PartResult<ElevatorStatus>> {
    return this.collect("SeoulMetroFaciInfo", {}, station, (row) =>
      rowString(row, "facilityKind") === ELEVATOR_KIND ? toElevatorStatus(row) : null
    );
  }

  async closures(station: string): Promise<PartResult<ExitClosure>> {
    return this.collect("TbSubwayLineDetail", {}, station, toExitClosure);
  }

  async arrivals(station: string): Promise<PartResult<TrainArrival>> {
    return this.collect("realtimeStationArrival", { key: station }, station, toTrainArrival);
  }

  async chargers(station: string): Promise<PartResult<ChargerStatus>> {
    return this.collect("getWksnWhclCharge", {}, station, toChargerStatus);
  }

  async lifts(station: string): Promise<PartResult<LiftStatus>> {
    return this.collect("getWksnWhcllift", {}, station, toLiftStatus);
  }

  async safetyPlatforms(station: string): Promise<PartResult<SafetyPlatformStatus>> {
    return this.collect("getWksnSafePlfm", {}, station, (row) =>
      rowBoolean(row, "hasPlatform") ? toSafetyPlatform(row) : null
    );
  }

  private async collect<T>(
    resource: ResourceName,
    params: FetchParams,
    station: string,
    map: (row: NormalizedRow) => T | null
  ): Promise<PartResult<T>> {
    const outcome: FetchOutcome = await this.client.fetchOutcome(resource, params);
    const items: T[] = [];
    for (const row of outcome.rows) {
      if (row.station !== station) continue;
      const item = map(row);
      if (item !== null) items.push(item);
    }

    switch (outcome.status) {
      case "ok":
        return { items };
      case "degraded":
      case "unavailable":
        return { items, warning: outcome.warning };
    }
  }
}
