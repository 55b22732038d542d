/**
 * ALTERNATIVE ROUTE
 *
 * Nearest other exit of the same station that this rider can use: not
 * closed, and with a working elevator when the rider needs one.
 * Distance is great-circle from the blocked exit (or the station when the
 * blocked exit has no coordinates); exits without coordinates rank last and
 * ties break on exit number.
 */

import type { Exit } from "@shared/schema";
import { haversineMeters } from "../trip/geo";
import type { GeoPoint } from "../trip/types";
import {
  closureFor,
  exitElevatorState,
  reportedElevators,
  type ExitAssessment,
  type ExitBlock,
} from "./live-overlay";
import type { AlternativeRoute, FacilityRecord, LiveStatusSnapshot } from "./types";

function blockReason(assessment: ExitAssessment, block: ExitBlock): string {
  switch (block) {
    case "closed":
      return `${assessment.closure?.reason || "공사"}로 인한 출입구 폐쇄`;
    case "elevator_down":
      return "엘리베이터 점검 중";
    case "no_elevator":
      return "엘리베이터가 없는 출구";
  }
}

export function exitLocation(exit: Exit): GeoPoint | null {
  return exit.latitude != null && exit.longitude != null
    ? { lat: exit.latitude, lon: exit.longitude }
    : null;
}

/** "2" < "2-1" < "10" */
export function compareExitNumbers(a: string, b: string): number {
  const pa = a.split("-").map((p) => Number.parseInt(p, 10));
  const pb = b.split("-").map((p) => Number.parseInt(p, 10));
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i];
    const y = pb[i];
    if (x === undefined) return -1;
    if (y === undefined) return 1;
    if (Number.isNaN(x) || Number.isNaN(y)) return a.localeCompare(b);
    if (x !== y) return x - y;
  }
  return 0;
}

export function findAlternativeRoute(
  assessment: ExitAssessment,
  facility: FacilityRecord,
  live: LiveStatusSnapshot,
  needElevator: boolean
): AlternativeRoute | null {
  const block = assessment.block;
  if (!block) return null;

  const station = facility.station;
  const origin =
    (assessment.exit && exitLocation(assessment.exit)) ?? { lat: station.latitude, lon: station.longitude };

  const candidates = facility.exits
    .filter((exit) => exit.exitNumber !== assessment.exitNumber)
    .filter((exit) => !closureFor(exit.exitNumber, live))
    .filter((exit) => !needElevator || exitElevatorState(exit.exitNumber, exit, live) === "operating")
    .map((exit) => {
      const location = exitLocation(exit);
      return { exit, location, distance: location ? haversineMeters(origin, location) : null };
    })
    .sort((a, b) => {
      if (a.distance !== null && b.distance !== null && a.distance !== b.distance) {
        return a.distance - b.distance;
      }
      if (a.distance === null && b.distance !== null) return 1;
      if (a.distance !== null && b.distance === null) return -1;
      return compareExitNumbers(a.exit.exitNumber, b.exit.exitNumber);
    });

  const best = candidates[0];
  if (!best) return null;

  const elevatorLocation =
    best.exit.elevatorLocation ??
    reportedElevators(best.exit.exitNumber, live).find((e) => e.operating)?.location;

  return {
    exitNumber: best.exit.exitNumber,
    reason: blockReason(assessment, block),
    distanceMeters: best.distance === null ? null : Math.round(best.distance),
    ...(needElevator && elevatorLocation ? { elevatorLocation } : {}),
    ...(best.location ? { position: best.location } : {}),
    ...(assessment.closure?.endDate ? { closureEndDate: assessment.closure.endDate } : {}),
  };
}
