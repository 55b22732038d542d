/**
 * LIVE STATUS OVERLAY
 *
 * Decides, from facility records and the live snapshot, whether the exit a
 * checkpoint depends on is usable by this rider, and the result's severity:
 * - 경고: the exit is closed, or the rider needs an elevator there and it is
 *   down or missing
 * - 주의: something at the station is down or closed, but not what this
 *   rider needs here
 * - 정상: otherwise
 */

import type { Exit } from "@shared/schema";
import type {
  ElevatorStatus,
  ExitClosure,
  FacilityRecord,
  GuidanceStatus,
  LiveStatusSnapshot,
} from "./types";

/**
 * operating: reported working, or recorded with an elevator and not reported
 * down: every reported elevator at the exit is out of service
 * none: recorded without an elevator and none reported
 * unknown: the exit is not in the facility records and nothing is reported
 */
export type ExitElevatorState = "operating" | "down" | "none" | "unknown";

export type ExitBlock = "closed" | "elevator_down" | "no_elevator";

export interface ExitAssessment {
  exitNumber: string;
  exit: Exit | null;
  elevator: ExitElevatorState;
  closure: ExitClosure | null;
  block: ExitBlock | null;
}

export function reportedElevators(exitNumber: string, live: LiveStatusSnapshot): ElevatorStatus[] {
  return live.elevators.filter((e) => e.exitNumber === exitNumber);
}

export function exitElevatorState(
  exitNumber: string,
  exit: Exit | null,
  live: LiveStatusSnapshot
): ExitElevatorState {
  const reported = reportedElevators(exitNumber, live);
  if (reported.some((e) => e.operating)) return "operating";
  if (reported.length > 0) return "down";
  if (!exit) return "unknown";
  return exit.hasElevator ? "operating" : "none";
}

export function closureFor(exitNumber: string, live: LiveStatusSnapshot): ExitClosure | null {
  return live.closures.find((c) => c.exitNumber === exitNumber) ?? null;
}

export function findExit(facility: FacilityRecord, exitNumber: string): Exit | null {
  return facility.exits.find((e) => e.exitNumber === exitNumber) ?? null;
}

export function assessExit(
  exitNumber: string,
  facility: FacilityRecord,
  live: LiveStatusSnapshot,
  needElevator: boolean
): ExitAssessment {
  const exit = findExit(facility, exitNumber);
  const elevator = exitElevatorState(exitNumber, exit, live);
  const closure = closureFor(exitNumber, live);

  let block: ExitBlock | null = null;
  if (closure) block = "closed";
  else if (needElevator && elevator === "down") block = "elevator_down";
  else if (needElevator && elevator === "none") block = "no_elevator";

  return { exitNumber, exit, elevator, closure, block };
}

export function downElevators(live: LiveStatusSnapshot): ElevatorStatus[] {
  return live.elevators.filter((e) => !e.operating);
}

export function classifyStatus(assessment: ExitAssessment | null, live: LiveStatusSnapshot): GuidanceStatus {
  if (assessment?.block) return "경고";
  if (downElevators(live).length > 0 || live.closures.length > 0) return "주의";
  return "정상";
}
