/**
 * GUIDANCE TEMPLATES
 *
 * Deterministic text per checkpoint type, built only from facility records
 * and the live snapshot. Every template returns paragraphs; the synthesizer
 * joins them with blank lines.
 *
 * Alerts (closures, elevators out of service, the alternative route) are
 * rendered separately by renderAlerts() and never rewritten by the narrative
 * step.
 */

import type { PlatformEdge } from "@shared/schema";
import { compassDirection, haversineMeters, walkingMinutes } from "../trip/geo";
import type { Checkpoint, TripContext } from "../trip/types";
import { exitLocation } from "./alternative-route";
import {
  closureFor,
  downElevators,
  exitElevatorState,
  reportedElevators,
  type ExitAssessment,
} from "./live-overlay";
import type { AlternativeRoute, FacilityRecord, LiveStatusSnapshot, TrainArrival } from "./types";

export interface TemplateInput {
  checkpoint: Checkpoint;
  facility: FacilityRecord;
  live: LiveStatusSnapshot;
  needElevator: boolean;
  trip?: TripContext;
  assessment: ExitAssessment | null;
}

export const NO_ALTERNATIVE_TEXT =
  "이용할 수 있는 다른 출구가 없습니다. 역무원 호출 버튼이나 역무실에 도움을 요청해주세요.";

// ============================================
// HELPERS
// ============================================

type Sentence = string | null | undefined | false;

function paragraph(...sentences: Sentence[]): string {
  return sentences.filter((s): s is string => typeof s === "string" && s.length > 0).join(" ");
}

function compact(paragraphs: string[]): string[] {
  return paragraphs.filter((p) => p.length > 0);
}

export function stationLabel(name: string): string {
  return name.endsWith("역") ? name : `${name}역`;
}

/** "B2" → "지하 2층", "1F" → "지상 1층" */
export function floorLabel(level: string): string {
  const underground = level.trim().match(/^B(\d+)/i);
  if (underground) return `지하 ${underground[1]}층`;
  const above = level.trim().match(/^(\d+)\s*F?$/i);
  if (above) return `지상 ${above[1]}층`;
  return level.trim();
}

/** "잠실 방면" → "잠실" */
export function directionKey(direction: string | null | undefined): string {
  return (direction ?? "").replace(/\s*방면$/, "").trim();
}

/** Arrivals heading toward `direction`; all arrivals when none match */
export function arrivalsToward(arrivals: readonly TrainArrival[], direction: string | null | undefined): TrainArrival[] {
  const key = directionKey(direction);
  if (!key) return [...arrivals];
  const matching = arrivals.filter((a) => a.terminalStation.includes(key) || a.trainLineName.includes(key));
  return matching.length > 0 ? matching : [...arrivals];
}

/** Cars where the gap is wide and the height difference low, ascending */
export function accessibleCars(edges: readonly PlatformEdge[]): number[] {
  const cars = edges
    .filter((e) => e.gapWidth === "넓음" && e.heightDiff === "낮음")
    .map((e) => e.carNumber)
    .filter((n): n is number => n !== null);
  return Array.from(new Set(cars)).sort((a, b) => a - b);
}

function carRange(start: number, end: number | null | undefined): string {
  return end && end !== start ? `${start}-${end}번째 칸` : `${start}번째 칸`;
}

function durationText(seconds: number): string {
  return seconds >= 60 ? `약 ${Math.floor(seconds / 60)}분 정도 걸려요.` : `약 ${seconds}초 정도 걸려요.`;
}

function operatingLiftAt(exitNumber: string, live: LiveStatusSnapshot): boolean {
  return live.lifts.some((l) => l.exitNumber === exitNumber && l.operating);
}

function safetyPlatformText(live: LiveStatusSnapshot, needElevator: boolean): string | null {
  if (!needElevator || live.safetyPlatforms.length === 0) return null;
  return "이 역에는 휠체어 안전발판이 있습니다. 열차와 승강장 사이가 넓으면 역무원에게 요청하세요.";
}

const ENTERING = "0";
const ARRIVED = "1";
const EXPRESS_STATUSES = ["급행", "특급", "ITX"];

// ============================================
// ALERTS
// ============================================

export function renderAlerts(
  input: TemplateInput,
  alternative: AlternativeRoute | null
): string[] {
  const { assessment, live, needElevator } = input;
  const alerts: string[] = [];

  if (assessment?.block) {
    const n = assessment.exitNumber;
    switch (assessment.block) {
      case "closed": {
        const closure = assessment.closure;
        alerts.push(
          paragraph(
            `현재 ${n}번 출구는 ${closure?.reason || "공사"}로 이용할 수 없습니다.`,
            closure?.endDate && `(${closure.endDate}까지 폐쇄 예정)`,
            closure?.alternative && `우회 경로: ${closure.alternative}`
          )
        );
        break;
      }
      case "elevator_down":
        alerts.push(`${n}번 출구 엘리베이터가 현재 운행하지 않습니다.`);
        break;
      case "no_elevator":
        alerts.push(`${n}번 출구에는 엘리베이터가 없습니다.`);
        break;
    }

    if (assessment.block !== "closed" && operatingLiftAt(n, live)) {
      alerts.push(`${n}번 출구 휠체어리프트는 운행 중입니다. 역무원 호출 버튼을 누르면 이용할 수 있습니다.`);
    }

    if (alternative) {
      alerts.push(
        paragraph(
          `대신 ${alternative.exitNumber}번 출구를 이용해주세요.`,
          alternative.distanceMeters !== null && `약 ${alternative.distanceMeters}m 떨어져 있습니다.`,
          needElevator &&
            (alternative.elevatorLocation
              ? `엘리베이터는 ${alternative.elevatorLocation}에 있습니다.`
              : "이 출구에는 엘리베이터가 있습니다.")
        )
      );
    } else {
      alerts.push(NO_ALTERNATIVE_TEXT);
    }
  } else {
    const down = downElevators(live);
    if (down.length > 0) {
      const places = down.map((e) => e.location || e.name).filter((p) => p.length > 0);
      alerts.push(
        places.length > 0
          ? `일부 엘리베이터가 점검 중입니다: ${places.join(", ")}.`
          : "일부 엘리베이터가 점검 중입니다."
      );
    }
    for (const closure of live.closures) {
      alerts.push(`출입구 폐쇄: ${closure.location} (${closure.reason || "공사"})`);
    }
  }

  if (live.warnings.length > 0) {
    alerts.push("일부 실시간 정보를 확인하지 못해 시설 정보를 기준으로 안내합니다.");
  }

  return alerts;
}

// ============================================
// BODY (per checkpoint type)
// ============================================

export function renderBody(input: TemplateInput): string[] {
  switch (input.checkpoint.type) {
    case "origin":
      return originBody(input);
    case "origin_exit":
    case "destination_exit":
      return exitBody(input);
    case "origin_platform":
      return platformBody(input);
    case "platform_wait":
      return waitingBody(input);
    case "boarding":
      return boardingBody(input);
    case "destination_platform":
      return arrivalPlatformBody(input);
    case "charging_station":
      return chargingBody(input);
  }
}

function originBody({ checkpoint, facility, assessment }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const exit = assessment?.exit ?? null;
  const exitNumber = checkpoint.data.exitNumber;

  let walking: string | null = null;
  const target = exit ? exitLocation(exit) : null;
  if (checkpoint.gps && target) {
    const distance = Math.round(haversineMeters(checkpoint.gps, target));
    walking = `${compassDirection(checkpoint.gps, target)}으로 약 ${distance}m, 걸어서 약 ${walkingMinutes(distance)}분 거리입니다.`;
  }

  return compact([
    paragraph(
      `${station}으로 이동합니다.`,
      exitNumber && `${exitNumber}번 출구로 가세요.`,
      walking
    ),
    paragraph(
      exit?.hasElevator &&
        (exit.elevatorLocation ? `엘리베이터는 ${exit.elevatorLocation}에 있습니다.` : "이 출구에 엘리베이터가 있습니다."),
      exit?.landmark && `${exit.landmark} 근처입니다.`
    ),
    paragraph(exit?.hasSlope && (exit.slopeInfo || "출구 앞 경사로에 주의하세요.")),
  ]);
}

function exitBody({ checkpoint, facility, live, needElevator, assessment }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const isOrigin = checkpoint.type === "origin_exit";
  const exitNumber = checkpoint.data.exitNumber;
  const exit = assessment?.exit ?? null;

  const greeting = exitNumber
    ? isOrigin
      ? `${station} ${exitNumber}번 출구에 도착하셨습니다.`
      : `${station} ${exitNumber}번 출구로 나갑니다.`
    : `${station}에 도착하셨습니다.`;

  if (assessment?.block === "closed") return [greeting];

  const paragraphs = [greeting];

  if (needElevator && assessment?.elevator === "operating") {
    const reported = exitNumber ? reportedElevators(exitNumber, live).filter((e) => e.operating) : [];
    const location = exit?.elevatorLocation ?? reported[0]?.location;

    let button: string | null = null;
    if (isOrigin) {
      const underground = exit?.floorLevel?.match(/^B(\d+)/i);
      button = exit?.elevatorButtonInfo ?? (underground ? `지하 ${underground[1]}층 버튼을 누르세요.` : null);
    } else {
      button = "지상 1층 버튼을 누르세요.";
    }

    paragraphs.push(
      paragraph(
        reported.length > 0 ? "엘리베이터가 정상 운행 중입니다." : "이 출구에 엘리베이터가 있습니다.",
        location && `위치: ${location}.`,
        button,
        exit?.elevatorTimeSeconds ? durationText(exit.elevatorTimeSeconds) : null
      )
    );

    if (isOrigin) {
      paragraphs.push(exit?.gateDirection || "개찰구를 지나 승강장으로 이동하세요.");
    }
  }

  if (exit?.description) paragraphs.push(exit.description);

  const amenities = [
    facility.facility?.hasNursingRoom && "수유실",
    facility.facility?.hasMeetingPlace && "만남의 장소",
    facility.facility?.hasAutoKiosk && "무인발매기",
  ].filter((a): a is string => typeof a === "string");
  if (isOrigin && amenities.length > 0) {
    paragraphs.push(`이 역의 편의시설: ${amenities.join(", ")}.`);
  }

  return compact(paragraphs);
}

function platformBody({ checkpoint, facility, live, needElevator, trip }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const direction = checkpoint.data.direction;
  const key = directionKey(direction);
  const platform =
    facility.platforms.find((p) => key && p.direction?.includes(key)) ?? facility.platforms[0] ?? null;

  let platformType: string | null = null;
  if (platform?.platformType === "섬식") platformType = "양쪽 방향 열차가 같은 승강장에 서는 섬식 승강장입니다.";
  if (platform?.platformType === "상대식") platformType = "방향별로 승강장이 나뉘어 있습니다.";

  const edges = platform ? facility.edges.filter((e) => e.platformId === platform.id) : facility.edges;
  const cars = accessibleCars(edges.length > 0 ? edges : facility.edges);

  let boarding: string | null = null;
  if (needElevator && cars.length > 0) {
    boarding = `${carRange(cars[0], cars[cars.length - 1])} 위치에서 기다려주세요. 휠체어로 타고 내리기 편한 칸입니다.`;
  } else if (trip?.boardingCars) {
    boarding = `${carRange(trip.boardingCars.start, trip.boardingCars.end)}에서 타면 도착역 엘리베이터와 가깝습니다.`;
  }

  const next = arrivalsToward(live.arrivals, direction)[0];
  let nextTrain: string | null = null;
  if (next && next.arrivalSeconds > 0) {
    nextTrain = next.arrivalMinutes <= 1 ? "곧 열차가 도착합니다." : `약 ${next.arrivalMinutes}분 후 열차가 도착합니다.`;
  }

  return compact([
    paragraph(
      direction ? `${station} ${direction} 승강장에 도착하셨습니다.` : `${station} 승강장에 도착하셨습니다.`,
      platform?.floorLevel && `${floorLabel(platform.floorLevel)}입니다.`,
      platformType
    ),
    paragraph(boarding),
    paragraph(safetyPlatformText(live, needElevator)),
    paragraph(nextTrain),
    "열차가 완전히 멈춘 뒤 천천히 타세요.",
  ]);
}

function waitingBody({ checkpoint, facility, live }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const arrivals = arrivalsToward(live.arrivals, checkpoint.data.direction);
  const paragraphs = [`${station} 승강장에서 열차를 기다리고 있습니다.`];

  const [first, second] = arrivals;
  if (first) {
    const atPlatform = first.arrivalCode === ENTERING || first.arrivalCode === ARRIVED;
    let when: string;
    if (first.arrivalCode === ENTERING) when = "열차가 승강장에 들어오고 있습니다. 탑승을 준비하세요.";
    else if (first.arrivalCode === ARRIVED) when = "열차가 도착했습니다. 탑승을 준비하세요.";
    else if (first.arrivalSeconds > 0 && first.arrivalSeconds <= 60) when = `곧 열차가 도착합니다 (약 ${first.arrivalSeconds}초).`;
    else if (first.arrivalSeconds > 60) when = `약 ${first.arrivalMinutes}분 후 열차가 도착합니다.`;
    else when = first.arrivalMessage ? `열차 운행 정보: ${first.arrivalMessage}.` : "곧 열차가 도착합니다.";

    paragraphs.push(
      paragraph(
        when,
        first.terminalStation && `${first.terminalStation}행 열차입니다.`,
        !atPlatform && first.arrivalDetail && `현재 위치: ${first.arrivalDetail}.`,
        EXPRESS_STATUSES.includes(first.trainStatus) && `${first.trainStatus} 열차입니다.`,
        first.isLastTrain && "막차입니다."
      )
    );

    if (second && second.arrivalMinutes > 0) {
      paragraphs.push(`다음 열차는 약 ${second.arrivalMinutes}분 후 도착합니다.`);
    }
  } else {
    paragraphs.push("실시간 도착 정보가 없습니다. 승강장 안내 전광판을 확인해주세요.");
  }

  paragraphs.push("안전선 안쪽에서 기다려주세요.");
  return compact(paragraphs);
}

function boardingBody({ checkpoint, facility, live, trip }: TemplateInput): string[] {
  const destination = stationLabel(trip?.endStation ?? facility.station.name);

  const approaching = arrivalsToward(live.arrivals, checkpoint.data.direction).find(
    (a) =>
      a.arrivalCode === ENTERING ||
      a.arrivalCode === ARRIVED ||
      (a.arrivalSeconds > 0 && a.arrivalSeconds <= 180)
  );

  let progress: string;
  if (!approaching) {
    progress = "편안히 이동하세요. 도착역이 가까워지면 알려드리겠습니다.";
  } else if (approaching.arrivalCode === ENTERING || approaching.arrivalCode === ARRIVED) {
    progress = `곧 ${destination}에 도착합니다. 하차를 준비해주세요.`;
  } else if (approaching.arrivalMinutes <= 2) {
    progress = `약 ${Math.max(1, approaching.arrivalMinutes)}분 후 ${destination}에 도착합니다. 하차를 준비해주세요.`;
  } else {
    progress = `약 ${approaching.arrivalMinutes}분 후 도착 예정입니다. 편안히 이동하세요.`;
  }

  return compact([
    paragraph(
      "열차에 탑승하셨습니다.",
      `목적지는 ${destination}입니다.`,
      trip && `예상 소요 시간은 약 ${trip.estimatedMinutes}분입니다.`
    ),
    progress,
    paragraph(
      trip?.boardingCars &&
        `내릴 때는 ${carRange(trip.boardingCars.start, trip.boardingCars.end)} 문을 이용하면 엘리베이터와 가깝습니다.`
    ),
  ]);
}

function arrivalPlatformBody({ checkpoint, facility, live, needElevator }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const paragraphs = [`${station}에 도착하셨습니다. 하차를 준비하세요.`];
  const plate = safetyPlatformText(live, needElevator);
  if (plate) paragraphs.push(plate);

  const exitNumber = checkpoint.data.exitNumber;
  const mapping =
    facility.mappings.find((m) => m.connectedExit === exitNumber) ?? facility.mappings[0] ?? null;

  if (mapping) {
    const walkSeconds =
      mapping.walkingTimeSeconds ??
      (mapping.walkingDistanceMeters !== null ? Math.round(mapping.walkingDistanceMeters / 1.2) : null);
    paragraphs.push(
      paragraph(
        mapping.carPositionStart !== null &&
          `${carRange(mapping.carPositionStart, mapping.carPositionEnd)}에서 하차 후 ${mapping.directionFromTrain || "앞쪽"}으로 가세요.`,
        mapping.elevatorLocation &&
          `${mapping.elevatorLocation}에 있는 엘리베이터를 타면 ${mapping.connectedExit}번 출구로 나갈 수 있습니다.`,
        walkSeconds !== null && `걸어서 약 ${Math.max(1, Math.floor(walkSeconds / 60))}분 걸립니다.`
      )
    );
    return compact(paragraphs);
  }

  const elevatorExits = facility.exits
    .filter((e) => !closureFor(e.exitNumber, live))
    .filter((e) => exitElevatorState(e.exitNumber, e, live) === "operating")
    .map((e) => e.exitNumber);

  if (elevatorExits.length > 0) {
    const [primary, ...others] = elevatorExits;
    paragraphs.push(
      paragraph(
        `${primary}번 출구로 가세요. 엘리베이터가 있습니다.`,
        others.length > 0 &&
          `${others
            .slice(0, 2)
            .map((n) => `${n}번`)
            .join(", ")} 출구에도 엘리베이터가 있습니다.`
      )
    );
  } else {
    paragraphs.push("안내 표지판을 따라 출구로 이동하세요.");
  }
  return compact(paragraphs);
}

function chargingBody({ facility, live }: TemplateInput): string[] {
  const station = stationLabel(facility.station.name);
  const recorded = facility.chargers.filter((c) => c.available);

  if (recorded.length === 0 && live.chargers.length === 0) {
    return [`${station}의 휠체어 충전기 정보를 찾지 못했습니다. 역무원에게 문의해주세요.`];
  }

  const paragraphs = [`${station}에 휠체어 급속충전기가 있습니다.`];
  for (const charger of recorded.slice(0, 2)) {
    paragraphs.push(
      paragraph(
        `위치: ${charger.location}${charger.floorLevel ? ` (${floorLabel(charger.floorLevel)})` : ""}.`,
        charger.chargingTimeMinutes !== null && `충전에 약 ${charger.chargingTimeMinutes}분 걸립니다.`
      )
    );
  }
  for (const charger of live.chargers.slice(0, 2)) {
    paragraphs.push(
      paragraph(
        `${charger.location}${charger.floor ? ` (${charger.floor})` : ""}.`,
        `이용료: ${charger.usageFee || "무료"}.`
      )
    );
  }
  return compact(paragraphs);
}
