import { describe, it, expect } from "vitest";
import { haversineMeters } from "../../trip/geo";
import { compareExitNumbers, findAlternativeRoute } from "../alternative-route";
import { assessExit, classifyStatus, exitElevatorState } from "../live-overlay";
import { elevatorAt, emptyLive, EXIT_12, EXIT_3, GANGNAM, gangnamFacility, makeExit } from "./fixtures";

describe("compareExitNumbers", () => {
  it("orders exit numbers numerically with sub-exits after their parent", () => {
    expect(["10", "2-1", "2", "1"].sort(compareExitNumbers)).toEqual(["1", "2", "2-1", "10"]);
  });
});

describe("exitElevatorState", () => {
  it("prefers live reports over facility records", () => {
    expect(exitElevatorState("3", EXIT_3, emptyLive("강남", { elevators: [elevatorAt("3", false)] }))).toBe("down");
    expect(exitElevatorState("3", EXIT_3, emptyLive("강남"))).toBe("operating");
    expect(exitElevatorState("9", null, emptyLive("강남", { elevators: [elevatorAt("9", true)] }))).toBe("operating");
    expect(exitElevatorState("9", null, emptyLive("강남"))).toBe("unknown");
    expect(exitElevatorState("4", makeExit(1, "4"), emptyLive("강남"))).toBe("none");
  });
});

describe("findAlternativeRoute", () => {
  const elevatorDown = emptyLive("강남", { elevators: [elevatorAt("3", false)] });

  it("breaks distance ties on exit number", () => {
    const facility = gangnamFacility([
      EXIT_3,
      makeExit(1, "10", { hasElevator: true }),
      makeExit(1, "4", { hasElevator: true }),
    ]);
    const assessment = assessExit("3", facility, elevatorDown, true);

    expect(findAlternativeRoute(assessment, facility, elevatorDown, true)).toEqual({
      exitNumber: "4",
      reason: "엘리베이터 점검 중",
      distanceMeters: null,
    });
  });

  it("ranks exits with coordinates before exits without", () => {
    const facility = gangnamFacility([EXIT_3, makeExit(1, "4", { hasElevator: true }), EXIT_12]);
    const assessment = assessExit("3", facility, elevatorDown, true);

    expect(findAlternativeRoute(assessment, facility, elevatorDown, true)?.exitNumber).toBe("12");
  });

  it("measures from the station when the blocked exit has no coordinates", () => {
    const facility = gangnamFacility([makeExit(1, "9"), EXIT_12]);
    const live = emptyLive("강남");
    const assessment = assessExit("9", facility, live, true);

    const route = findAlternativeRoute(assessment, facility, live, true);
    expect(route?.distanceMeters).toBe(
      Math.round(haversineMeters({ lat: GANGNAM.latitude, lon: GANGNAM.longitude }, { lat: 37.4983, lon: 127.029 }))
    );
  });

  it("skips closed exits", () => {
    const live = emptyLive("강남", {
      elevators: [elevatorAt("3", false)],
      closures: [{ location: "12번 출입구", reason: "", alternative: "", startDate: "", endDate: "", exitNumber: "12" }],
    });
    const facility = gangnamFacility([EXIT_3, EXIT_12]);
    const assessment = assessExit("3", facility, live, true);

    expect(findAlternativeRoute(assessment, facility, live, true)).toBeNull();
    expect(classifyStatus(assessment, live)).toBe("경고");
  });

  it("returns null when the exit is usable", () => {
    const facility = gangnamFacility([EXIT_3, EXIT_12]);
    const live = emptyLive("강남");
    const assessment = assessExit("3", facility, live, true);

    expect(assessment.block).toBeNull();
    expect(findAlternativeRoute(assessment, facility, live, true)).toBeNull();
    expect(classifyStatus(assessment, live)).toBe("정상");
  });
});
