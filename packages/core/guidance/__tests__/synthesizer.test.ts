/**
 * GUIDANCE SYNTHESIZER TESTS
 *
 * Status classification, alternative routes and the narrative fallback.
 */

import { describe, it, expect, vi, type Mock } from "vitest";
import type { LLMClient } from "../../llm/client";
import type { ScoredPassage } from "../../knowledge/types";
import { haversineMeters } from "../../trip/geo";
import { buildRetrievalQuery, GuidanceSynthesizer } from "../synthesizer";
import { NO_ALTERNATIVE_TEXT } from "../templates";
import {
  elevatorAt,
  emptyLive,
  EXIT_10,
  EXIT_12,
  EXIT_2,
  EXIT_3,
  gangnamFacility,
  makeCheckpoint,
  makeExit,
} from "./fixtures";

const exit3Checkpoint = makeCheckpoint(1, "origin_exit", { exitNumber: "3" });

const exit3Location = { lat: 37.49805, lon: 127.0286275 };

type Generate = (prompt: string) => Promise<string>;

function stubLLM(generate: Generate): LLMClient & { generate: Mock<Generate> } {
  return {
    generate: vi.fn(generate),
    embed: async () => [],
    isAvailable: () => true,
  };
}

const tip: ScoredPassage = {
  passage: {
    id: "exit-elevator-button",
    text: "엘리베이터 안에서는 버튼 옆 점자 표시를 확인하세요.",
    checkpointTypes: ["origin_exit"],
    tags: ["엘리베이터"],
  },
  score: 0.42,
};

const secondTip: ScoredPassage = {
  passage: { id: "gate-wide", text: "넓은 개찰구를 이용하세요.", checkpointTypes: [], tags: [] },
  score: 0.2,
};

describe("GuidanceSynthesizer", () => {
  describe("status", () => {
    it("reports 정상 with no alternative when the exit elevator is operating", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3, EXIT_2]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", true)] }),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("정상");
      expect(result.alternativeRoute).toBeUndefined();
      expect(result.narrative).toBe("template");
      expect(result.checkpointId).toBe(1);
      expect(result.checkpointLabel).toBe("출발역_출구");
      expect(result.text).toBe(
        [
          "강남역 3번 출구에 도착하셨습니다.",
          "엘리베이터가 정상 운행 중입니다. 위치: 3번 출구 왼쪽 10m. 지하 2층 버튼을 누르세요. 약 45초 정도 걸려요.",
          "개찰구를 지나 승강장으로 이동하세요.",
        ].join("\n\n")
      );
    });

    it("uses the facility records when no live rows are available", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남"),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("정상");
      expect(result.text.split("\n\n")[1]).toBe(
        "이 출구에 엘리베이터가 있습니다. 위치: 3번 출구 왼쪽 10m. 지하 2층 버튼을 누르세요. 약 45초 정도 걸려요."
      );
    });

    it("reports 경고 and says no alternative exists when the only elevator is down", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3, EXIT_2]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", false)] }),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("경고");
      expect(result.alternativeRoute).toBeUndefined();
      const paragraphs = result.text.split("\n\n");
      expect(paragraphs[0]).toBe("3번 출구 엘리베이터가 현재 운행하지 않습니다.");
      expect(paragraphs[1]).toBe(NO_ALTERNATIVE_TEXT);
    });

    it("mentions a working wheelchair lift at an exit whose elevator is down", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3, EXIT_2]),
        live: emptyLive("강남", {
          elevators: [elevatorAt("3", false)],
          lifts: [{ name: "휠체어리프트 1호기", exitNumber: "3", operating: true }],
        }),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("경고");
      expect(result.text.split("\n\n").slice(0, 3)).toEqual([
        "3번 출구 엘리베이터가 현재 운행하지 않습니다.",
        "3번 출구 휠체어리프트는 운행 중입니다. 역무원 호출 버튼을 누르면 이용할 수 있습니다.",
        NO_ALTERNATIVE_TEXT,
      ]);
    });

    it("routes to the nearest exit with a working elevator when the exit elevator is down", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3, EXIT_2, EXIT_10, EXIT_12]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", false), elevatorAt("12", true)] }),
        passages: [],
        needElevator: true,
      });

      const distance = Math.round(haversineMeters(exit3Location, { lat: 37.4983, lon: 127.029 }));
      expect(result.status).toBe("경고");
      expect(result.alternativeRoute).toEqual({
        exitNumber: "12",
        reason: "엘리베이터 점검 중",
        distanceMeters: distance,
        elevatorLocation: "12번 출구 앞",
        position: { lat: 37.4983, lon: 127.029 },
      });
      expect(result.text.split("\n\n")[1]).toBe(
        `대신 12번 출구를 이용해주세요. 약 ${distance}m 떨어져 있습니다. 엘리베이터는 12번 출구 앞에 있습니다.`
      );
    });

    it("treats a recorded exit without an elevator as blocked for a rider who needs one", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: makeCheckpoint(1, "origin_exit", { exitNumber: "2" }),
        facility: gangnamFacility([EXIT_3, EXIT_2]),
        live: emptyLive("강남"),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("경고");
      expect(result.alternativeRoute?.exitNumber).toBe("3");
      expect(result.alternativeRoute?.reason).toBe("엘리베이터가 없는 출구");
      expect(result.text.split("\n\n")[0]).toBe("2번 출구에는 엘리베이터가 없습니다.");
    });

    it("reports a closed exit with its end date and the nearest open exit", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3, EXIT_2, EXIT_12]),
        live: emptyLive("강남", {
          closures: [
            {
              location: "3번 출입구",
              reason: "에스컬레이터 공사",
              alternative: "",
              startDate: "2026-10-01",
              endDate: "2026-12-31",
              exitNumber: "3",
            },
          ],
        }),
        passages: [],
        needElevator: false,
      });

      const distance = Math.round(haversineMeters(exit3Location, { lat: 37.49795, lon: 127.0285 }));
      expect(result.status).toBe("경고");
      expect(result.alternativeRoute).toEqual({
        exitNumber: "2",
        reason: "에스컬레이터 공사로 인한 출입구 폐쇄",
        distanceMeters: distance,
        position: { lat: 37.49795, lon: 127.0285 },
        closureEndDate: "2026-12-31",
      });
      expect(result.text).toBe(
        [
          "현재 3번 출구는 에스컬레이터 공사로 이용할 수 없습니다. (2026-12-31까지 폐쇄 예정)",
          `대신 2번 출구를 이용해주세요. 약 ${distance}m 떨어져 있습니다.`,
          "강남역 3번 출구에 도착하셨습니다.",
        ].join("\n\n")
      );
    });

    it("reports 주의 when an elevator is down that this rider does not need", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", false)] }),
        passages: [],
        needElevator: false,
      });

      expect(result.status).toBe("주의");
      expect(result.alternativeRoute).toBeUndefined();
      expect(result.text).toBe("일부 엘리베이터가 점검 중입니다: 3번 출입구.\n\n강남역 3번 출구에 도착하셨습니다.");
    });

    it("carries degraded-data warnings into the result", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: makeCheckpoint(3, "platform_wait"),
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { warnings: ["realtimeStationArrival: upstream unavailable"] }),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("정상");
      expect(result.warnings).toEqual(["realtimeStationArrival: upstream unavailable"]);
      expect(result.text.split("\n\n")[0]).toBe("일부 실시간 정보를 확인하지 못해 시설 정보를 기준으로 안내합니다.");
    });

    it("does not block an exit that is neither recorded nor reported", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: makeCheckpoint(1, "origin_exit", { exitNumber: "7" }),
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남"),
        passages: [],
        needElevator: true,
      });

      expect(result.status).toBe("정상");
      expect(result.text).toBe("강남역 7번 출구에 도착하셨습니다.");
    });
  });

  describe("passages", () => {
    it("appends the top passage as a tip to template guidance", async () => {
      const synthesizer = new GuidanceSynthesizer();
      const result = await synthesizer.synthesize({
        checkpoint: makeCheckpoint(1, "origin_exit", { exitNumber: "7" }),
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남"),
        passages: [tip, secondTip],
        needElevator: true,
      });

      expect(result.passagesUsed).toEqual(["exit-elevator-button"]);
      expect(result.text).toBe(
        "강남역 7번 출구에 도착하셨습니다.\n\n참고: 엘리베이터 안에서는 버튼 옆 점자 표시를 확인하세요."
      );
    });

    it("blends as many passages as configured", async () => {
      const synthesizer = new GuidanceSynthesizer({ maxPassages: 2 });
      const result = await synthesizer.synthesize({
        checkpoint: makeCheckpoint(1, "origin_exit", { exitNumber: "7" }),
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남"),
        passages: [tip, secondTip],
        needElevator: true,
      });

      expect(result.passagesUsed).toEqual(["exit-elevator-button", "gate-wide"]);
    });
  });

  describe("narrative", () => {
    const rewritten =
      "강남역 3번 출구입니다. 왼쪽 10m에 있는 엘리베이터를 타고 지하 2층 버튼을 누르세요. 45초 정도 걸려요.";

    it("uses the generated narrative when it keeps every number", async () => {
      const llm = stubLLM(async () => rewritten);
      const synthesizer = new GuidanceSynthesizer({ llm });
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", true)] }),
        passages: [tip],
        needElevator: true,
      });

      expect(result.narrative).toBe("generated");
      expect(result.text).toBe(rewritten);
      expect(result.passagesUsed).toEqual(["exit-elevator-button"]);
      const prompt = llm.generate.mock.calls[0][0];
      expect(prompt).toContain("- 엘리베이터 안에서는 버튼 옆 점자 표시를 확인하세요.");
    });

    it("keeps alerts outside the narrative", async () => {
      const llm = stubLLM(async () => "강남역 3번 출구입니다.");
      const synthesizer = new GuidanceSynthesizer({ llm });
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", false)] }),
        passages: [],
        needElevator: true,
      });

      expect(result.narrative).toBe("generated");
      expect(result.text).toBe(
        ["3번 출구 엘리베이터가 현재 운행하지 않습니다.", NO_ALTERNATIVE_TEXT, "강남역 3번 출구입니다."].join("\n\n")
      );
    });

    it("falls back to the template when the narrative drops a number", async () => {
      const llm = stubLLM(async () => "엘리베이터를 타고 내려가세요.");
      const synthesizer = new GuidanceSynthesizer({ llm });
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", true)] }),
        passages: [],
        needElevator: true,
      });

      expect(result.narrative).toBe("template");
      expect(result.text.startsWith("강남역 3번 출구에 도착하셨습니다.")).toBe(true);
    });

    it("falls back to the template when the narrative exceeds its budget", async () => {
      const llm = stubLLM(() => new Promise<string>(() => {}));
      const synthesizer = new GuidanceSynthesizer({ llm, narrativeTimeoutMs: 20 });
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남", { elevators: [elevatorAt("3", true)] }),
        passages: [],
        needElevator: true,
      });

      expect(result.narrative).toBe("template");
      expect(result.status).toBe("정상");
      expect(result.text.split("\n\n")[0]).toBe("강남역 3번 출구에 도착하셨습니다.");
    });

    it("falls back to the template when the model rejects", async () => {
      const llm = stubLLM(async () => {
        throw new Error("quota exceeded");
      });
      const synthesizer = new GuidanceSynthesizer({ llm });
      const result = await synthesizer.synthesize({
        checkpoint: exit3Checkpoint,
        facility: gangnamFacility([EXIT_3]),
        live: emptyLive("강남"),
        passages: [],
        needElevator: true,
      });

      expect(result.narrative).toBe("template");
    });
  });
});

describe("buildRetrievalQuery", () => {
  it("collects facility terms for the checkpoint", () => {
    const slopeExit = makeExit(1, "5", { hasElevator: true, hasSlope: true, landmark: "강남역사거리" });
    const query = buildRetrievalQuery(
      makeCheckpoint(1, "origin_exit", { exitNumber: "5" }),
      gangnamFacility([slopeExit]),
      emptyLive("강남"),
      true,
      "강남"
    );

    expect(query).toEqual({
      checkpointType: "origin_exit",
      context: "엘리베이터 출구 경사로 강남역사거리",
      station: "강남",
    });
  });

  it("adds closure terms when the exit is closed", () => {
    const query = buildRetrievalQuery(
      exit3Checkpoint,
      gangnamFacility([EXIT_3]),
      emptyLive("강남", {
        closures: [
          { location: "3번 출입구", reason: "", alternative: "", startDate: "", endDate: "", exitNumber: "3" },
        ],
      }),
      false,
      "강남"
    );

    expect(query.context).toBe("출구 강남대로 폐쇄 공사 우회");
  });
});
