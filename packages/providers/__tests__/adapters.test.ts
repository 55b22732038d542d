/**
 * UPSTREAM ADAPTER TESTS
 *
 * Request construction and envelope parsing for both provider families.
 */

import { describe, it, expect, vi } from "vitest";
import { MalformedEnvelope, UpstreamRejected } from "@core/errors";
import { SeoulCatalogAdapter, sweepPages } from "../adapters/catalog";
import { SeoulLiveAdapter } from "../adapters/live";
import { getService } from "../services";
import type { CatalogRequestParams, NormalizedRow, ParsedEnvelope, ServiceDescriptor } from "../types";

const catalogEndpoint = { baseUrl: "http://catalog.test/", credential: "test-secret", timeoutMs: 10000 };
const liveEndpoint = { baseUrl: "http://live.test/api/subway", credential: "test-secret", timeoutMs: 10000 };

const elevatorRow = {
  STN_NM: "강남(2)",
  STN_CD: "222",
  ELVTR_NM: "엘리베이터 1호기",
  ELVTR_SE: "EV",
  INSTL_PSTN: "3번 출입구 앞",
  USE_YN: "사용가능",
  OPR_SEC: "B1-1F",
};

describe("Catalog adapter", () => {
  const adapter = new SeoulCatalogAdapter(catalogEndpoint);
  const descriptor = getService("SeoulMetroFaciInfo");

  it("encodes the index range as positional path segments", () => {
    const request = adapter.buildRequest(descriptor, { start: 1, end: 1000 });
    expect(request.url).toBe("http://catalog.test/test-secret/json/SeoulMetroFaciInfo/1/1000/");
    expect(request.redactedUrl).toBe("http://catalog.test/****/json/SeoulMetroFaciInfo/1/1000/");
    expect(request.timeoutMs).toBe(10000);
  });

  it("appends encoded optional positional parameters", () => {
    const request = adapter.buildRequest(getService("getWksnWhcllift"), {
      start: 1,
      end: 5,
      positional: ["강남"],
    });
    expect(request.url).toBe("http://catalog.test/test-secret/json/getWksnWhcllift/1/5/%EA%B0%95%EB%82%A8");
  });

  it("normalizes rows of an INFO-000 envelope", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      SeoulMetroFaciInfo: {
        list_total_count: 1,
        RESULT: { CODE: "INFO-000", MESSAGE: "정상 처리되었습니다" },
        row: [elevatorRow],
      },
    });

    expect(parsed.totalCount).toBe(1);
    expect(parsed.rows).toHaveLength(1);
    expect(parsed.rows[0]).toMatchObject({
      station: "강남",
      stationName: "강남(2)",
      facilityKind: "EV",
      exitNumber: "3",
      operating: true,
      floors: "B1-1F",
    });
  });

  it("treats a single-object row as a one-row list", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      SeoulMetroFaciInfo: { list_total_count: "1", RESULT: { CODE: "INFO-000" }, row: elevatorRow },
    });
    expect(parsed.rows).toHaveLength(1);
    expect(parsed.totalCount).toBe(1);
  });

  it("returns zero rows for INFO-200 (no data)", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      SeoulMetroFaciInfo: { list_total_count: 0, RESULT: { CODE: "INFO-200", MESSAGE: "해당하는 데이터가 없습니다" } },
    });
    expect(parsed.rows).toEqual([]);
  });

  it("returns zero rows for a top-level INFO-200", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      RESULT: { CODE: "INFO-200", MESSAGE: "해당하는 데이터가 없습니다" },
    });
    expect(parsed.rows).toEqual([]);
  });

  it("rejects a top-level provider error such as an invalid key", () => {
    const parse = () =>
      adapter.parseEnvelope(descriptor, { RESULT: { CODE: "INFO-100", MESSAGE: "인증키가 유효하지 않습니다" } });
    expect(parse).toThrow(UpstreamRejected);
    try {
      parse();
    } catch (error) {
      expect(error).toBeInstanceOf(UpstreamRejected);
      if (error instanceof UpstreamRejected) {
        expect(error.resultCode).toBe("INFO-100");
        expect(error.httpStatus).toBe(502);
      }
    }
  });

  it("rejects any code outside the allow-list", () => {
    expect(() =>
      adapter.parseEnvelope(descriptor, {
        SeoulMetroFaciInfo: { RESULT: { CODE: "ERROR-336", MESSAGE: "요청 범위 초과" }, row: [] },
      })
    ).toThrow(UpstreamRejected);
  });

  it("fails closed when the result code object is missing", () => {
    expect(() => adapter.parseEnvelope(descriptor, { SeoulMetroFaciInfo: { row: [elevatorRow] } })).toThrow(
      MalformedEnvelope
    );
  });

  it("fails closed when a row does not match its schema", () => {
    const { STN_NM: _omitted, ...withoutStation } = elevatorRow;
    expect(() =>
      adapter.parseEnvelope(descriptor, {
        SeoulMetroFaciInfo: { RESULT: { CODE: "INFO-000" }, row: [elevatorRow, withoutStation] },
      })
    ).toThrow(MalformedEnvelope);
  });

  it("fails closed on a top-level success code without the resource section", () => {
    expect(() => adapter.parseEnvelope(descriptor, { RESULT: { CODE: "INFO-000" } })).toThrow(MalformedEnvelope);
  });

  it("fails closed when rows are reported but the row list is missing", () => {
    expect(() =>
      adapter.parseEnvelope(descriptor, {
        SeoulMetroFaciInfo: { list_total_count: 2500, RESULT: { CODE: "INFO-000" } },
      })
    ).toThrow(MalformedEnvelope);
    expect(
      adapter.parseEnvelope(descriptor, { SeoulMetroFaciInfo: { list_total_count: 0, RESULT: { CODE: "INFO-000" } } })
    ).toEqual({ rows: [], totalCount: 0 });
  });

  it("fails closed on a non-object body or a missing envelope", () => {
    expect(() => adapter.parseEnvelope(descriptor, "<html>")).toThrow(MalformedEnvelope);
    expect(() => adapter.parseEnvelope(descriptor, { other: {} })).toThrow(MalformedEnvelope);
  });
});

describe("Live adapter", () => {
  const adapter = new SeoulLiveAdapter(liveEndpoint);
  const descriptor = getService("realtimeStationArrival");

  it("encodes the normalized station key and caps the timeout", () => {
    const request = adapter.buildRequest(descriptor, { key: " 강남역 " });
    expect(request.url).toBe(
      "http://live.test/api/subway/test-secret/json/realtimeStationArrival/0/10/%EA%B0%95%EB%82%A8"
    );
    expect(request.redactedUrl).toBe(
      "http://live.test/api/subway/****/json/realtimeStationArrival/0/10/%EA%B0%95%EB%82%A8"
    );
    expect(request.timeoutMs).toBe(5000);
  });

  it("normalizes the rows of the arrival list", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      errorMessage: { status: 200, code: "INFO-000" },
      realtimeArrivalList: [
        {
          statnNm: "강남",
          subwayId: "1002",
          updnLine: "내선",
          trainLineNm: "성수행 - 역삼방면",
          btrainSttus: "",
          barvlDt: "150",
          btrainNo: "2231",
          bstatnNm: "성수",
          arvlMsg2: "전역 출발",
          arvlMsg3: "교대",
          arvlCd: "3",
          lstcarAt: "0",
        },
      ],
    });

    expect(parsed.rows).toHaveLength(1);
    expect(parsed.rows[0]).toMatchObject({
      station: "강남",
      direction: "내선",
      trainStatus: "일반",
      arrivalSeconds: 150,
      arrivalMinutes: 2,
      arrivalMessage: "전역 출발",
      isLastTrain: false,
    });
  });

  it("treats an error object in place of the list as zero rows", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      realtimeArrivalList: { status: 500, code: "INFO-200", message: "해당하는 데이터가 없습니다." },
    });
    expect(parsed.rows).toEqual([]);
  });

  it("treats an envelope with only an errorMessage as zero rows", () => {
    const parsed = adapter.parseEnvelope(descriptor, {
      errorMessage: { status: 500, code: "INFO-200", message: "해당하는 데이터가 없습니다." },
    });
    expect(parsed.rows).toEqual([]);
  });

  it("fails closed on a scalar list or a non-object body", () => {
    expect(() => adapter.parseEnvelope(descriptor, { realtimeArrivalList: "none" })).toThrow(MalformedEnvelope);
    expect(() => adapter.parseEnvelope(descriptor, null)).toThrow(MalformedEnvelope);
  });
});

describe("Pagination sweep", () => {
  const base = getService("getWksnWhcllift");
  const descriptor: ServiceDescriptor = { ...base, pageSize: 2, maxTotal: 10 };

  const rowsOf = (count: number, offset: number): NormalizedRow[] =>
    Array.from({ length: count }, (_, i) => ({ station: `역${offset + i}` }));

  it("stops on the first short page and concatenates in order", async () => {
    const sizes = [2, 2, 1];
    let call = 0;
    const fetchPage = vi.fn(async (_range: CatalogRequestParams): Promise<ParsedEnvelope> => {
      const page = { rows: rowsOf(sizes[call] ?? 0, call * 2) };
      call++;
      return page;
    });

    const rows = await sweepPages(descriptor, fetchPage);

    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage.mock.calls.map(([range]) => [range.start, range.end])).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
    expect(rows.map((r) => r.station)).toEqual(["역0", "역1", "역2", "역3", "역4"]);
  });

  it("stops at the configured maximum total", async () => {
    const capped: ServiceDescriptor = { ...base, pageSize: 2, maxTotal: 4 };
    const fetchPage = vi.fn(async (_range: CatalogRequestParams): Promise<ParsedEnvelope> => ({ rows: rowsOf(2, 0) }));

    const rows = await sweepPages(capped, fetchPage);

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(rows).toHaveLength(4);
  });

  it("stops when the provider-reported total is reached", async () => {
    const fetchPage = vi.fn(async (_range: CatalogRequestParams): Promise<ParsedEnvelope> => ({ rows: rowsOf(2, 0), totalCount: 4 }));

    const rows = await sweepPages(descriptor, fetchPage);

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(rows).toHaveLength(4);
  });

  it("passes positional parameters to every page", async () => {
    const fetchPage = vi.fn(async (_range: CatalogRequestParams): Promise<ParsedEnvelope> => ({ rows: [] }));

    await sweepPages(descriptor, fetchPage, ["강남"]);

    expect(fetchPage).toHaveBeenCalledWith({ start: 1, end: 2, positional: ["강남"] });
  });
});
