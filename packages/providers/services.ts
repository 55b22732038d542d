/**
 * SERVICE CATALOG
 *
 * One descriptor per upstream resource, defined at startup and never mutated.
 * TTL belongs to the resource class, not to the call site:
 * - static inventories: 1 hour
 * - operational flags (exit closures): 10 minutes
 * - live per-station data: 1 minute
 */

import { z } from "zod";
import {
  defineService,
  type CatalogResource,
  type LiveResource,
  type ResourceName,
  type ServiceDescriptor,
} from "./types";
import { exitNumberFromLocation, normalizeStationKey } from "./station-key";

const MINUTE = 60 * 1000;

export const TTL = {
  staticCatalog: 60 * MINUTE,
  operationalFlag: 10 * MINUTE,
  live: 1 * MINUTE,
} as const;

// ============================================
// FIELD SCHEMAS
// ============================================

// Providers mix strings, numbers and nulls for the same field
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null ? "" : String(v).trim()));

const count = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => {
    const n = Number(v ?? 0);
    return Number.isFinite(n) ? n : 0;
  });

const stationName = z.string().trim().min(1);

const flag = (truthy: readonly string[]) =>
  z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => v != null && truthy.includes(String(v).trim()));

// ============================================
// CATALOG RESOURCES
// ============================================

const elevatorOperatingStatus = defineService({
  family: "catalog",
  resource: "SeoulMetroFaciInfo",
  description: "교통약자 이용시설(승강기) 가동현황",
  envelopeKey: "SeoulMetroFaciInfo",
  ttlMs: TTL.staticCatalog,
  firstIndex: 1,
  pageSize: 1000,
  maxTotal: 3000,
  rowSchema: z.object({
    STN_NM: stationName,
    STN_CD: text,
    ELVTR_NM: text,
    ELVTR_SE: text,
    INSTL_PSTN: text,
    USE_YN: text,
    OPR_SEC: text,
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.STN_NM),
    stationName: raw.STN_NM,
    stationCode: raw.STN_CD,
    facilityKind: raw.ELVTR_SE,
    name: raw.ELVTR_NM,
    location: raw.INSTL_PSTN,
    exitNumber: exitNumberFromLocation(raw.INSTL_PSTN),
    operating: raw.USE_YN === "Y" || raw.USE_YN === "사용가능",
    floors: raw.OPR_SEC,
  }),
});

const wheelchairChargers = defineService({
  family: "catalog",
  resource: "getWksnWhclCharge",
  description: "휠체어 급속충전기 현황",
  envelopeKey: "getWksnWhclCharge",
  ttlMs: TTL.staticCatalog,
  firstIndex: 1,
  pageSize: 1000,
  maxTotal: 1000,
  rowSchema: z.object({
    stnNm: stationName,
    fcltNm: text,
    lineNm: text,
    cnnctrSe: text,
    stnFlr: text,
    elctcFacCnt: count,
    dtlPstn: text,
    utztnCrg: text,
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.stnNm),
    stationName: raw.stnNm,
    facilityName: raw.fcltNm,
    line: raw.lineNm,
    connectorType: raw.cnnctrSe,
    floor: raw.stnFlr,
    chargerCount: raw.elctcFacCnt,
    location: raw.dtlPstn,
    usageFee: raw.utztnCrg || "무료",
  }),
});

const wheelchairLifts = defineService({
  family: "catalog",
  resource: "getWksnWhcllift",
  description: "휠체어리프트 현황",
  envelopeKey: "getWksnWhcllift",
  ttlMs: TTL.staticCatalog,
  firstIndex: 1,
  pageSize: 1000,
  maxTotal: 1000,
  rowSchema: z.object({
    stnNm: stationName,
    fcltNm: text,
    lineNm: text,
    vcntEntrcNo: text,
    oprtngSitu: text,
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.stnNm),
    stationName: raw.stnNm,
    facilityName: raw.fcltNm,
    line: raw.lineNm,
    exitNumber: raw.vcntEntrcNo || null,
    operating: (raw.oprtngSitu || "M") === "M",
  }),
});

const safetyPlatforms = defineService({
  family: "catalog",
  resource: "getWksnSafePlfm",
  description: "안전발판 보유현황",
  envelopeKey: "getWksnSafePlfm",
  ttlMs: TTL.staticCatalog,
  firstIndex: 1,
  pageSize: 1000,
  maxTotal: 1000,
  rowSchema: z.object({
    stnNm: stationName,
    fcltNm: text,
    lineNm: text,
    sftyScfldEn: flag(["Y"]),
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.stnNm),
    stationName: raw.stnNm,
    facilityName: raw.fcltNm,
    line: raw.lineNm,
    hasPlatform: raw.sftyScfldEn,
  }),
});

const exitClosures = defineService({
  family: "catalog",
  resource: "TbSubwayLineDetail",
  description: "출입구 임시폐쇄 공사현황",
  envelopeKey: "TbSubwayLineDetail",
  ttlMs: TTL.operationalFlag,
  firstIndex: 1,
  pageSize: 100,
  maxTotal: 100,
  rowSchema: z.object({
    SBWY_STNS_NM: stationName,
    LINE: text,
    CLSG_PLC: text,
    CLSG_RSN: text,
    RPLC_PATH: text,
    BGNG_YMD: text,
    END_YMD: text,
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.SBWY_STNS_NM),
    stationName: raw.SBWY_STNS_NM,
    line: raw.LINE,
    location: raw.CLSG_PLC,
    reason: raw.CLSG_RSN,
    alternative: raw.RPLC_PATH,
    startDate: raw.BGNG_YMD.slice(0, 10),
    endDate: raw.END_YMD.slice(0, 10),
  }),
});

// ============================================
// LIVE RESOURCES
// ============================================

const stationArrivals = defineService({
  family: "live",
  resource: "realtimeStationArrival",
  description: "실시간 역 도착정보",
  envelopeKey: "realtimeArrivalList",
  ttlMs: TTL.live,
  firstIndex: 0,
  pageSize: 10,
  maxTotal: 10,
  rowSchema: z.object({
    statnNm: stationName,
    subwayId: text,
    updnLine: text,
    trainLineNm: text,
    btrainSttus: text,
    barvlDt: count,
    btrainNo: text,
    bstatnNm: text,
    arvlMsg2: text,
    arvlMsg3: text,
    arvlCd: text,
    lstcarAt: flag(["1"]),
  }),
  normalize: (raw) => ({
    station: normalizeStationKey(raw.statnNm),
    stationName: raw.statnNm,
    subwayId: raw.subwayId,
    direction: raw.updnLine,
    trainLineName: raw.trainLineNm,
    trainStatus: raw.btrainSttus || "일반",
    arrivalSeconds: raw.barvlDt,
    arrivalMinutes: Math.floor(raw.barvlDt / 60),
    trainNo: raw.btrainNo,
    terminalStation: raw.bstatnNm,
    arrivalMessage: raw.arvlMsg2,
    arrivalDetail: raw.arvlMsg3,
    arrivalCode: raw.arvlCd || "99",
    isLastTrain: raw.lstcarAt,
  }),
});

// ============================================
// REGISTRY
// ============================================

export const CATALOG_SERVICES: Record<CatalogResource, ServiceDescriptor> = {
  SeoulMetroFaciInfo: elevatorOperatingStatus,
  getWksnWhclCharge: wheelchairChargers,
  getWksnWhcllift: wheelchairLifts,
  getWksnSafePlfm: safetyPlatforms,
  TbSubwayLineDetail: exitClosures,
};

export const LIVE_SERVICES: Record<LiveResource, ServiceDescriptor> = {
  realtimeStationArrival: stationArrivals,
};

export const SERVICES: Record<ResourceName, ServiceDescriptor> = {
  ...CATALOG_SERVICES,
  ...LIVE_SERVICES,
};

export function getService(resource: ResourceName): ServiceDescriptor {
  return SERVICES[resource];
}
