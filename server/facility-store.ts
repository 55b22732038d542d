import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
  insertChargingStationSchema,
  insertElevatorExitMappingSchema,
  insertExitSchema,
  insertPlatformEdgeSchema,
  insertPlatformSchema,
  insertStationFacilitySchema,
  insertStationSchema,
  type ChargingStation,
  type ElevatorExitMapping,
  type Exit,
  type Platform,
  type PlatformEdge,
  type Station,
  type StationFacility,
} from "@shared/schema";
import { StationNotFound } from "@core/errors";
import type { FacilityRecord } from "@core/guidance";
import { normalizeStationKey } from "../packages/providers";

/**
 * Read-only facility lookup used by trip assembly and checkpoint guidance.
 * Matching is exact on the normalized station key.
 */
export interface IFacilityStore {
  listStations(): Promise<Station[]>;
  findStation(name: string): Promise<Station | undefined>;
  /** Throws StationNotFound */
  getFacilityRecord(name: string): Promise<FacilityRecord>;
}

// ============================================
// SEED FILE
// ============================================

export const DEFAULT_FACILITY_PATH = fileURLToPath(new URL("./data/facilities.json", import.meta.url));

const edgeSeed = insertPlatformEdgeSchema.omit({ id: true, stationId: true, platformId: true });

const stationSeed = insertStationSchema.omit({ id: true }).extend({
  facility: insertStationFacilitySchema.omit({ id: true, stationId: true }).nullable().default(null),
  exits: z.array(insertExitSchema.omit({ id: true, stationId: true })).default([]),
  platforms: z
    .array(insertPlatformSchema.omit({ id: true, stationId: true }).extend({ edges: z.array(edgeSeed).default([]) }))
    .default([]),
  mappings: z.array(insertElevatorExitMappingSchema.omit({ id: true, stationId: true })).default([]),
  chargers: z.array(insertChargingStationSchema.omit({ id: true, stationId: true })).default([]),
});

const facilitySeedSchema = z.object({ stations: z.array(stationSeed) });

export type FacilitySeed = z.infer<typeof facilitySeedSchema>;
type StationSeed = FacilitySeed["stations"][number];

export function parseFacilitySeed(raw: unknown): FacilitySeed {
  const parsed = facilitySeedSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid facility seed: ${issues}`);
  }
  return parsed.data;
}

export function loadFacilitySeed(path: string = DEFAULT_FACILITY_PATH): FacilitySeed {
  return parseFacilitySeed(JSON.parse(readFileSync(path, "utf-8")));
}

// ============================================
// IN-MEMORY STORE
// ============================================

export class MemFacilityStore implements IFacilityStore {
  private readonly records = new Map<string, FacilityRecord>();
  private nextId = { station: 1, facility: 1, exit: 1, platform: 1, edge: 1, mapping: 1, charger: 1 };

  constructor(seed: FacilitySeed = { stations: [] }) {
    for (const station of seed.stations) {
      this.addStation(station);
    }
  }

  static fromFile(path: string = DEFAULT_FACILITY_PATH): MemFacilityStore {
    return new MemFacilityStore(loadFacilitySeed(path));
  }

  get size(): number {
    return this.records.size;
  }

  async listStations(): Promise<Station[]> {
    return Array.from(this.records.values()).map((r) => r.station);
  }

  async findStation(name: string): Promise<Station | undefined> {
    return this.records.get(normalizeStationKey(name))?.station;
  }

  async getFacilityRecord(name: string): Promise<FacilityRecord> {
    const record = this.records.get(normalizeStationKey(name));
    if (!record) throw new StationNotFound(name);
    return record;
  }

  private addStation(seed: StationSeed): void {
    const key = normalizeStationKey(seed.name);
    if (this.records.has(key)) {
      throw new Error(`Duplicate station in facility seed: ${seed.name}`);
    }

    const station: Station = {
      id: this.nextId.station++,
      name: key,
      line: seed.line,
      stationCode: seed.stationCode ?? null,
      latitude: seed.latitude,
      longitude: seed.longitude,
    };
    const stationId = station.id;

    const facility: StationFacility | null = seed.facility
      ? {
          id: this.nextId.facility++,
          stationId,
          hasElevator: seed.facility.hasElevator ?? false,
          hasWheelchairLift: seed.facility.hasWheelchairLift ?? false,
          hasWheelchairCharger: seed.facility.hasWheelchairCharger ?? false,
          hasNursingRoom: seed.facility.hasNursingRoom ?? false,
          hasMeetingPlace: seed.facility.hasMeetingPlace ?? false,
          hasAutoKiosk: seed.facility.hasAutoKiosk ?? false,
        }
      : null;

    const exits: Exit[] = seed.exits.map((e) => ({
      id: this.nextId.exit++,
      stationId,
      exitNumber: e.exitNumber,
      hasElevator: e.hasElevator ?? false,
      elevatorType: e.elevatorType ?? null,
      latitude: e.latitude ?? null,
      longitude: e.longitude ?? null,
      floorLevel: e.floorLevel ?? null,
      description: e.description ?? null,
      elevatorLocation: e.elevatorLocation ?? null,
      elevatorButtonInfo: e.elevatorButtonInfo ?? null,
      elevatorTimeSeconds: e.elevatorTimeSeconds ?? null,
      gateDirection: e.gateDirection ?? null,
      landmark: e.landmark ?? null,
      hasSlope: e.hasSlope ?? false,
      slopeInfo: e.slopeInfo ?? null,
    }));

    const platforms: Platform[] = [];
    const edges: PlatformEdge[] = [];
    for (const p of seed.platforms) {
      const platform: Platform = {
        id: this.nextId.platform++,
        stationId,
        line: p.line ?? null,
        direction: p.direction ?? null,
        platformType: p.platformType ?? null,
        floorLevel: p.floorLevel ?? null,
      };
      platforms.push(platform);
      for (const edge of p.edges) {
        edges.push({
          id: this.nextId.edge++,
          stationId,
          platformId: platform.id,
          carPosition: edge.carPosition ?? null,
          carNumber: edge.carNumber ?? null,
          doorNumber: edge.doorNumber ?? null,
          gapWidth: edge.gapWidth ?? null,
          heightDiff: edge.heightDiff ?? null,
          platformShape: edge.platformShape ?? null,
        });
      }
    }

    const mappings: ElevatorExitMapping[] = seed.mappings.map((m) => ({
      id: this.nextId.mapping++,
      stationId,
      connectedExit: m.connectedExit,
      carPositionStart: m.carPositionStart ?? null,
      carPositionEnd: m.carPositionEnd ?? null,
      directionFromTrain: m.directionFromTrain ?? null,
      elevatorLocation: m.elevatorLocation ?? null,
      walkingDistanceMeters: m.walkingDistanceMeters ?? null,
      walkingTimeSeconds: m.walkingTimeSeconds ?? null,
      walkingDirection: m.walkingDirection ?? null,
    }));

    const chargers: ChargingStation[] = seed.chargers.map((c) => ({
      id: this.nextId.charger++,
      stationId,
      location: c.location,
      floorLevel: c.floorLevel ?? null,
      chargerCount: c.chargerCount ?? 1,
      available: c.available ?? true,
      chargingTimeMinutes: c.chargingTimeMinutes ?? null,
      latitude: c.latitude ?? null,
      longitude: c.longitude ?? null,
    }));

    this.records.set(key, { station, facility, exits, platforms, edges, mappings, chargers });
  }
}
