import { pgTable, serial, text, integer, boolean, doublePrecision, unique } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================
// FACILITY STORE (read-only for the guidance pipeline)
// ============================================

export const stations = pgTable("stations", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(), // "강남"
  line: text("line").notNull(), // "2호선"
  stationCode: text("station_code"),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
});

export const stationFacilities = pgTable("station_facilities", {
  id: serial("id").primaryKey(),
  stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
  hasElevator: boolean("has_elevator").default(false).notNull(),
  hasWheelchairLift: boolean("has_wheelchair_lift").default(false).notNull(),
  hasWheelchairCharger: boolean("has_wheelchair_charger").default(false).notNull(),
  hasNursingRoom: boolean("has_nursing_room").default(false).notNull(),
  hasMeetingPlace: boolean("has_meeting_place").default(false).notNull(),
  hasAutoKiosk: boolean("has_auto_kiosk").default(false).notNull(),
});

export const exits = pgTable(
  "exits",
  {
    id: serial("id").primaryKey(),
    stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
    exitNumber: text("exit_number").notNull(), // "1", "2-1"
    hasElevator: boolean("has_elevator").default(false).notNull(),
    elevatorType: text("elevator_type"), // "외부E/V", "계단형리프트"
    latitude: doublePrecision("latitude"),
    longitude: doublePrecision("longitude"),
    floorLevel: text("floor_level"), // "B1", "1F"
    description: text("description"),
    elevatorLocation: text("elevator_location"), // "출구 왼쪽 10m"
    elevatorButtonInfo: text("elevator_button_info"), // "지하 2층 버튼을 누르세요"
    elevatorTimeSeconds: integer("elevator_time_seconds"),
    gateDirection: text("gate_direction"),
    landmark: text("landmark"),
    hasSlope: boolean("has_slope").default(false).notNull(),
    slopeInfo: text("slope_info"),
  },
  (table) => ({
    stationExit: unique("station_exit_uc").on(table.stationId, table.exitNumber),
  })
);

export const platforms = pgTable("platforms", {
  id: serial("id").primaryKey(),
  stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
  line: text("line"),
  direction: text("direction"), // "잠실 방면"
  platformType: text("platform_type"), // "섬식", "상대식"
  floorLevel: text("floor_level"), // "B2"
});

export const platformEdges = pgTable("platform_edges", {
  id: serial("id").primaryKey(),
  stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
  platformId: integer("platform_id").references(() => platforms.id, { onDelete: "cascade" }),
  carPosition: text("car_position"), // "본선 성수 방면 7-3"
  carNumber: integer("car_number"), // 1..10
  doorNumber: integer("door_number"), // 1..4
  gapWidth: text("gap_width"), // "넓음", "보통", "좁음"
  heightDiff: text("height_diff"), // "낮음", "보통", "높음"
  platformShape: text("platform_shape"), // "곡선", "직선"
});

export const elevatorExitMappings = pgTable("elevator_exit_mappings", {
  id: serial("id").primaryKey(),
  stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
  connectedExit: text("connected_exit").notNull(),
  carPositionStart: integer("car_position_start"),
  carPositionEnd: integer("car_position_end"),
  directionFromTrain: text("direction_from_train"), // "우측"
  elevatorLocation: text("elevator_location"),
  walkingDistanceMeters: integer("walking_distance_meters"),
  walkingTimeSeconds: integer("walking_time_seconds"),
  walkingDirection: text("walking_direction"),
});

export const chargingStations = pgTable("charging_stations", {
  id: serial("id").primaryKey(),
  stationId: integer("station_id").notNull().references(() => stations.id, { onDelete: "cascade" }),
  location: text("location").notNull(),
  floorLevel: text("floor_level"),
  chargerCount: integer("charger_count").default(1).notNull(),
  available: boolean("available").default(true).notNull(),
  chargingTimeMinutes: integer("charging_time_minutes"),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
});

export const insertStationSchema = createInsertSchema(stations);
export const insertStationFacilitySchema = createInsertSchema(stationFacilities);
export const insertExitSchema = createInsertSchema(exits);
export const insertPlatformSchema = createInsertSchema(platforms);
export const insertPlatformEdgeSchema = createInsertSchema(platformEdges);
export const insertElevatorExitMappingSchema = createInsertSchema(elevatorExitMappings);
export const insertChargingStationSchema = createInsertSchema(chargingStations);

export type Station = typeof stations.$inferSelect;
export type InsertStation = z.infer<typeof insertStationSchema>;
export type StationFacility = typeof stationFacilities.$inferSelect;
export type InsertStationFacility = z.infer<typeof insertStationFacilitySchema>;
export type Exit = typeof exits.$inferSelect;
export type InsertExit = z.infer<typeof insertExitSchema>;
export type Platform = typeof platforms.$inferSelect;
export type InsertPlatform = z.infer<typeof insertPlatformSchema>;
export type PlatformEdge = typeof platformEdges.$inferSelect;
export type InsertPlatformEdge = z.infer<typeof insertPlatformEdgeSchema>;
export type ElevatorExitMapping = typeof elevatorExitMappings.$inferSelect;
export type InsertElevatorExitMapping = z.infer<typeof insertElevatorExitMappingSchema>;
export type ChargingStation = typeof chargingStations.$inferSelect;
export type InsertChargingStation = z.infer<typeof insertChargingStationSchema>;

// ============================================
// API REQUESTS
// ============================================

export const MOBILITY_LEVELS = ["normal", "wheelchair", "walker"] as const;
export type MobilityLevel = (typeof MOBILITY_LEVELS)[number];

export const gpsPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});
export type GpsPoint = z.infer<typeof gpsPointSchema>;

export const userTagsSchema = z.object({
  mobility_level: z.enum(MOBILITY_LEVELS).default("normal"),
  need_elevator: z.boolean().default(false),
  prefer_short: z.boolean().default(false),
  need_charging_info: z.boolean().default(false),
});
export type UserTags = z.infer<typeof userTagsSchema>;

const stationNameField = z.string().trim().min(1).max(50);

export const routeSearchRequestSchema = z.object({
  start_station: stationNameField,
  end_station: stationNameField,
  user_location: gpsPointSchema,
  user_tags: userTagsSchema,
  /** Identifies the rider's device; a new search supersedes the rider's earlier trip */
  rider_id: z.string().trim().min(1).max(64).optional(),
});
export type RouteSearchRequest = z.infer<typeof routeSearchRequestSchema>;

export const checkpointGuideRequestSchema = z.object({
  checkpoint_id: z.number().int().min(0).max(7),
  station_name: stationNameField,
  exit_number: z.string().trim().min(1).max(10).optional(),
  line: z.string().trim().max(20).optional(),
  direction: z.string().trim().max(50).optional(),
  need_elevator: z.boolean().default(false),
  /** When set, trip context (boarding cars, end station, ride time) comes from the session */
  trip_id: z.string().trim().min(1).optional(),
});
export type CheckpointGuideRequest = z.infer<typeof checkpointGuideRequestSchema>;

export const positionUpdateRequestSchema = z.object({
  current_location: gpsPointSchema,
});
export type PositionUpdateRequest = z.infer<typeof positionUpdateRequestSchema>;

export const advanceRequestSchema = z.object({
  signal: z.enum(["timer", "rider"]).default("rider"),
});
export type AdvanceRequest = z.infer<typeof advanceRequestSchema>;
