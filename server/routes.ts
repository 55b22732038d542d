import type { Express, Response } from "express";
import type { Server } from "http";
import { ZodError } from "zod";
import {
  advanceRequestSchema,
  checkpointGuideRequestSchema,
  positionUpdateRequestSchema,
  routeSearchRequestSchema,
  type Exit,
} from "@shared/schema";
import { StationNotFound, TransitError } from "@core/errors";
import type { AlternativeRoute, ElevatorStatus, GuidanceResult, TrainArrival } from "@core/guidance";
import type { Logger } from "@core/logger";
import type { Checkpoint } from "@core/trip";
import type { AdvanceReport, PositionReport } from "./checkpoint-guidance";
import type { Services } from "./services";
import type { AssembledTrip, StationElevatorSummary } from "./trip-assembly";

// ============================================
// SERIALIZERS (wire format is snake_case)
// ============================================

function serializeExit(exit: Exit | null) {
  if (!exit) return null;
  return {
    exit_number: exit.exitNumber,
    has_elevator: exit.hasElevator,
    elevator_location: exit.elevatorLocation,
    floor_level: exit.floorLevel,
    latitude: exit.latitude,
    longitude: exit.longitude,
    landmark: exit.landmark,
  };
}

function serializeCheckpoint(checkpoint: Checkpoint) {
  return {
    id: checkpoint.id,
    type: checkpoint.type,
    label: checkpoint.label,
    gps: checkpoint.gps ?? null,
    radius_meters: checkpoint.radiusMeters,
    optional: checkpoint.optional,
    data: {
      station_name: checkpoint.data.stationName,
      exit_number: checkpoint.data.exitNumber,
      line: checkpoint.data.line,
      direction: checkpoint.data.direction,
    },
  };
}

function serializeElevator(elevator: ElevatorStatus) {
  return {
    name: elevator.name,
    location: elevator.location,
    exit_number: elevator.exitNumber,
    operating: elevator.operating,
    floors: elevator.floors,
  };
}

function serializeArrival(arrival: TrainArrival) {
  return {
    direction: arrival.direction,
    train_no: arrival.trainNo,
    terminal_station: arrival.terminalStation,
    arrival_minutes: arrival.arrivalMinutes,
    arrival_seconds: arrival.arrivalSeconds,
    arrival_message: arrival.arrivalMessage,
    current_location: arrival.arrivalDetail,
    train_status: arrival.trainStatus,
    is_last_train: arrival.isLastTrain,
  };
}

function serializeElevatorSummary(summary: StationElevatorSummary) {
  return {
    station: summary.name,
    all_working: summary.allWorking,
    elevators: summary.elevators.map(serializeElevator),
  };
}

function serializeAlternative(route: AlternativeRoute) {
  return {
    exit_number: route.exitNumber,
    reason: route.reason,
    distance_meters: route.distanceMeters,
    elevator_location: route.elevatorLocation ?? null,
    position: route.position ?? null,
    closure_end_date: route.closureEndDate ?? null,
  };
}

export function serializeGuidance(result: GuidanceResult) {
  return {
    checkpoint_id: result.checkpointId,
    checkpoint_type: result.checkpointType,
    checkpoint_label: result.checkpointLabel,
    guide_text: result.text,
    status: result.status,
    ...(result.alternativeRoute ? { alternative_route: serializeAlternative(result.alternativeRoute) } : {}),
    warnings: result.warnings,
    narrative: result.narrative,
    passages_used: result.passagesUsed,
  };
}

export function serializeTrip(trip: AssembledTrip) {
  return {
    trip_id: trip.session.id,
    start_station: trip.startStation,
    end_station: trip.endStation,
    line: trip.line,
    direction: trip.direction,
    distance_meters: trip.distanceMeters,
    estimated_minutes: trip.estimatedMinutes,
    start_exit: serializeExit(trip.startExit),
    end_exit: serializeExit(trip.endExit),
    boarding: {
      start_car: trip.boarding.start,
      end_car: trip.boarding.end,
      reason: trip.boarding.reason,
    },
    walking_guide: trip.walkingGuide
      ? {
          distance_meters: trip.walkingGuide.distanceMeters,
          minutes: trip.walkingGuide.minutes,
          direction: trip.walkingGuide.direction,
          text: trip.walkingGuide.text,
          has_slope: trip.walkingGuide.hasSlope,
          slope_warning: trip.walkingGuide.slopeWarning,
          landmarks: trip.walkingGuide.landmarks,
        }
      : null,
    checkpoints: trip.session.checkpoints.map(serializeCheckpoint),
    current_checkpoint: trip.session.currentIndex,
    elevator_status: {
      start: serializeElevatorSummary(trip.elevatorStatus.start),
      end: serializeElevatorSummary(trip.elevatorStatus.end),
    },
    realtime_train: trip.realtimeTrain
      ? {
          arrival_minutes: trip.realtimeTrain.arrivalMinutes,
          arrival_seconds: trip.realtimeTrain.arrivalSeconds,
          arrival_message: trip.realtimeTrain.arrivalMessage,
          terminal_station: trip.realtimeTrain.terminalStation,
          train_status: trip.realtimeTrain.trainStatus,
          is_last_train: trip.realtimeTrain.isLastTrain,
          current_location: trip.realtimeTrain.currentLocation,
        }
      : null,
    warnings: trip.warnings,
    status: trip.status,
  };
}

function serializePosition(report: PositionReport) {
  switch (report.status) {
    case "checkpoint_reached":
      return {
        status: report.status,
        checkpoint: serializeCheckpoint(report.checkpoint),
        complete: report.complete,
        guidance: serializeGuidance(report.guidance),
      };
    case "approaching":
      return {
        status: report.status,
        next_checkpoint: serializeCheckpoint(report.next),
        distance_meters: report.distanceMeters,
        direction: report.direction,
      };
    case "awaiting_signal":
      return { status: report.status, next_checkpoint: serializeCheckpoint(report.next) };
    case "complete":
      return { status: report.status };
  }
}

function serializeAdvance(report: AdvanceReport) {
  if (report.status === "complete") return { status: report.status };
  return {
    status: report.status,
    trigger: report.trigger,
    checkpoint: serializeCheckpoint(report.checkpoint),
    complete: report.complete,
    guidance: serializeGuidance(report.guidance),
  };
}

// ============================================
// ERRORS
// ============================================

function handleError(res: Response, error: unknown, logger: Logger) {
  if (error instanceof ZodError) {
    return res.status(400).json({
      error: "invalid_request",
      details: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  if (error instanceof StationNotFound) {
    return res.status(404).json({ error: "station_not_found", message: error.message });
  }
  if (error instanceof TransitError) {
    return res.status(error.httpStatus).json({ error: error.code.toLowerCase(), message: error.message });
  }
  logger.error("Unhandled request error", {
    error: error instanceof Error ? error.message : String(error),
  });
  return res.status(500).json({ error: "internal_error" });
}

// ============================================
// ROUTES
// ============================================

export async function registerRoutes(httpServer: Server, app: Express, services: Services): Promise<Server> {
  const logger = services.logger.child("routes");

  app.get("/api/health", async (_req, res) => {
    try {
      const stations = await services.facilities.listStations();
      res.json({
        status: "ok",
        stations: stations.length,
        passages: services.index.size,
        embedder: services.index.embedderName,
        narrative: services.llm.isAvailable(),
        cache: services.cache.stats(),
        active_trips: services.sessions.size,
      });
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  // ============ ROUTE SEARCH ============

  app.post("/api/route/search", async (req, res) => {
    try {
      const request = routeSearchRequestSchema.parse(req.body);
      const trip = await services.trips.assemble(request);
      res.json(serializeTrip(trip));
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  app.get("/api/route/stations", async (_req, res) => {
    try {
      const stations = await services.facilities.listStations();
      res.json({
        stations: stations.map((s) => ({
          name: s.name,
          line: s.line,
          latitude: s.latitude,
          longitude: s.longitude,
        })),
      });
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  // ============ CHECKPOINT GUIDANCE ============

  app.post("/api/checkpoint/guide", async (req, res) => {
    try {
      const request = checkpointGuideRequestSchema.parse(req.body);
      const result = await services.guidance.guide(request);
      res.json(serializeGuidance(result));
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  app.get("/api/checkpoint/realtime/:station", async (req, res) => {
    try {
      const info = await services.guidance.realtime(req.params.station);
      res.json({
        station: info.station,
        elevators: info.live.elevators.map(serializeElevator),
        exit_closures: info.live.closures.map((c) => ({
          location: c.location,
          exit_number: c.exitNumber,
          reason: c.reason,
          alternative: c.alternative,
          start_date: c.startDate,
          end_date: c.endDate,
        })),
        chargers: info.live.chargers.map((c) => ({
          location: c.location,
          floor: c.floor,
          usage_fee: c.usageFee,
          charger_count: c.chargerCount,
        })),
        train_arrivals: info.live.arrivals.map(serializeArrival),
        warnings: info.live.warnings,
      });
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  // ============ TRIP PROGRESS ============

  app.post("/api/trips/:id/position", async (req, res) => {
    try {
      const request = positionUpdateRequestSchema.parse(req.body);
      const report = await services.guidance.reportPosition(req.params.id, request.current_location);
      res.json(serializePosition(report));
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  app.post("/api/trips/:id/advance", async (req, res) => {
    try {
      const request = advanceRequestSchema.parse(req.body ?? {});
      const report = await services.guidance.advance(req.params.id, request.signal);
      res.json(serializeAdvance(report));
    } catch (error) {
      handleError(res, error, logger);
    }
  });

  return httpServer;
}
