import { defineContract } from "./record.js";

export const busStops = defineContract({
  name: "bus-stops",
  table: "bus_stops",
  naturalKey: ["stop_id"],
  fields: [
    { name: "stop_id", source: "StopID", type: "integer", required: true, rules: { min: 0 } },
    { name: "stop_name", source: ["Name", "StopName"], type: "string", required: true, rules: { maxLength: 200 } },
    { name: "lat", source: "Lat", type: "decimal", required: true, rules: { min: -90, max: 90 } },
    { name: "lon", source: "Lon", type: "decimal", required: true, rules: { min: -180, max: 180 } }
  ]
});

// One row per (stop, route) pair, expanded from each stop's route list.
export const busStopRoutes = defineContract({
  name: "bus-stop-routes",
  table: "bus_stop_routes",
  naturalKey: ["stop_id", "route"],
  fields: [
    { name: "stop_id", source: "StopID", type: "integer", required: true, rules: { min: 0 } },
    { name: "route", source: "Routes", type: "string", required: true, case: "upper", rules: { maxLength: 16 } }
  ]
});

export const DIRECTIONS = ["NORTH", "SOUTH", "EAST", "WEST", "LOOP", "CLOCKWISE", "COUNTERCLOCKWISE"] as const;

export const busPositions = defineContract({
  name: "bus-positions",
  table: "bus_positions",
  naturalKey: ["vehicle_id"],
  imputations: { block_number: "UNASSIGNED" },
  fields: [
    { name: "vehicle_id", source: "VehicleID", type: "integer", required: true, rules: { min: 0 } },
    { name: "lat", source: "Lat", type: "decimal", required: true, rules: { min: -90, max: 90 } },
    { name: "lon", source: "Lon", type: "decimal", required: true, rules: { min: -180, max: 180 } },
    { name: "deviation", source: "Deviation", type: "decimal", required: false },
    { name: "observed_at", source: "DateTime", type: "timestamp", required: true },
    { name: "trip_id", source: "TripID", type: "integer", required: true, rules: { min: 0 } },
    { name: "route_id", source: "RouteID", type: "string", required: true, case: "upper", rules: { maxLength: 16 } },
    { name: "direction_num", source: "DirectionNum", type: "integer", required: false, rules: { min: 0 } },
    {
      name: "direction_text",
      source: "DirectionText",
      type: "string",
      required: false,
      case: "upper",
      rules: { oneOf: DIRECTIONS }
    },
    { name: "trip_headsign", source: "TripHeadsign", type: "string", required: false },
    { name: "trip_start_time", source: "TripStartTime", type: "timestamp", required: false },
    { name: "trip_end_time", source: "TripEndTime", type: "timestamp", required: false },
    { name: "block_number", source: "BlockNumber", type: "string", required: true }
  ]
});

export const contracts = [busStops, busStopRoutes, busPositions];
