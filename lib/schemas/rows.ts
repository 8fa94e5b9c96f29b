import { z } from "zod";
import type {
  DailyRouteMetrics,
  Position,
  Route,
  ScheduledStopTime,
  ScheduledTrip,
  ServiceExceptionDate,
  Stop,
  StoredRouteSummary,
  VendorPosition,
} from "@/lib/types";

/**
 * Zod schemas for rows read from Postgres.
 *
 * The Neon driver returns bigint and numeric columns as strings, so counts
 * and measures accept a number or a numeric string. NULL is only accepted
 * where the column allows it. Timestamps are selected as epoch milliseconds
 * (`observed_ms`) and turned into Dates here. Each schema transforms the
 * snake_case row into its domain type.
 */

const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());
const count = numeric.pipe(z.number().int().nonnegative());
const measure = numeric;
const nullableMeasure = measure.nullable();
const epochMs = numeric.transform((ms) => new Date(ms));

export const RouteRowSchema = z
  .object({
    route_id: z.string(),
    short_name: z.string().nullable(),
    long_name: z.string().nullable(),
  })
  .transform(
    (r): Route => ({
      routeId: r.route_id,
      shortName: r.short_name ?? r.route_id,
      longName: r.long_name,
    })
  );

export const TripRowSchema = z
  .object({
    trip_id: z.string(),
    route_id: z.string(),
    direction_id: numeric.nullable(),
    service_id: z.string(),
    shape_id: z.string().nullable(),
  })
  .transform(
    (r): ScheduledTrip => ({
      tripId: r.trip_id,
      routeId: r.route_id,
      directionId: r.direction_id === 0 || r.direction_id === 1 ? r.direction_id : null,
      serviceId: r.service_id,
      shapeId: r.shape_id,
    })
  );

export const StopTimeRowSchema = z
  .object({
    trip_id: z.string(),
    stop_id: z.string(),
    stop_sequence: count,
    arrival_time: z.string(),
    departure_time: z.string().nullable(),
  })
  .transform(
    (r): ScheduledStopTime => ({
      tripId: r.trip_id,
      stopId: r.stop_id,
      stopSequence: r.stop_sequence,
      arrivalTime: r.arrival_time,
      departureTime: r.departure_time ?? r.arrival_time,
    })
  );

export const StopRowSchema = z
  .object({
    stop_id: z.string(),
    stop_name: z.string(),
    stop_lat: measure,
    stop_lon: measure,
  })
  .transform(
    (r): Stop => ({ stopId: r.stop_id, name: r.stop_name, lat: r.stop_lat, lon: r.stop_lon })
  );

/** GTFS calendar_dates exception_type: 1 = service added, 2 = removed. */
export const ExceptionDateRowSchema = z
  .object({
    service_id: z.string(),
    date: z.string().regex(/^\d{8}$/),
    exception_type: numeric.pipe(z.union([z.literal(1), z.literal(2)])),
  })
  .transform(
    (r): ServiceExceptionDate => ({
      serviceId: r.service_id,
      date: r.date,
      kind: r.exception_type === 1 ? "added" : "removed",
    })
  );

export const PositionRowSchema = z
  .object({
    vehicle_id: z.string(),
    route_id: z.string(),
    trip_id: z.string().nullable(),
    latitude: measure,
    longitude: measure,
    bearing: nullableMeasure,
    speed: nullableMeasure,
    observed_ms: epochMs,
  })
  .transform(
    (r): Position => ({
      vehicleId: r.vehicle_id,
      routeId: r.route_id,
      tripId: r.trip_id,
      lat: r.latitude,
      lon: r.longitude,
      bearing: r.bearing,
      speed: r.speed,
      observedAt: r.observed_ms,
    })
  );

export const VendorPositionRowSchema = z
  .object({
    vehicle_id: z.string(),
    route_id: z.string(),
    trip_id: z.string().nullable(),
    latitude: measure,
    longitude: measure,
    deviation_minutes: nullableMeasure,
    observed_ms: epochMs,
  })
  .transform(
    (r): VendorPosition => ({
      vehicleId: r.vehicle_id,
      routeId: r.route_id,
      tripId: r.trip_id,
      lat: r.latitude,
      lon: r.longitude,
      deviationMinutes: r.deviation_minutes,
      observedAt: r.observed_ms,
    })
  );

export const RouteDataSummaryRowSchema = z.object({
  position_count: count,
  unique_vehicles: count,
  first_ms: epochMs.nullable(),
  last_ms: epochMs.nullable(),
});

export const DailyMetricsRowSchema = z
  .object({
    route_id: z.string(),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    otp_percentage: nullableMeasure,
    early_percentage: nullableMeasure,
    late_percentage: nullableMeasure,
    avg_headway_minutes: nullableMeasure,
    min_headway_minutes: nullableMeasure,
    max_headway_minutes: nullableMeasure,
    avg_speed_mph: nullableMeasure,
    median_speed_mph: nullableMeasure,
    total_arrivals: count,
    unique_vehicles: count,
    unique_trips: count,
  })
  .transform(
    (r): DailyRouteMetrics => ({
      routeId: r.route_id,
      date: r.date,
      otpPercentage: r.otp_percentage,
      earlyPercentage: r.early_percentage,
      latePercentage: r.late_percentage,
      avgHeadwayMinutes: r.avg_headway_minutes,
      minHeadwayMinutes: r.min_headway_minutes,
      maxHeadwayMinutes: r.max_headway_minutes,
      avgSpeedMph: r.avg_speed_mph,
      medianSpeedMph: r.median_speed_mph,
      totalArrivals: r.total_arrivals,
      uniqueVehicles: r.unique_vehicles,
      uniqueTrips: r.unique_trips,
    })
  );

export const RouteSummaryRowSchema = z
  .object({
    route_id: z.string(),
    days_analyzed: count,
    date_start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    date_end: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    otp_percentage: nullableMeasure,
    early_percentage: nullableMeasure,
    late_percentage: nullableMeasure,
    avg_headway_minutes: nullableMeasure,
    avg_speed_mph: nullableMeasure,
    total_observations: count,
    unique_vehicles: count,
    last_data_ms: epochMs.nullable(),
    computed_ms: epochMs.nullable(),
  })
  .transform(
    (r): StoredRouteSummary => ({
      routeId: r.route_id,
      daysAnalyzed: r.days_analyzed,
      dateStart: r.date_start,
      dateEnd: r.date_end,
      otpPercentage: r.otp_percentage,
      earlyPercentage: r.early_percentage,
      latePercentage: r.late_percentage,
      avgHeadwayMinutes: r.avg_headway_minutes,
      avgSpeedMph: r.avg_speed_mph,
      totalObservations: r.total_observations,
      uniqueVehicles: r.unique_vehicles,
      lastDataTimestamp: r.last_data_ms,
      computedAt: r.computed_ms,
    })
  );
