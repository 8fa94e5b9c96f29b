// Domain types shared by the store, the analytics core and the worker.

export type DirectionId = 0 | 1;

/** One raw vehicle observation from the real-time feed. */
export interface Position {
  vehicleId: string;
  routeId: string;
  /** Trip id as reported by the feed; often absent from the static schedule. */
  tripId: string | null;
  lat: number;
  lon: number;
  bearing: number | null;
  /** Metres per second. */
  speed: number | null;
  observedAt: Date;
}

/** Observation from the vendor feed that carries its own schedule deviation. */
export interface VendorPosition {
  vehicleId: string;
  routeId: string;
  tripId: string | null;
  lat: number;
  lon: number;
  /** Minutes, negative = early. */
  deviationMinutes: number | null;
  observedAt: Date;
}

export interface Route {
  routeId: string;
  shortName: string;
  longName: string | null;
}

export interface ScheduledTrip {
  tripId: string;
  routeId: string;
  directionId: DirectionId | null;
  serviceId: string;
  shapeId: string | null;
}

export interface ScheduledStopTime {
  tripId: string;
  stopId: string;
  stopSequence: number;
  /** "H:MM:SS", H may exceed 23. */
  arrivalTime: string;
  departureTime: string;
}

export interface Stop {
  stopId: string;
  name: string;
  lat: number;
  lon: number;
}

export type ServiceExceptionKind = "added" | "removed";

export interface ServiceExceptionDate {
  /** YYYYMMDD */
  date: string;
  serviceId: string;
  kind: ServiceExceptionKind;
}

/** The slice of the current schedule snapshot a computation needs. */
export interface ScheduleSnapshot {
  routes: Route[];
  trips: ScheduledTrip[];
  stopTimes: ScheduledStopTime[];
  stops: Stop[];
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * Outcome of reconciling a position with the schedule. `reported` means the
 * feed's own trip id resolved on the same route; `inferred` means the trip
 * was found by searching nearby stop-times.
 */
export interface MatchResult {
  trip: ScheduledTrip;
  confidence: number;
  method: "reported" | "inferred";
}

/** Persisted per-route, per-day metrics row. */
export interface DailyRouteMetrics {
  routeId: string;
  /** YYYY-MM-DD */
  date: string;
  otpPercentage: number | null;
  earlyPercentage: number | null;
  latePercentage: number | null;
  avgHeadwayMinutes: number | null;
  minHeadwayMinutes: number | null;
  maxHeadwayMinutes: number | null;
  avgSpeedMph: number | null;
  medianSpeedMph: number | null;
  totalArrivals: number;
  uniqueVehicles: number;
  uniqueTrips: number;
}

export interface RouteMetricsSummary {
  routeId: string;
  daysAnalyzed: number;
  dateStart: string;
  dateEnd: string;
  otpPercentage: number | null;
  earlyPercentage: number | null;
  latePercentage: number | null;
  avgHeadwayMinutes: number | null;
  avgSpeedMph: number | null;
  totalObservations: number;
  uniqueVehicles: number;
  lastDataTimestamp: Date | null;
}

/** A rolling summary as read back, with the time it was written. */
export interface StoredRouteSummary extends RouteMetricsSummary {
  computedAt: Date | null;
}

export interface RouteDataSummary {
  routeId: string;
  positionCount: number;
  uniqueVehicles: number;
  firstObservedAt: Date | null;
  lastObservedAt: Date | null;
}
