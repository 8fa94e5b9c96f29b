import { ExceptionDateIndex } from "@/lib/analytics/service-exceptions";
import { ScheduleContext } from "@/lib/analytics/schedule";
import type {
  Position,
  ScheduledStopTime,
  ScheduledTrip,
  ScheduleSnapshot,
  ServiceExceptionDate,
  Stop,
  VendorPosition,
} from "@/lib/types";

/**
 * Route R1 runs north along longitude 0 through five stops 0.01° apart
 * (about 1.1 km). 0.001° of latitude is about 111.2 m.
 *
 *   T1  dir 0  WK   A 08:00  B 08:10  C 08:20  D 08:30  E 08:40
 *   T2  dir 0  WK   A 08:30  B 08:40  C 08:50  D 09:00  E 09:10
 *   T3  dir 1  WK   E 08:00  D 08:10  C 08:20  B 08:30  A 08:40
 *   T4  dir 0  HOL  same times as T1
 */

export const STOPS: Stop[] = [
  { stopId: "A", name: "Alpha", lat: 0.0, lon: 0 },
  { stopId: "B", name: "Bravo", lat: 0.01, lon: 0 },
  { stopId: "C", name: "Charlie", lat: 0.02, lon: 0 },
  { stopId: "D", name: "Delta", lat: 0.03, lon: 0 },
  { stopId: "E", name: "Echo", lat: 0.04, lon: 0 },
];

export const TRIPS: ScheduledTrip[] = [
  { tripId: "T1", routeId: "R1", directionId: 0, serviceId: "WK", shapeId: null },
  { tripId: "T2", routeId: "R1", directionId: 0, serviceId: "WK", shapeId: null },
  { tripId: "T3", routeId: "R1", directionId: 1, serviceId: "WK", shapeId: null },
  { tripId: "T4", routeId: "R1", directionId: 0, serviceId: "HOL", shapeId: null },
];

function stopTimes(tripId: string, stops: string[], times: string[]): ScheduledStopTime[] {
  return stops.map((stopId, i) => ({
    tripId,
    stopId,
    stopSequence: i + 1,
    arrivalTime: times[i] ?? "",
    departureTime: times[i] ?? "",
  }));
}

const NORTH = ["A", "B", "C", "D", "E"];
const SOUTH = ["E", "D", "C", "B", "A"];
const T1_TIMES = ["08:00:00", "08:10:00", "08:20:00", "08:30:00", "08:40:00"];

export const STOP_TIMES: ScheduledStopTime[] = [
  ...stopTimes("T1", NORTH, T1_TIMES),
  ...stopTimes("T2", NORTH, ["08:30:00", "08:40:00", "08:50:00", "09:00:00", "09:10:00"]),
  ...stopTimes("T3", SOUTH, T1_TIMES),
  ...stopTimes("T4", NORTH, T1_TIMES),
];

export function snapshot(): ScheduleSnapshot {
  return {
    routes: [{ routeId: "R1", shortName: "1", longName: "Alpha - Echo" }],
    trips: [...TRIPS],
    stopTimes: [...STOP_TIMES],
    stops: [...STOPS],
  };
}

/** HOL runs only on 2025-01-06; WK is removed that day when `holiday` is set. */
export function exceptionRecords(holiday = false): ServiceExceptionDate[] {
  const records: ServiceExceptionDate[] = [
    { date: "20250106", serviceId: "HOL", kind: "added" },
    { date: "20250107", serviceId: "HOL", kind: "removed" },
  ];
  if (holiday) records.push({ date: "20250106", serviceId: "WK", kind: "removed" });
  return records;
}

export function context(
  snap: ScheduleSnapshot = snapshot(),
  records: ServiceExceptionDate[] = []
): ScheduleContext {
  return new ScheduleContext(snap, new ExceptionDateIndex(records));
}

export const DAY = "2025-01-06";

/** Instant on the fixture day, "HH:MM[:SS]" UTC. */
export function at(time: string, day: string = DAY): Date {
  const hms = time.length === 5 ? time + ":00" : time;
  return new Date(`${day}T${hms}Z`);
}

export interface PositionInput {
  vehicleId?: string;
  routeId?: string;
  tripId?: string | null;
  lat: number;
  lon?: number;
  speed?: number | null;
  at: Date;
}

export function pos(input: PositionInput): Position {
  return {
    vehicleId: input.vehicleId ?? "v1",
    routeId: input.routeId ?? "R1",
    tripId: input.tripId ?? null,
    lat: input.lat,
    lon: input.lon ?? 0,
    bearing: null,
    speed: input.speed ?? null,
    observedAt: input.at,
  };
}

export function vendorPos(
  vehicleId: string,
  deviationMinutes: number | null,
  observedAt: Date,
  routeId = "R1"
): VendorPosition {
  return {
    vehicleId,
    routeId,
    tripId: null,
    lat: 0,
    lon: 0,
    deviationMinutes,
    observedAt,
  };
}
