/**
 * Running speed per vehicle trip, from the straight-line distance between
 * consecutive positions. With 30–60 s sampling the polyline follows the
 * street closely enough.
 */

import { config } from "@/lib/config";
import { notFound, type NotFoundResult } from "@/lib/errors";
import type { Position } from "@/lib/types";
import { haversineM, METERS_PER_MILE, METERS_PER_SECOND_TO_MPH } from "./geo";
import { isoDate } from "./gtfs-time";
import { mean, median, round, roundOrNull } from "./metrics";
import { preparePositions, type RouteWorkingSet } from "./positions";

export interface SpeedOptions {
  /** Shorter groups are partial trips and are ignored. */
  minTripMinutes: number;
  /** Faster groups are GPS errors and are ignored. */
  maxSpeedMph: number;
}

export const DEFAULT_SPEED_OPTIONS: SpeedOptions = { ...config.speed };

export interface TripSpeed {
  vehicleId: string;
  /** Reported trip id, or the UTC date for positions without one. */
  tripKey: string;
  /** UTC date of the observations. */
  serviceDate: string;
  distanceMiles: number;
  distanceKm: number;
  durationMinutes: number;
  speedMph: number;
  speedKmh: number;
  positions: number;
}

export interface SpeedResult {
  routeId: string;
  timeRange: { start: string; end: string } | null;
  avgSpeedMph: number | null;
  avgSpeedKmh: number | null;
  medianSpeedMph: number | null;
  minSpeedMph: number | null;
  maxSpeedMph: number | null;
  tripsAnalyzed: number;
  totalDistanceMiles: number;
  totalDistanceKm: number;
  totalTimeHours: number;
  /** Mean of the feed's own speed field; supplementary. */
  reportedSpeedMph: number | null;
  observationsWithSpeed: number;
  filters: SpeedOptions;
  sampleTrips: TripSpeed[];
}

const SAMPLE_TRIPS = 5;

function groupKey(p: Position): { vehicleId: string; tripKey: string; serviceDate: string } {
  const serviceDate = isoDate(p.observedAt);
  return { vehicleId: p.vehicleId, tripKey: p.tripId ?? serviceDate, serviceDate };
}

/**
 * Positions per (vehicle, trip, UTC date), each group in time order. Trip
 * ids repeat every service day, so runs on different days never merge.
 */
export function groupVehicleTrips(positions: readonly Position[]): Map<string, Position[]> {
  const sorted = [...positions].sort(
    (a, b) =>
      (a.vehicleId < b.vehicleId ? -1 : a.vehicleId > b.vehicleId ? 1 : 0) ||
      a.observedAt.getTime() - b.observedAt.getTime()
  );
  const groups = new Map<string, Position[]>();
  for (const p of sorted) {
    const key = `${p.vehicleId}|${p.tripId ?? ""}|${isoDate(p.observedAt)}`;
    const group = groups.get(key);
    if (group) group.push(p);
    else groups.set(key, [p]);
  }
  return groups;
}

export function pathLengthM(positions: readonly Position[]): number {
  let total = 0;
  for (let i = 1; i < positions.length; i++) {
    const a = positions[i - 1];
    const b = positions[i];
    if (a && b) total += haversineM(a.lat, a.lon, b.lat, b.lon);
  }
  return total;
}

export function computeSpeed(
  ws: RouteWorkingSet,
  options: SpeedOptions = DEFAULT_SPEED_OPTIONS
): SpeedResult | NotFoundResult {
  if (!ws.schedule.hasRoute(ws.routeId)) {
    return notFound(ws.routeId, `Route ${ws.routeId} not found in the current schedule`);
  }

  const { positions } = preparePositions(ws);
  const trips: TripSpeed[] = [];
  let totalDistanceM = 0;
  let totalSeconds = 0;

  for (const group of groupVehicleTrips(positions).values()) {
    const first = group[0];
    const last = group[group.length - 1];
    if (!first || !last || group.length < 2) continue;

    const seconds = (last.observedAt.getTime() - first.observedAt.getTime()) / 1000;
    if (seconds < options.minTripMinutes * 60) continue;

    const distanceM = pathLengthM(group);
    if (distanceM <= 0) continue;

    const mps = distanceM / seconds;
    const speedMph = mps * METERS_PER_SECOND_TO_MPH;
    if (speedMph > options.maxSpeedMph) continue;

    trips.push({
      ...groupKey(first),
      distanceMiles: distanceM / METERS_PER_MILE,
      distanceKm: distanceM / 1000,
      durationMinutes: seconds / 60,
      speedMph,
      speedKmh: mps * 3.6,
      positions: group.length,
    });
    totalDistanceM += distanceM;
    totalSeconds += seconds;
  }

  const reported = positions
    .map((p) => p.speed)
    .filter((s): s is number => s !== null && Number.isFinite(s));
  const reportedMean = mean(reported);
  const speeds = trips.map((t) => t.speedMph);
  const hours = totalSeconds / 3600;

  return {
    routeId: ws.routeId,
    timeRange: ws.window
      ? { start: ws.window.start.toISOString(), end: ws.window.end.toISOString() }
      : null,
    avgSpeedMph: hours > 0 ? round(totalDistanceM / METERS_PER_MILE / hours, 2) : null,
    avgSpeedKmh: hours > 0 ? round(totalDistanceM / 1000 / hours, 2) : null,
    medianSpeedMph: roundOrNull(median(speeds), 2),
    minSpeedMph: speeds.length ? round(Math.min(...speeds), 2) : null,
    maxSpeedMph: speeds.length ? round(Math.max(...speeds), 2) : null,
    tripsAnalyzed: trips.length,
    totalDistanceMiles: round(totalDistanceM / METERS_PER_MILE, 2),
    totalDistanceKm: round(totalDistanceM / 1000, 2),
    totalTimeHours: round(hours, 2),
    reportedSpeedMph:
      reportedMean === null ? null : round(reportedMean * METERS_PER_SECOND_TO_MPH, 2),
    observationsWithSpeed: reported.length,
    filters: { ...options },
    sampleTrips: trips.slice(0, SAMPLE_TRIPS),
  };
}
