/**
 * Headways at a single measurement stop: the time between successive
 * vehicles passing it.
 */

import { config } from "@/lib/config";
import { notFound, type NotFoundResult } from "@/lib/errors";
import type { DirectionId, Position, Stop } from "@/lib/types";
import { haversineM } from "./geo";
import { isoDate } from "./gtfs-time";
import {
  computeHeadwayRegularity,
  mean,
  roundOrNull,
  round,
  sampleStdDev,
  type HeadwayRegularity,
} from "./metrics";
import { deduplicatePassages, fallbackTripKey, type StopObservation } from "./passages";
import { preparePositions, type RouteWorkingSet } from "./positions";
import { isWithinServiceHours, type ScheduleContext, type ServiceHours } from "./schedule";
import { DEFAULT_MATCHER_OPTIONS, matchPosition, type MatcherOptions } from "./trip-matching";

export interface HeadwayOptions {
  /** Only count vehicles running in this direction. */
  directionId?: DirectionId | null;
  /** Measure at this stop instead of an automatically chosen one. */
  stopId?: string | null;
  proximityMeters: number;
  /** Gaps longer than this are treated as missing data, not service. */
  maxHeadwayMinutes: number;
  useServiceHours: boolean;
  matcher: MatcherOptions;
}

export const DEFAULT_HEADWAY_OPTIONS: HeadwayOptions = {
  ...config.headways,
  useServiceHours: true,
  matcher: DEFAULT_MATCHER_OPTIONS,
};

export interface HeadwayRecord {
  previousVehicleId: string;
  vehicleId: string;
  previousAt: string;
  at: string;
  headwayMinutes: number;
}

export interface FlaggedGap extends HeadwayRecord {
  reason: "exceeds_max_headway";
}

export interface HeadwayResult {
  routeId: string;
  directionId: DirectionId | null;
  stop: { stopId: string; name: string; lat: number; lon: number };
  stopSelection: "explicit" | "auto";
  proximityMeters: number;
  maxHeadwayMinutes: number;
  timeRange: { start: string; end: string } | null;
  serviceHours: ServiceHours & { applied: boolean };
  headways: HeadwayRecord[];
  flaggedGaps: FlaggedGap[];
  count: number;
  gapsDetected: number;
  avgHeadwayMinutes: number | null;
  minHeadwayMinutes: number | null;
  maxObservedHeadwayMinutes: number | null;
  stdDevMinutes: number | null;
  coefficientOfVariation: number | null;
  regularity: HeadwayRegularity | null;
  vehiclesPassedStop: number;
  uniqueVehicles: number;
  dataQuality: {
    totalPositions: number;
    duplicatesRemoved: number;
    exceptionFiltered: number;
    invalidSkipped: number;
    nearStop: number;
    unknownDirection: number;
  };
}

interface DirectedObservation extends StopObservation {
  directionId: DirectionId | null;
}

/**
 * A stop most trips of the route serve, from the middle of the route:
 * stops reached by at least 80% of the busiest stop's trips, ordered by
 * mean stop sequence, and the one at index ⌊n/2⌋ of that list.
 */
export function findReferenceStop(
  schedule: ScheduleContext,
  routeId: string,
  directionId: DirectionId | null = null
): Stop | null {
  const counts = new Map<string, { count: number; sequenceSum: number }>();
  for (const trip of schedule.tripsForRoute(routeId, directionId)) {
    for (const st of schedule.stopTimesForTrip(trip.tripId)) {
      const entry = counts.get(st.stopId) ?? { count: 0, sequenceSum: 0 };
      entry.count++;
      entry.sequenceSum += st.stopSequence;
      counts.set(st.stopId, entry);
    }
  }
  if (counts.size === 0) return null;

  const maxCount = Math.max(...[...counts.values()].map((e) => e.count));
  const candidates = [...counts.entries()]
    .filter(([, e]) => e.count >= 0.8 * maxCount)
    .map(([stopId, e]) => ({ stopId, meanSequence: e.sequenceSum / e.count }))
    .filter((c) => schedule.stop(c.stopId) !== undefined)
    .sort(
      (a, b) =>
        a.meanSequence - b.meanSequence ||
        (a.stopId < b.stopId ? -1 : a.stopId > b.stopId ? 1 : 0)
    );

  const middle = candidates[Math.floor(candidates.length / 2)];
  return middle ? (schedule.stop(middle.stopId) ?? null) : null;
}

/** Direction of the reported trip, else of the inferred one, else unknown. */
export function resolveDirection(
  position: Position,
  schedule: ScheduleContext,
  matcher: MatcherOptions
): DirectionId | null {
  const reported = schedule.reportedTrip(position);
  if (reported) return reported.directionId;
  return matchPosition(position, schedule, matcher)?.trip.directionId ?? null;
}

/** Most frequent direction; ties go to the lower id and unknown comes last. */
export function majorityDirection(observations: readonly DirectedObservation[]): DirectionId | null {
  const tally = new Map<DirectionId | null, number>();
  for (const o of observations) tally.set(o.directionId, (tally.get(o.directionId) ?? 0) + 1);

  let best: DirectionId | null = null;
  let bestCount = 0;
  for (const dir of [0, 1, null] as const) {
    const n = tally.get(dir) ?? 0;
    if (n > bestCount) {
      best = dir;
      bestCount = n;
    }
  }
  return best;
}

export function computeHeadways(
  ws: RouteWorkingSet,
  options: HeadwayOptions = DEFAULT_HEADWAY_OPTIONS
): HeadwayResult | NotFoundResult {
  const { schedule, routeId } = ws;
  if (!schedule.hasRoute(routeId)) {
    return notFound(routeId, `Route ${routeId} not found in the current schedule`);
  }

  const requestedDirection = options.directionId ?? null;
  let stop: Stop | null;
  if (options.stopId) {
    stop = schedule.stop(options.stopId) ?? null;
    if (!stop) {
      return notFound(routeId, `Stop ${options.stopId} not found`, options.stopId);
    }
  } else {
    stop = findReferenceStop(schedule, routeId, requestedDirection);
    if (!stop) {
      return notFound(routeId, `Could not find a suitable reference stop for route ${routeId}`);
    }
  }

  const prepared = preparePositions(ws);
  const hours = schedule.serviceHours(routeId);

  const near: DirectedObservation[] = [];
  for (const p of prepared.positions) {
    if (options.useServiceHours && !isWithinServiceHours(p.observedAt.getUTCHours(), hours)) {
      continue;
    }
    if (haversineM(p.lat, p.lon, stop.lat, stop.lon) > options.proximityMeters) continue;

    const directionId = resolveDirection(p, schedule, options.matcher);
    if (requestedDirection !== null && directionId !== requestedDirection) continue;

    near.push({
      vehicleId: p.vehicleId,
      tripKey: p.tripId ?? fallbackTripKey(p.vehicleId),
      stopId: stop.stopId,
      observedAt: p.observedAt,
      offsetSeconds: null,
      directionId,
    });
  }

  let passages = deduplicatePassages(near);
  const directionId = requestedDirection ?? majorityDirection(passages);
  if (requestedDirection === null) {
    passages = passages.filter((o) => o.directionId === directionId);
  }

  const headways: HeadwayRecord[] = [];
  const flaggedGaps: FlaggedGap[] = [];
  const validMinutes: number[] = [];
  for (let i = 1; i < passages.length; i++) {
    const prev = passages[i - 1];
    const curr = passages[i];
    if (!prev || !curr) continue;
    if (isoDate(prev.observedAt) !== isoDate(curr.observedAt)) continue;

    const minutes = (curr.observedAt.getTime() - prev.observedAt.getTime()) / 60000;
    const record: HeadwayRecord = {
      previousVehicleId: prev.vehicleId,
      vehicleId: curr.vehicleId,
      previousAt: prev.observedAt.toISOString(),
      at: curr.observedAt.toISOString(),
      headwayMinutes: round(minutes, 2),
    };
    if (minutes > options.maxHeadwayMinutes) {
      flaggedGaps.push({ ...record, reason: "exceeds_max_headway" });
    } else {
      headways.push(record);
      validMinutes.push(minutes);
    }
  }

  const avg = mean(validMinutes);
  const std = sampleStdDev(validMinutes);

  return {
    routeId,
    directionId,
    stop: { stopId: stop.stopId, name: stop.name, lat: stop.lat, lon: stop.lon },
    stopSelection: options.stopId ? "explicit" : "auto",
    proximityMeters: options.proximityMeters,
    maxHeadwayMinutes: options.maxHeadwayMinutes,
    timeRange: ws.window
      ? { start: ws.window.start.toISOString(), end: ws.window.end.toISOString() }
      : null,
    serviceHours: { ...hours, applied: options.useServiceHours },
    headways,
    flaggedGaps,
    count: headways.length,
    gapsDetected: flaggedGaps.length,
    avgHeadwayMinutes: roundOrNull(avg, 2),
    minHeadwayMinutes: validMinutes.length ? round(Math.min(...validMinutes), 2) : null,
    maxObservedHeadwayMinutes: validMinutes.length ? round(Math.max(...validMinutes), 2) : null,
    stdDevMinutes: roundOrNull(std, 2),
    coefficientOfVariation: avg !== null && std !== null && avg > 0 ? round(std / avg, 3) : null,
    regularity: computeHeadwayRegularity(validMinutes.map((m) => m * 60)),
    vehiclesPassedStop: passages.length,
    uniqueVehicles: new Set(passages.map((o) => o.vehicleId)).size,
    dataQuality: {
      totalPositions: prepared.totalPositions,
      duplicatesRemoved: prepared.duplicatesRemoved,
      exceptionFiltered: prepared.exceptionFiltered,
      invalidSkipped: prepared.invalidSkipped,
      nearStop: near.length,
      unknownDirection: near.filter((o) => o.directionId === null).length,
    },
  };
}
