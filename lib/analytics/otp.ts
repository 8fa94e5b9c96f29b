/**
 * On-time performance: each deduplicated stop passage is compared with its
 * scheduled time and bucketed as early, on time or late.
 *
 * Offsets come from an {@link OtpStrategy}. The schedule-matched strategy is
 * the primary source. The vendor-deviation strategy reuses the feed's own
 * deviation field; its results are labelled supplementary and are never
 * merged with schedule-matched ones.
 */

import { config } from "@/lib/config";
import { GtfsTimeParseError, notFound, type NotFoundResult } from "@/lib/errors";
import type { Position, ScheduledStopTime, ScheduledTrip, Stop } from "@/lib/types";
import { nearest } from "./geo";
import { scheduledInstantNear } from "./gtfs-time";
import { mean, percentage, roundOrNull } from "./metrics";
import { deduplicatePassages, type StopObservation } from "./passages";
import { isInWindow, nearestStopFor, preparePositions, type RouteWorkingSet } from "./positions";
import { DEFAULT_MATCHER_OPTIONS, matchPosition, type MatcherOptions } from "./trip-matching";

export type OtpStatus = "early" | "on_time" | "late";

export interface OtpThresholds {
  /** Offsets below this many seconds are early. */
  earlyThresholdSeconds: number;
  /** Offsets above this many seconds are late. */
  lateThresholdSeconds: number;
}

export interface OtpArrival extends StopObservation {
  stopName: string | null;
  scheduledAt: Date | null;
  offsetSeconds: number;
  method: "fast_path" | "matched" | "vendor";
  confidence: number | null;
}

export interface OtpDataQuality {
  totalPositions: number;
  duplicatesRemoved: number;
  exceptionFiltered: number;
  invalidSkipped: number;
  matched: number;
  unmatched: number;
  /** Matched, but no scheduled stop-time could be paired with the position. */
  skipped: number;
  parseFailures: number;
  fastPathPassages: number;
  passagesBeforeDedup: number;
}

export interface OtpCollection {
  arrivals: OtpArrival[];
  dataQuality: OtpDataQuality;
}

export interface OtpOptions extends OtpThresholds {
  fastPathStopMeters: number;
  matchedStopMeters: number;
  matcher: MatcherOptions;
}

export const DEFAULT_OTP_OPTIONS: OtpOptions = {
  ...config.otp,
  matcher: DEFAULT_MATCHER_OPTIONS,
};

export interface OtpStrategy {
  readonly source: "schedule_matched" | "vendor_deviation";
  readonly supplementary: boolean;
  collect(ws: RouteWorkingSet, options: OtpOptions): OtpCollection;
}

export interface OtpSummary {
  arrivalsAnalyzed: number;
  earlyCount: number;
  onTimeCount: number;
  lateCount: number;
  onTimePercentage: number | null;
  earlyPercentage: number | null;
  latePercentage: number | null;
  avgOffsetSeconds: number | null;
}

export interface OtpResult extends OtpSummary {
  routeId: string;
  source: OtpStrategy["source"];
  supplementary: boolean;
  timeRange: { start: string; end: string } | null;
  thresholds: OtpThresholds & { minConfidence: number };
  uniqueVehicles: number;
  uniqueTrips: number;
  sampleArrivals: Array<OtpArrival & { status: OtpStatus }>;
  dataQuality: OtpDataQuality;
}

const SAMPLE_ARRIVALS = 10;

export function classifyOffset(offsetSeconds: number, thresholds: OtpThresholds): OtpStatus {
  if (offsetSeconds < thresholds.earlyThresholdSeconds) return "early";
  if (offsetSeconds > thresholds.lateThresholdSeconds) return "late";
  return "on_time";
}

export function summarizeArrivals(
  arrivals: readonly Pick<OtpArrival, "offsetSeconds">[],
  thresholds: OtpThresholds
): OtpSummary {
  let earlyCount = 0;
  let lateCount = 0;
  for (const a of arrivals) {
    const status = classifyOffset(a.offsetSeconds, thresholds);
    if (status === "early") earlyCount++;
    else if (status === "late") lateCount++;
  }
  const total = arrivals.length;
  const onTimeCount = total - earlyCount - lateCount;

  return {
    arrivalsAnalyzed: total,
    earlyCount,
    onTimeCount,
    lateCount,
    onTimePercentage: percentage(onTimeCount, total),
    earlyPercentage: percentage(earlyCount, total),
    latePercentage: percentage(lateCount, total),
    avgOffsetSeconds: roundOrNull(
      mean(arrivals.map((a) => a.offsetSeconds)),
      1
    ),
  };
}

type ScheduledOffset =
  | { ok: true; scheduledAt: Date; offsetSeconds: number }
  | { ok: false };

function offsetFromStopTime(st: ScheduledStopTime, observedAt: Date): ScheduledOffset {
  try {
    const scheduledAt = scheduledInstantNear(st.arrivalTime, observedAt);
    return {
      ok: true,
      scheduledAt,
      offsetSeconds: (observedAt.getTime() - scheduledAt.getTime()) / 1000,
    };
  } catch (err) {
    if (err instanceof GtfsTimeParseError) return { ok: false };
    throw err;
  }
}

function emptyQuality(): OtpDataQuality {
  return {
    totalPositions: 0,
    duplicatesRemoved: 0,
    exceptionFiltered: 0,
    invalidSkipped: 0,
    matched: 0,
    unmatched: 0,
    skipped: 0,
    parseFailures: 0,
    fastPathPassages: 0,
    passagesBeforeDedup: 0,
  };
}

interface PairedStop {
  trip: ScheduledTrip;
  stop: Stop;
  stopTime: ScheduledStopTime;
  method: OtpArrival["method"];
  confidence: number;
}

/**
 * Pairs a position with a scheduled stop-time. A same-route reported trip is
 * paired with the nearest stop on its own stop list; everything else goes
 * through the matcher and the nearest route stop.
 */
function pairWithSchedule(
  p: Position,
  ws: RouteWorkingSet,
  options: OtpOptions,
  quality: OtpDataQuality
): PairedStop | null {
  const { schedule } = ws;

  const reported = options.matcher.trustReportedTripId ? schedule.reportedTrip(p) : undefined;
  if (reported) {
    quality.matched++;
    const near = nearest(p.lat, p.lon, schedule.stopsForTrip(reported.tripId), options.fastPathStopMeters);
    const stopTime = near ? schedule.stopTimeFor(reported.tripId, near.item.stopId) : undefined;
    if (!near || !stopTime) {
      quality.skipped++;
      return null;
    }
    return { trip: reported, stop: near.item, stopTime, method: "fast_path", confidence: 1 };
  }

  const match = matchPosition(p, schedule, options.matcher);
  if (!match) {
    quality.unmatched++;
    return null;
  }
  quality.matched++;

  const near = nearestStopFor(ws, p);
  const stopTime =
    near && near.distanceM <= options.matchedStopMeters
      ? schedule.stopTimeFor(match.trip.tripId, near.item.stopId)
      : undefined;
  if (!near || !stopTime) {
    quality.skipped++;
    return null;
  }
  return {
    trip: match.trip,
    stop: near.item,
    stopTime,
    method: "matched",
    confidence: match.confidence,
  };
}

export const scheduleMatchedStrategy: OtpStrategy = {
  source: "schedule_matched",
  supplementary: false,
  collect(ws, options) {
    const prepared = preparePositions(ws);
    const quality: OtpDataQuality = {
      ...emptyQuality(),
      totalPositions: prepared.totalPositions,
      duplicatesRemoved: prepared.duplicatesRemoved,
      exceptionFiltered: prepared.exceptionFiltered,
      invalidSkipped: prepared.invalidSkipped,
    };

    const records: OtpArrival[] = [];
    for (const p of prepared.positions) {
      const paired = pairWithSchedule(p, ws, options, quality);
      if (!paired) continue;

      const offset = offsetFromStopTime(paired.stopTime, p.observedAt);
      if (!offset.ok) {
        quality.parseFailures++;
        continue;
      }
      if (paired.method === "fast_path") quality.fastPathPassages++;

      records.push({
        vehicleId: p.vehicleId,
        tripKey: paired.trip.tripId,
        stopId: paired.stop.stopId,
        stopName: paired.stop.name,
        observedAt: p.observedAt,
        scheduledAt: offset.scheduledAt,
        offsetSeconds: offset.offsetSeconds,
        method: paired.method,
        confidence: paired.confidence,
      });
    }

    quality.passagesBeforeDedup = records.length;
    return { arrivals: deduplicatePassages(records), dataQuality: quality };
  },
};

/**
 * Offsets taken from the vendor feed's deviation field (minutes). Only
 * useful as a cross-check: the vendor may run against a different schedule
 * than the published one.
 */
export const vendorDeviationStrategy: OtpStrategy = {
  source: "vendor_deviation",
  supplementary: true,
  collect(ws) {
    const quality = emptyQuality();
    const arrivals: OtpArrival[] = [];

    for (const v of ws.vendorPositions ?? []) {
      if (v.routeId !== ws.routeId || !isInWindow(v.observedAt, ws.window)) continue;
      quality.totalPositions++;
      if (v.deviationMinutes === null || !Number.isFinite(v.deviationMinutes)) {
        quality.skipped++;
        continue;
      }
      quality.matched++;
      arrivals.push({
        vehicleId: v.vehicleId,
        tripKey: v.tripId ?? `vendor_${v.vehicleId}`,
        stopId: "",
        stopName: null,
        observedAt: v.observedAt,
        scheduledAt: null,
        offsetSeconds: v.deviationMinutes * 60,
        method: "vendor",
        confidence: null,
      });
    }

    arrivals.sort((a, b) => a.observedAt.getTime() - b.observedAt.getTime());
    quality.passagesBeforeDedup = arrivals.length;
    return { arrivals, dataQuality: quality };
  },
};

export function computeOtp(
  ws: RouteWorkingSet,
  options: OtpOptions = DEFAULT_OTP_OPTIONS,
  strategy: OtpStrategy = scheduleMatchedStrategy
): OtpResult | NotFoundResult {
  if (strategy.source === "schedule_matched" && !ws.schedule.hasRoute(ws.routeId)) {
    return notFound(ws.routeId, `Route ${ws.routeId} not found in the current schedule`);
  }

  const { arrivals, dataQuality } = strategy.collect(ws, options);

  return {
    routeId: ws.routeId,
    source: strategy.source,
    supplementary: strategy.supplementary,
    timeRange: ws.window
      ? { start: ws.window.start.toISOString(), end: ws.window.end.toISOString() }
      : null,
    ...summarizeArrivals(arrivals, options),
    thresholds: {
      earlyThresholdSeconds: options.earlyThresholdSeconds,
      lateThresholdSeconds: options.lateThresholdSeconds,
      minConfidence: options.matcher.minConfidence,
    },
    uniqueVehicles: new Set(arrivals.map((a) => a.vehicleId)).size,
    uniqueTrips: new Set(arrivals.map((a) => a.tripKey)).size,
    sampleArrivals: arrivals
      .slice(0, SAMPLE_ARRIVALS)
      .map((a) => ({ ...a, status: classifyOffset(a.offsetSeconds, options) })),
    dataQuality,
  };
}

// ---------------------------------------------------------------------------
// Time-of-day breakdown
// ---------------------------------------------------------------------------

export const TIME_PERIODS = [
  { name: "AM Peak", startHour: 6, endHour: 9 },
  { name: "Midday", startHour: 9, endHour: 15 },
  { name: "PM Peak", startHour: 15, endHour: 19 },
  { name: "Evening", startHour: 19, endHour: 24 },
  { name: "Night", startHour: 0, endHour: 6 },
] as const;

export type TimePeriodName = (typeof TIME_PERIODS)[number]["name"];

export function timePeriodOf(at: Date): TimePeriodName {
  const hour = at.getUTCHours();
  const period = TIME_PERIODS.find((p) => hour >= p.startHour && hour < p.endHour);
  return period ? period.name : "Night";
}

/** OTP per time-of-day period, by the UTC hour each passage was observed. */
export function otpByTimePeriod(
  arrivals: readonly OtpArrival[],
  thresholds: OtpThresholds = DEFAULT_OTP_OPTIONS
): Record<TimePeriodName, OtpSummary> {
  const buckets: Record<TimePeriodName, OtpArrival[]> = {
    "AM Peak": [],
    Midday: [],
    "PM Peak": [],
    Evening: [],
    Night: [],
  };
  for (const a of arrivals) buckets[timePeriodOf(a.observedAt)].push(a);

  return {
    "AM Peak": summarizeArrivals(buckets["AM Peak"], thresholds),
    Midday: summarizeArrivals(buckets.Midday, thresholds),
    "PM Peak": summarizeArrivals(buckets["PM Peak"], thresholds),
    Evening: summarizeArrivals(buckets.Evening, thresholds),
    Night: summarizeArrivals(buckets.Night, thresholds),
  };
}

// ---------------------------------------------------------------------------
// Single stop
// ---------------------------------------------------------------------------

export interface StopOtpResult extends OtpSummary {
  routeId: string;
  stop: { stopId: string; name: string; lat: number; lon: number };
  proximityMeters: number;
  thresholds: OtpThresholds;
  unmatched: number;
}

/**
 * OTP of one route at one stop: positions within the fast-path radius of the
 * stop, matched to a trip, compared with that trip's time at the stop.
 */
export function computeStopOtp(
  ws: RouteWorkingSet,
  stopId: string,
  options: OtpOptions = DEFAULT_OTP_OPTIONS
): StopOtpResult | NotFoundResult {
  const { schedule } = ws;
  if (!schedule.hasRoute(ws.routeId)) {
    return notFound(ws.routeId, `Route ${ws.routeId} not found in the current schedule`);
  }
  const stop = schedule.stop(stopId);
  if (!stop) return notFound(ws.routeId, `Stop ${stopId} not found`, stopId);

  const proximityMeters = options.fastPathStopMeters;
  const records: OtpArrival[] = [];
  let unmatched = 0;

  for (const p of preparePositions(ws).positions) {
    if (nearest(p.lat, p.lon, [stop], proximityMeters) === null) continue;

    const match = matchPosition(p, schedule, options.matcher);
    if (!match) {
      unmatched++;
      continue;
    }
    const stopTime = schedule.stopTimeFor(match.trip.tripId, stopId);
    if (!stopTime) continue;

    const offset = offsetFromStopTime(stopTime, p.observedAt);
    if (!offset.ok) continue;

    records.push({
      vehicleId: p.vehicleId,
      tripKey: match.trip.tripId,
      stopId,
      stopName: stop.name,
      observedAt: p.observedAt,
      scheduledAt: offset.scheduledAt,
      offsetSeconds: offset.offsetSeconds,
      method: match.method === "reported" ? "fast_path" : "matched",
      confidence: match.confidence,
    });
  }

  return {
    routeId: ws.routeId,
    stop: { stopId: stop.stopId, name: stop.name, lat: stop.lat, lon: stop.lon },
    proximityMeters,
    thresholds: {
      earlyThresholdSeconds: options.earlyThresholdSeconds,
      lateThresholdSeconds: options.lateThresholdSeconds,
    },
    unmatched,
    ...summarizeArrivals(deduplicatePassages(records), options),
  };
}
