/**
 * Matches real-time positions to scheduled trips.
 *
 * Trip ids in the real-time feed frequently differ from the static
 * schedule's, so a reported id is only trusted when it resolves to a trip on
 * the same route. Otherwise the trip is inferred from which scheduled stop
 * the vehicle is near, and when: every candidate trip is scored on its best
 * stop-time inside an asymmetric time window, since buses run late far more
 * often than early.
 */

import { config } from "@/lib/config";
import { GtfsTimeParseError } from "@/lib/errors";
import type { MatchResult, Position, ScheduledTrip } from "@/lib/types";
import { haversineM } from "./geo";
import { scheduledInstantNear } from "./gtfs-time";
import type { ScheduleContext } from "./schedule";

export interface MatcherOptions {
  /** How early (minutes before schedule) a stop-time may still match. */
  earlyWindowMinutes: number;
  /** How late (minutes after schedule) a stop-time may still match. */
  lateWindowMinutes: number;
  maxDistanceMeters: number;
  minConfidence: number;
  /** Accept a same-route reported trip id outright (confidence 1). */
  trustReportedTripId: boolean;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  ...config.matcher,
  trustReportedTripId: true,
};

const ON_TIME_BAND_MINUTES = 2;
const REALISTIC_LATE_MINUTES = 10;
const REALISM_BONUS = 0.1;

interface StopTimeFit {
  /** Observed minus scheduled, minutes. */
  offsetMinutes: number;
  distanceM: number;
  score: number;
}

/** Lower is better. Early arrivals cost more than the same amount of lateness. */
export function timePenalty(offsetMinutes: number, lateWindowMinutes: number): number {
  const abs = Math.abs(offsetMinutes);
  if (abs <= ON_TIME_BAND_MINUTES) return abs / 20;
  if (offsetMinutes < 0) return 0.3 + (abs / lateWindowMinutes) * 0.7;
  return (offsetMinutes / lateWindowMinutes) * 0.5;
}

export function matchConfidence(
  offsetMinutes: number,
  distanceM: number,
  options: Pick<MatcherOptions, "lateWindowMinutes" | "maxDistanceMeters">
): number {
  const timeConfidence = 1 - Math.abs(offsetMinutes) / options.lateWindowMinutes;
  const distanceConfidence = 1 - distanceM / options.maxDistanceMeters;

  let bonus = 0;
  if (offsetMinutes >= -ON_TIME_BAND_MINUTES && offsetMinutes <= REALISTIC_LATE_MINUTES) {
    bonus = REALISM_BONUS;
  } else if (offsetMinutes < -ON_TIME_BAND_MINUTES) {
    bonus = -REALISM_BONUS;
  }

  const confidence = (timeConfidence + distanceConfidence) / 2 + bonus;
  return Math.max(0, Math.min(1, confidence));
}

function bestStopTimeFit(
  position: Position,
  trip: ScheduledTrip,
  schedule: ScheduleContext,
  options: MatcherOptions
): StopTimeFit | null {
  let best: StopTimeFit | null = null;

  for (const st of schedule.stopTimesForTrip(trip.tripId)) {
    let scheduled: Date;
    try {
      scheduled = scheduledInstantNear(st.arrivalTime, position.observedAt);
    } catch (err) {
      if (err instanceof GtfsTimeParseError) continue;
      throw err;
    }

    const offsetMinutes = (position.observedAt.getTime() - scheduled.getTime()) / 60000;
    if (offsetMinutes < -options.earlyWindowMinutes) continue;
    if (offsetMinutes > options.lateWindowMinutes) continue;

    const stop = schedule.stop(st.stopId);
    if (!stop) continue;

    const distanceM = haversineM(position.lat, position.lon, stop.lat, stop.lon);
    if (distanceM > options.maxDistanceMeters) continue;

    const score =
      (timePenalty(offsetMinutes, options.lateWindowMinutes) +
        distanceM / options.maxDistanceMeters) /
      2;
    if (best === null || score < best.score) {
      best = { offsetMinutes, distanceM, score };
    }
  }

  return best;
}

/**
 * Best scheduled trip for a position, or null when nothing on the route
 * reaches the confidence floor.
 */
export function matchPosition(
  position: Position,
  schedule: ScheduleContext,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS
): MatchResult | null {
  const reported = schedule.reportedTrip(position);
  if (reported && options.trustReportedTripId) {
    return { trip: reported, confidence: 1, method: "reported" };
  }

  const candidates = schedule.tripsForRoute(position.routeId, reported?.directionId ?? null);

  let best: MatchResult | null = null;
  for (const trip of candidates) {
    if (schedule.isServiceRemoved(trip, position.observedAt)) continue;

    const fit = bestStopTimeFit(position, trip, schedule, options);
    if (!fit) continue;

    const confidence = matchConfidence(fit.offsetMinutes, fit.distanceM, options);
    if (best === null || confidence > best.confidence) {
      best = { trip, confidence, method: "inferred" };
    }
  }

  if (best === null || best.confidence < options.minConfidence) return null;
  return best;
}
