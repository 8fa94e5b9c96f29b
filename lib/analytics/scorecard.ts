/**
 * Network views over the stored metrics: the all-routes scorecard from the
 * rolling summaries, and per-route trends from the daily rows. Neither reads
 * positions.
 */

import type { DailyRouteMetrics, Route, StoredRouteSummary } from "@/lib/types";
import { mean, performanceGrade, roundOrNull, type PerformanceGrade } from "./metrics";

export interface ScorecardEntry {
  routeId: string;
  shortName: string;
  longName: string | null;
  otpPercentage: number | null;
  avgHeadwayMinutes: number | null;
  avgSpeedMph: number | null;
  grade: PerformanceGrade;
  totalObservations: number;
  lastDataTimestamp: Date | null;
  computedAt: Date | null;
}

/**
 * One entry per current route, best OTP first. Routes without a summary are
 * listed last with grade N/A; summaries of routes no longer in the schedule
 * are dropped.
 */
export function buildScorecard(
  routes: readonly Route[],
  summaries: readonly StoredRouteSummary[]
): ScorecardEntry[] {
  const byRoute = new Map(summaries.map((s) => [s.routeId, s]));

  const entries = routes.map((route): ScorecardEntry => {
    const s = byRoute.get(route.routeId);
    return {
      routeId: route.routeId,
      shortName: route.shortName,
      longName: route.longName,
      otpPercentage: s?.otpPercentage ?? null,
      avgHeadwayMinutes: s?.avgHeadwayMinutes ?? null,
      avgSpeedMph: s?.avgSpeedMph ?? null,
      grade: performanceGrade(s?.otpPercentage ?? null),
      totalObservations: s?.totalObservations ?? 0,
      lastDataTimestamp: s?.lastDataTimestamp ?? null,
      computedAt: s?.computedAt ?? null,
    };
  });

  return entries.sort((a, b) => {
    if (a.otpPercentage !== b.otpPercentage) {
      if (a.otpPercentage === null) return 1;
      if (b.otpPercentage === null) return -1;
      return b.otpPercentage - a.otpPercentage;
    }
    return a.routeId < b.routeId ? -1 : a.routeId > b.routeId ? 1 : 0;
  });
}

// ---------------------------------------------------------------------------
// Trends
// ---------------------------------------------------------------------------

export type TrendMetric = "otp" | "headway" | "speed";
export type TrendDirection = "improving" | "declining" | "stable" | "unknown";

export interface TrendPoint {
  date: string;
  value: number;
}

export interface RouteTrend {
  routeId: string;
  metric: TrendMetric;
  days: number;
  dateStart: string;
  dateEnd: string;
  timeSeries: TrendPoint[];
  avg: number | null;
  trend: TrendDirection;
}

/** Relative change between the two halves below which a trend is stable. */
export const STABLE_TREND_FRACTION = 0.05;

const METRIC_VALUE: Record<TrendMetric, (m: DailyRouteMetrics) => number | null> = {
  otp: (m) => m.otpPercentage,
  headway: (m) => m.avgHeadwayMinutes,
  speed: (m) => m.avgSpeedMph,
};

/**
 * Compares the mean of the older half of the series with the newer half
 * (the middle point of an odd series is in neither). Falling headways and
 * rising OTP or speed count as improving.
 */
export function trendDirection(metric: TrendMetric, values: readonly number[]): TrendDirection {
  const half = Math.floor(values.length / 2);
  const older = mean(values.slice(0, half));
  const newer = mean(values.slice(values.length - half));
  if (older === null || newer === null) return "unknown";

  const change = newer - older;
  if (Math.abs(change) <= STABLE_TREND_FRACTION * Math.abs(older)) return "stable";
  const better = metric === "headway" ? change < 0 : change > 0;
  return better ? "improving" : "declining";
}

/** Daily values of one metric, oldest first; days without a value are left out. */
export function buildRouteTrend(
  routeId: string,
  metric: TrendMetric,
  rows: readonly DailyRouteMetrics[],
  range: { days: number; dateStart: string; dateEnd: string }
): RouteTrend {
  const pick = METRIC_VALUE[metric];
  const timeSeries: TrendPoint[] = [];
  for (const m of [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))) {
    if (m.routeId !== routeId) continue;
    const value = pick(m);
    if (value !== null) timeSeries.push({ date: m.date, value });
  }
  const values = timeSeries.map((p) => p.value);

  return {
    routeId,
    metric,
    ...range,
    timeSeries,
    avg: roundOrNull(mean(values), 2),
    trend: trendDirection(metric, values),
  };
}
