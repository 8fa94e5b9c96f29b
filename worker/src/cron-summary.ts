/**
 * Cron: Rolling route summaries
 * Averages the last N days of route_metrics_daily into one
 * route_metrics_summary row per route.
 */

import { logger } from "@/lib/logger";
import type { AnalyticsStore } from "@/lib/store";
import type { DailyRouteMetrics, RouteMetricsSummary } from "@/lib/types";
import { isoDate } from "@/lib/analytics/gtfs-time";
import { mean, roundOrNull } from "@/lib/analytics/metrics";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SummaryOptions {
  days: number;
  now?: Date;
}

function averageOf(
  rows: readonly DailyRouteMetrics[],
  pick: (m: DailyRouteMetrics) => number | null
): number | null {
  const values = rows.map(pick).filter((v): v is number => v !== null);
  return roundOrNull(mean(values), 2);
}

export function summarizeDailyMetrics(
  routeId: string,
  rows: readonly DailyRouteMetrics[],
  range: { days: number; dateStart: string; dateEnd: string },
  lastDataTimestamp: Date | null
): RouteMetricsSummary {
  return {
    routeId,
    daysAnalyzed: range.days,
    dateStart: range.dateStart,
    dateEnd: range.dateEnd,
    otpPercentage: averageOf(rows, (m) => m.otpPercentage),
    earlyPercentage: averageOf(rows, (m) => m.earlyPercentage),
    latePercentage: averageOf(rows, (m) => m.latePercentage),
    avgHeadwayMinutes: averageOf(rows, (m) => m.avgHeadwayMinutes),
    avgSpeedMph: averageOf(rows, (m) => m.avgSpeedMph),
    totalObservations: rows.reduce((sum, m) => sum + m.totalArrivals, 0),
    uniqueVehicles: rows.reduce((sum, m) => sum + m.uniqueVehicles, 0),
    lastDataTimestamp,
  };
}

export async function runRouteSummaries(
  store: AnalyticsStore,
  options: SummaryOptions
): Promise<RouteMetricsSummary[]> {
  const now = options.now ?? new Date();
  const dateEnd = isoDate(now);
  const dateStart = isoDate(new Date(now.getTime() - options.days * DAY_MS));
  logger.info(`[summary] Computing ${options.days}-day rolling summaries (${dateStart}..${dateEnd})`);

  const daily = await store.loadDailyMetrics(dateStart, dateEnd);
  const byRoute = new Map<string, DailyRouteMetrics[]>();
  for (const m of daily) {
    const list = byRoute.get(m.routeId);
    if (list) list.push(m);
    else byRoute.set(m.routeId, [m]);
  }

  const summaries: RouteMetricsSummary[] = [];
  for (const [routeId, rows] of [...byRoute.entries()].sort(([a], [b]) => (a < b ? -1 : 1))) {
    const data = await store.routeDataSummary(routeId);
    const summary = summarizeDailyMetrics(
      routeId,
      rows,
      { days: options.days, dateStart, dateEnd },
      data.lastObservedAt
    );
    summaries.push(summary);
    logger.debug(
      `[summary] ${routeId}: OTP=${summary.otpPercentage ?? "n/a"}% over ${rows.length} days`
    );
  }

  await store.upsertRouteSummaries(summaries);
  logger.info(`[summary] Summary metrics computed for ${summaries.length} routes`);
  return summaries;
}
