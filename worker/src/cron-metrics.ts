/**
 * Cron: Daily route metrics
 * Computes one route_metrics_daily row per (route, UTC day) for the last N
 * days with the batch pipeline, then refreshes the rolling summaries over
 * SUMMARY_WINDOW_DAYS, whatever days the run itself covered.
 *
 * The schedule snapshot and exception index are loaded once per run;
 * positions are loaded one day at a time.
 */

import { config } from "@/lib/config";
import { isNotFound } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { AnalyticsStore } from "@/lib/store";
import type { DailyRouteMetrics } from "@/lib/types";
import { runBatch, type RouteBatchResult } from "@/lib/analytics/batch";
import { dayWindow, lastNDays } from "@/lib/analytics/date-filter";
import { ScheduleContext } from "@/lib/analytics/schedule";
import { ExceptionDateIndex } from "@/lib/analytics/service-exceptions";
import { runRouteSummaries } from "./cron-summary.js";

export interface DailyMetricsOptions {
  /** Explicit UTC dates (YYYY-MM-DD); overrides `days`. */
  dates?: string[];
  days?: number;
  routeId?: string;
  minPositions?: number;
  /** Window of the rolling summaries refreshed after the run. */
  summaryDays?: number;
  now?: Date;
  signal?: AbortSignal;
}

export interface DailyMetricsReport {
  dates: string[];
  routes: number;
  computed: number;
  skipped: number;
  aborted: boolean;
}

export function toDailyMetrics(date: string, r: RouteBatchResult): DailyRouteMetrics {
  const otp = isNotFound(r.otp) ? null : r.otp;
  const headways = isNotFound(r.headways) ? null : r.headways;
  const speed = isNotFound(r.speed) ? null : r.speed;

  return {
    routeId: r.routeId,
    date,
    otpPercentage: otp?.onTimePercentage ?? null,
    earlyPercentage: otp?.earlyPercentage ?? null,
    latePercentage: otp?.latePercentage ?? null,
    avgHeadwayMinutes: headways?.avgHeadwayMinutes ?? null,
    minHeadwayMinutes: headways?.minHeadwayMinutes ?? null,
    maxHeadwayMinutes: headways?.maxObservedHeadwayMinutes ?? null,
    avgSpeedMph: speed?.avgSpeedMph ?? null,
    medianSpeedMph: speed?.medianSpeedMph ?? null,
    totalArrivals: otp?.arrivalsAnalyzed ?? 0,
    uniqueVehicles: r.uniqueVehicles,
    uniqueTrips: r.uniqueTrips,
  };
}

export async function runDailyMetrics(
  store: AnalyticsStore,
  options: DailyMetricsOptions = {}
): Promise<DailyMetricsReport> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const dates = options.dates ?? lastNDays(options.days ?? config.daily.lookbackDays, now);
  const minPositions = options.minPositions ?? config.daily.minPositions;

  const routes = await store.listRoutes();
  let routeIds = routes.map((r) => r.routeId);
  if (options.routeId) {
    if (!routeIds.includes(options.routeId)) {
      logger.error(`[daily] Route ${options.routeId} not found`);
      return { dates, routes: 0, computed: 0, skipped: 0, aborted: false };
    }
    routeIds = [options.routeId];
  }

  logger.info(`[daily] Processing ${routeIds.length} routes for ${dates.length} days`);

  const [snapshot, exceptionRows] = await Promise.all([
    store.loadSchedule(options.routeId ? routeIds : undefined),
    store.loadExceptionDates(),
  ]);
  const exceptions = new ExceptionDateIndex(exceptionRows);
  if (exceptions.size > 0) {
    const exceptionDates = exceptions.dates();
    logger.info(
      `[daily] Excluding trips on ${exceptions.size} removed service-dates ` +
        `(${exceptionDates.length} dates, e.g. ${exceptionDates.slice(0, 10).join(", ")})`
    );
  }
  const schedule = new ScheduleContext(snapshot, exceptions);

  let computed = 0;
  let skipped = 0;
  let aborted = false;

  for (const date of dates) {
    if (options.signal?.aborted) {
      aborted = true;
      break;
    }

    const window = dayWindow(date);
    const positions = await store.loadPositions(options.routeId ? routeIds : null, window);
    const rows: DailyRouteMetrics[] = [];

    const result = await runBatch(schedule, positions, {
      routeIds,
      window,
      minPositions,
      signal: options.signal,
      onRouteComplete: (r) => {
        rows.push(toDailyMetrics(date, r));
      },
    });

    await store.upsertDailyMetrics(rows);
    computed += rows.length;
    skipped += result.skipped.length;
    logger.info(
      `[daily] ${date}: ${rows.length} route-days stored, ${result.skipped.length} skipped ` +
        `(fewer than ${minPositions} positions)`
    );

    if (result.aborted) {
      aborted = true;
      break;
    }
  }

  if (!aborted) {
    await runRouteSummaries(store, { days: options.summaryDays ?? config.daily.summaryDays, now });
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  logger.info(
    `[daily] Done in ${elapsed}s: ${computed} computed, ${skipped} skipped` +
      (aborted ? " (aborted)" : "")
  );
  return { dates, routes: routeIds.length, computed, skipped, aborted };
}
