/**
 * Per-route entry points over an {@link AnalyticsStore}.
 *
 * A session loads the exception index once and each route's schedule slice
 * on first use, then reuses both for every later call. A load that fails is
 * not kept, so the next call tries again. Sessions are meant to live for one
 * request or one job run; a new schedule snapshot needs a new session.
 */

import { config } from "@/lib/config";
import { ConfigError, isNotFound, notFound, type NotFoundResult } from "@/lib/errors";
import { logger } from "@/lib/logger";
import type { AnalyticsStore } from "@/lib/store";
import type { RouteDataSummary, TimeWindow } from "@/lib/types";
import { dayWindow, lastNDays } from "./date-filter";
import { computeHeadways, DEFAULT_HEADWAY_OPTIONS, type HeadwayOptions, type HeadwayResult } from "./headways";
import {
  computeOtp,
  computeStopOtp,
  DEFAULT_OTP_OPTIONS,
  otpByTimePeriod,
  scheduleMatchedStrategy,
  vendorDeviationStrategy,
  type OtpOptions,
  type OtpResult,
  type OtpSummary,
  type OtpThresholds,
  type StopOtpResult,
  type TimePeriodName,
} from "./otp";
import { performanceGrade, type PerformanceGrade } from "./metrics";
import type { RouteWorkingSet } from "./positions";
import { ScheduleContext } from "./schedule";
import {
  buildRouteTrend,
  buildScorecard,
  type RouteTrend,
  type ScorecardEntry,
  type TrendMetric,
} from "./scorecard";
import { ExceptionDateIndex } from "./service-exceptions";
import { computeSpeed, DEFAULT_SPEED_OPTIONS, type SpeedOptions, type SpeedResult } from "./speed";

export interface RouteSummary extends RouteDataSummary {
  shortName: string;
  longName: string | null;
  scheduledTrips: number;
  durationMinutes: number | null;
  /** From the stored rolling summary; null before the daily job has run. */
  otpPercentage: number | null;
  grade: PerformanceGrade;
}

export interface TimePeriodOtpResult {
  routeId: string;
  timeRange: { start: string; end: string };
  thresholds: OtpThresholds;
  periods: Record<TimePeriodName, OtpSummary>;
}

export interface TimePeriodSummary extends TimePeriodOtpResult {
  days: number;
}

const DEFAULT_TREND_DAYS = 30;

/** The last `days` UTC dates as an inclusive range. */
function dayRange(days: number, now: Date): { dateStart: string; dateEnd: string } {
  const dates = Number.isInteger(days) && days >= 1 ? lastNDays(days, now) : [];
  const dateStart = dates[0];
  const dateEnd = dates[dates.length - 1];
  if (dateStart === undefined || dateEnd === undefined) {
    throw new ConfigError(`Invalid days "${days}", expected a positive integer`);
  }
  return { dateStart, dateEnd };
}

export interface AnalyticsSession {
  getHeadways(
    routeId: string,
    window: TimeWindow,
    options?: Partial<HeadwayOptions>
  ): Promise<HeadwayResult | NotFoundResult>;
  getOtp(
    routeId: string,
    window: TimeWindow,
    options?: Partial<OtpOptions> & { source?: "schedule_matched" | "vendor_deviation" }
  ): Promise<OtpResult | NotFoundResult>;
  getOtpByTimePeriod(
    routeId: string,
    window: TimeWindow,
    options?: Partial<OtpOptions>
  ): Promise<TimePeriodOtpResult | NotFoundResult>;
  getStopOtp(
    routeId: string,
    stopId: string,
    window: TimeWindow,
    options?: Partial<OtpOptions>
  ): Promise<StopOtpResult | NotFoundResult>;
  getSpeed(
    routeId: string,
    window: TimeWindow,
    options?: Partial<SpeedOptions>
  ): Promise<SpeedResult | NotFoundResult>;
  getRouteSummary(routeId: string): Promise<RouteSummary | NotFoundResult>;
  /** OTP by time of day over the last `days` UTC days, today included. */
  getTimePeriodSummary(
    routeId: string,
    days?: number,
    now?: Date
  ): Promise<TimePeriodSummary | NotFoundResult>;
  getScorecard(): Promise<ScorecardEntry[]>;
  getRouteTrend(
    routeId: string,
    metric?: TrendMetric,
    days?: number,
    now?: Date
  ): Promise<RouteTrend | NotFoundResult>;
}

export function createAnalyticsSession(store: AnalyticsStore): AnalyticsSession {
  let exceptions: Promise<ExceptionDateIndex> | undefined;
  const schedules = new Map<string, Promise<ScheduleContext>>();

  const exceptionIndex = (): Promise<ExceptionDateIndex> => {
    if (exceptions) return exceptions;
    const loading = store.loadExceptionDates().then((rows) => {
      const index = new ExceptionDateIndex(rows);
      logger.debug(`[analytics] ${index.size} removed service-dates loaded`);
      return index;
    });
    exceptions = loading;
    void loading.catch(() => {
      if (exceptions === loading) exceptions = undefined;
    });
    return loading;
  };

  const scheduleFor = (routeId: string): Promise<ScheduleContext> => {
    const cached = schedules.get(routeId);
    if (cached) return cached;
    const loading = Promise.all([store.loadSchedule([routeId]), exceptionIndex()]).then(
      ([snapshot, index]) => new ScheduleContext(snapshot, index)
    );
    schedules.set(routeId, loading);
    void loading.catch(() => {
      if (schedules.get(routeId) === loading) schedules.delete(routeId);
    });
    return loading;
  };

  const workingSet = async (routeId: string, window: TimeWindow): Promise<RouteWorkingSet> => {
    const [schedule, positions] = await Promise.all([
      scheduleFor(routeId),
      store.loadPositions([routeId], window),
    ]);
    return { routeId, window, positions, schedule };
  };

  const otpOptions = (overrides: Partial<OtpOptions> = {}): OtpOptions => ({
    ...DEFAULT_OTP_OPTIONS,
    ...overrides,
  });

  const session: AnalyticsSession = {
    async getHeadways(routeId, window, options = {}) {
      const ws = await workingSet(routeId, window);
      return computeHeadways(ws, { ...DEFAULT_HEADWAY_OPTIONS, ...options });
    },

    async getOtp(routeId, window, options = {}) {
      const { source = "schedule_matched", ...overrides } = options;
      if (source === "vendor_deviation") {
        const [schedule, vendorPositions] = await Promise.all([
          scheduleFor(routeId),
          store.loadVendorPositions([routeId], window),
        ]);
        const ws: RouteWorkingSet = { routeId, window, positions: [], schedule, vendorPositions };
        return computeOtp(ws, otpOptions(overrides), vendorDeviationStrategy);
      }
      return computeOtp(await workingSet(routeId, window), otpOptions(overrides));
    },

    async getOtpByTimePeriod(routeId, window, options = {}) {
      const ws = await workingSet(routeId, window);
      if (!ws.schedule.hasRoute(routeId)) {
        return notFound(routeId, `Route ${routeId} not found in the current schedule`);
      }
      const opts = otpOptions(options);
      const { arrivals } = scheduleMatchedStrategy.collect(ws, opts);
      return {
        routeId,
        timeRange: { start: window.start.toISOString(), end: window.end.toISOString() },
        thresholds: {
          earlyThresholdSeconds: opts.earlyThresholdSeconds,
          lateThresholdSeconds: opts.lateThresholdSeconds,
        },
        periods: otpByTimePeriod(arrivals, opts),
      };
    },

    async getTimePeriodSummary(routeId, days = config.daily.summaryDays, now = new Date()) {
      const { dateStart, dateEnd } = dayRange(days, now);
      const window = { start: dayWindow(dateStart).start, end: dayWindow(dateEnd).end };
      const result = await session.getOtpByTimePeriod(routeId, window);
      return isNotFound(result) ? result : { ...result, days };
    },

    async getScorecard() {
      const [routes, summaries] = await Promise.all([
        store.listRoutes(),
        store.loadRouteSummaries(),
      ]);
      return buildScorecard(routes, summaries);
    },

    async getRouteTrend(routeId, metric = "otp", days = DEFAULT_TREND_DAYS, now = new Date()) {
      const schedule = await scheduleFor(routeId);
      if (!schedule.hasRoute(routeId)) {
        return notFound(routeId, `Route ${routeId} not found in the current schedule`);
      }
      const { dateStart, dateEnd } = dayRange(days, now);
      const rows = await store.loadDailyMetrics(dateStart, dateEnd, [routeId]);
      return buildRouteTrend(routeId, metric, rows, { days, dateStart, dateEnd });
    },

    async getStopOtp(routeId, stopId, window, options = {}) {
      return computeStopOtp(await workingSet(routeId, window), stopId, otpOptions(options));
    },

    async getSpeed(routeId, window, options = {}) {
      const ws = await workingSet(routeId, window);
      return computeSpeed(ws, { ...DEFAULT_SPEED_OPTIONS, ...options });
    },

    async getRouteSummary(routeId) {
      const [schedule, data, stored] = await Promise.all([
        scheduleFor(routeId),
        store.routeDataSummary(routeId),
        store.loadRouteSummaries([routeId]),
      ]);
      const route = schedule.route(routeId);
      if (!route) return notFound(routeId, `Route ${routeId} not found`);

      const first = data.firstObservedAt;
      const last = data.lastObservedAt;
      const otpPercentage = stored[0]?.otpPercentage ?? null;
      return {
        ...data,
        shortName: route.shortName,
        longName: route.longName,
        scheduledTrips: schedule.tripsForRoute(routeId).length,
        durationMinutes:
          first && last ? Math.round(((last.getTime() - first.getTime()) / 60000) * 10) / 10 : null,
        otpPercentage,
        grade: performanceGrade(otpPercentage),
      };
    },
  };
  return session;
}
