import type {
  DailyRouteMetrics,
  Position,
  Route,
  RouteDataSummary,
  RouteMetricsSummary,
  ScheduleSnapshot,
  StoredRouteSummary,
  ServiceExceptionDate,
  TimeWindow,
  VendorPosition,
} from "@/lib/types";

/**
 * Everything the analytics read from and write to persistent storage.
 *
 * Schedule reads always return the current snapshot only. Position reads
 * take an inclusive time window. Upserts are keyed by (route, date) for
 * daily rows and by route for summaries, so re-running a day is safe.
 */
export interface AnalyticsStore {
  listRoutes(): Promise<Route[]>;

  /** Routes, trips, stop-times and stops; all routes when `routeIds` is omitted. */
  loadSchedule(routeIds?: readonly string[]): Promise<ScheduleSnapshot>;

  loadExceptionDates(): Promise<ServiceExceptionDate[]>;

  /** Positions in the window; all routes when `routeIds` is null. */
  loadPositions(routeIds: readonly string[] | null, window: TimeWindow): Promise<Position[]>;

  loadVendorPositions(
    routeIds: readonly string[] | null,
    window: TimeWindow
  ): Promise<VendorPosition[]>;

  routeDataSummary(routeId: string, window?: TimeWindow): Promise<RouteDataSummary>;

  upsertDailyMetrics(rows: readonly DailyRouteMetrics[]): Promise<void>;

  /** Daily rows with `from <= date <= to` (YYYY-MM-DD). */
  loadDailyMetrics(
    from: string,
    to: string,
    routeIds?: readonly string[]
  ): Promise<DailyRouteMetrics[]>;

  upsertRouteSummaries(rows: readonly RouteMetricsSummary[]): Promise<void>;

  /** Stored rolling summaries; all routes when `routeIds` is omitted. */
  loadRouteSummaries(routeIds?: readonly string[]): Promise<StoredRouteSummary[]>;
}
