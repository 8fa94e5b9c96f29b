import { neon } from "@neondatabase/serverless";
import type { z } from "zod";
import { config } from "@/lib/config";
import { ConfigError, StoreError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import {
  DailyMetricsRowSchema,
  ExceptionDateRowSchema,
  PositionRowSchema,
  RouteDataSummaryRowSchema,
  RouteRowSchema,
  RouteSummaryRowSchema,
  StopRowSchema,
  StopTimeRowSchema,
  TripRowSchema,
  VendorPositionRowSchema,
} from "@/lib/schemas/rows";
import type { AnalyticsStore } from "@/lib/store";
import type { DailyRouteMetrics, RouteMetricsSummary } from "@/lib/types";

const UPSERT_BATCH_SIZE = 100;

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[], table: string): z.output<T>[] {
  const out: z.output<T>[] = [];
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new StoreError(`Malformed ${table} row: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        cause: parsed.error,
      });
    }
    out.push(parsed.data);
  }
  return out;
}

/** Keeps the rows that parse; each rejected row is counted and logged. */
function parseRecords<T extends z.ZodTypeAny>(schema: T, rows: unknown[], table: string): z.output<T>[] {
  const out: z.output<T>[] = [];
  let rejected = 0;
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      out.push(parsed.data);
      continue;
    }
    rejected++;
    const issue = parsed.error.issues[0];
    logger.debug(`[db] Skipping ${table} row: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`);
  }
  if (rejected > 0) {
    logger.warn(`[db] Skipped ${rejected} malformed ${table} rows of ${rows.length}`);
  }
  return out;
}

async function query<T>(label: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError(`${label} failed`, { cause: error });
  }
}

async function inBatches<T>(rows: readonly T[], fn: (row: T) => Promise<unknown>): Promise<void> {
  for (let i = 0; i < rows.length; i += UPSERT_BATCH_SIZE) {
    await Promise.all(rows.slice(i, i + UPSERT_BATCH_SIZE).map((r) => fn(r)));
  }
}

/** Postgres-backed store over the Neon serverless driver. */
export function createNeonStore(connectionString: string): AnalyticsStore {
  const sql = neon(connectionString);

  return {
    listRoutes: () =>
      query("listRoutes", async () => {
        const rows = await sql`
          SELECT route_id, short_name, long_name
          FROM routes WHERE is_current ORDER BY route_id`;
        return parseRows(RouteRowSchema, rows, "routes");
      }),

    loadSchedule: (routeIds) =>
      query("loadSchedule", async () => {
        const ids = routeIds ? [...routeIds] : null;
        const [routes, trips, stopTimes, stops] = await Promise.all([
          sql`
            SELECT route_id, short_name, long_name FROM routes
            WHERE is_current AND (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))`,
          sql`
            SELECT trip_id, route_id, direction_id, service_id, shape_id FROM trips
            WHERE is_current AND (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))`,
          sql`
            SELECT st.trip_id, st.stop_id, st.stop_sequence, st.arrival_time, st.departure_time
            FROM stop_times st
            JOIN trips t ON t.trip_id = st.trip_id AND t.is_current
            WHERE st.is_current AND (${ids}::text[] IS NULL OR t.route_id = ANY(${ids}::text[]))`,
          sql`
            SELECT DISTINCT s.stop_id, s.stop_name, s.stop_lat, s.stop_lon
            FROM stops s
            WHERE s.is_current AND (${ids}::text[] IS NULL OR s.stop_id IN (
              SELECT st.stop_id FROM stop_times st
              JOIN trips t ON t.trip_id = st.trip_id AND t.is_current
              WHERE st.is_current AND t.route_id = ANY(${ids}::text[])
            ))`,
        ]);
        return {
          routes: parseRows(RouteRowSchema, routes, "routes"),
          trips: parseRows(TripRowSchema, trips, "trips"),
          stopTimes: parseRows(StopTimeRowSchema, stopTimes, "stop_times"),
          stops: parseRows(StopRowSchema, stops, "stops"),
        };
      }),

    loadExceptionDates: () =>
      query("loadExceptionDates", async () => {
        const rows = await sql`
          SELECT service_id, date, exception_type
          FROM calendar_dates WHERE is_current`;
        return parseRows(ExceptionDateRowSchema, rows, "calendar_dates");
      }),

    loadPositions: (routeIds, window) =>
      query("loadPositions", async () => {
        const ids = routeIds ? [...routeIds] : null;
        const rows = await sql`
          SELECT vehicle_id, route_id, trip_id, latitude, longitude, bearing, speed,
                 (extract(epoch FROM observed_at) * 1000)::float8 AS observed_ms
          FROM vehicle_positions
          WHERE observed_at >= ${window.start.toISOString()}::timestamptz
            AND observed_at <= ${window.end.toISOString()}::timestamptz
            AND (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))
          ORDER BY observed_at, vehicle_id`;
        return parseRecords(PositionRowSchema, rows, "vehicle_positions");
      }),

    loadVendorPositions: (routeIds, window) =>
      query("loadVendorPositions", async () => {
        const ids = routeIds ? [...routeIds] : null;
        const rows = await sql`
          SELECT vehicle_id, route_id, trip_id, latitude, longitude, deviation_minutes,
                 (extract(epoch FROM observed_at) * 1000)::float8 AS observed_ms
          FROM vendor_positions
          WHERE observed_at >= ${window.start.toISOString()}::timestamptz
            AND observed_at <= ${window.end.toISOString()}::timestamptz
            AND (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))
          ORDER BY observed_at, vehicle_id`;
        return parseRecords(VendorPositionRowSchema, rows, "vendor_positions");
      }),

    routeDataSummary: (routeId, window) =>
      query("routeDataSummary", async () => {
        const start = window ? window.start.toISOString() : null;
        const end = window ? window.end.toISOString() : null;
        const rows = await sql`
          SELECT count(*) AS position_count,
                 count(DISTINCT vehicle_id) AS unique_vehicles,
                 (extract(epoch FROM min(observed_at)) * 1000)::float8 AS first_ms,
                 (extract(epoch FROM max(observed_at)) * 1000)::float8 AS last_ms
          FROM vehicle_positions
          WHERE route_id = ${routeId}
            AND (${start}::timestamptz IS NULL OR observed_at >= ${start}::timestamptz)
            AND (${end}::timestamptz IS NULL OR observed_at <= ${end}::timestamptz)`;
        const [row] = parseRows(RouteDataSummaryRowSchema, rows, "vehicle_positions");
        return {
          routeId,
          positionCount: row?.position_count ?? 0,
          uniqueVehicles: row?.unique_vehicles ?? 0,
          firstObservedAt: row?.first_ms ?? null,
          lastObservedAt: row?.last_ms ?? null,
        };
      }),

    upsertDailyMetrics: (rows) =>
      query("upsertDailyMetrics", () =>
        inBatches(rows, (m: DailyRouteMetrics) => sql`
          INSERT INTO route_metrics_daily
            (route_id, date, otp_percentage, early_percentage, late_percentage,
             avg_headway_minutes, min_headway_minutes, max_headway_minutes,
             avg_speed_mph, median_speed_mph, total_arrivals, unique_vehicles, unique_trips,
             computed_at)
          VALUES
            (${m.routeId}, ${m.date}::date, ${m.otpPercentage}, ${m.earlyPercentage},
             ${m.latePercentage}, ${m.avgHeadwayMinutes}, ${m.minHeadwayMinutes},
             ${m.maxHeadwayMinutes}, ${m.avgSpeedMph}, ${m.medianSpeedMph}, ${m.totalArrivals},
             ${m.uniqueVehicles}, ${m.uniqueTrips}, NOW())
          ON CONFLICT (route_id, date) DO UPDATE SET
            otp_percentage = EXCLUDED.otp_percentage,
            early_percentage = EXCLUDED.early_percentage,
            late_percentage = EXCLUDED.late_percentage,
            avg_headway_minutes = EXCLUDED.avg_headway_minutes,
            min_headway_minutes = EXCLUDED.min_headway_minutes,
            max_headway_minutes = EXCLUDED.max_headway_minutes,
            avg_speed_mph = EXCLUDED.avg_speed_mph,
            median_speed_mph = EXCLUDED.median_speed_mph,
            total_arrivals = EXCLUDED.total_arrivals,
            unique_vehicles = EXCLUDED.unique_vehicles,
            unique_trips = EXCLUDED.unique_trips,
            computed_at = EXCLUDED.computed_at`)
      ),

    loadDailyMetrics: (from, to, routeIds) =>
      query("loadDailyMetrics", async () => {
        const ids = routeIds ? [...routeIds] : null;
        const rows = await sql`
          SELECT route_id, to_char(date, 'YYYY-MM-DD') AS date,
                 otp_percentage, early_percentage, late_percentage,
                 avg_headway_minutes, min_headway_minutes, max_headway_minutes,
                 avg_speed_mph, median_speed_mph, total_arrivals, unique_vehicles, unique_trips
          FROM route_metrics_daily
          WHERE date >= ${from}::date AND date <= ${to}::date
            AND (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))
          ORDER BY route_id, date`;
        return parseRows(DailyMetricsRowSchema, rows, "route_metrics_daily");
      }),

    upsertRouteSummaries: (rows) =>
      query("upsertRouteSummaries", () =>
        inBatches(rows, (s: RouteMetricsSummary) => sql`
          INSERT INTO route_metrics_summary
            (route_id, days_analyzed, date_start, date_end, otp_percentage, early_percentage,
             late_percentage, avg_headway_minutes, avg_speed_mph, total_observations,
             unique_vehicles, last_data_timestamp, computed_at)
          VALUES
            (${s.routeId}, ${s.daysAnalyzed}, ${s.dateStart}::date, ${s.dateEnd}::date,
             ${s.otpPercentage}, ${s.earlyPercentage}, ${s.latePercentage},
             ${s.avgHeadwayMinutes}, ${s.avgSpeedMph}, ${s.totalObservations},
             ${s.uniqueVehicles}, ${s.lastDataTimestamp?.toISOString() ?? null}::timestamptz, NOW())
          ON CONFLICT (route_id) DO UPDATE SET
            days_analyzed = EXCLUDED.days_analyzed,
            date_start = EXCLUDED.date_start,
            date_end = EXCLUDED.date_end,
            otp_percentage = EXCLUDED.otp_percentage,
            early_percentage = EXCLUDED.early_percentage,
            late_percentage = EXCLUDED.late_percentage,
            avg_headway_minutes = EXCLUDED.avg_headway_minutes,
            avg_speed_mph = EXCLUDED.avg_speed_mph,
            total_observations = EXCLUDED.total_observations,
            unique_vehicles = EXCLUDED.unique_vehicles,
            last_data_timestamp = EXCLUDED.last_data_timestamp,
            computed_at = EXCLUDED.computed_at`)
      ),

    loadRouteSummaries: (routeIds) =>
      query("loadRouteSummaries", async () => {
        const ids = routeIds ? [...routeIds] : null;
        const rows = await sql`
          SELECT route_id, days_analyzed,
                 to_char(date_start, 'YYYY-MM-DD') AS date_start,
                 to_char(date_end, 'YYYY-MM-DD') AS date_end,
                 otp_percentage, early_percentage, late_percentage,
                 avg_headway_minutes, avg_speed_mph, total_observations, unique_vehicles,
                 (extract(epoch FROM last_data_timestamp) * 1000)::float8 AS last_data_ms,
                 (extract(epoch FROM computed_at) * 1000)::float8 AS computed_ms
          FROM route_metrics_summary
          WHERE (${ids}::text[] IS NULL OR route_id = ANY(${ids}::text[]))
          ORDER BY route_id`;
        return parseRows(RouteSummaryRowSchema, rows, "route_metrics_summary");
      }),
  };
}

let store: AnalyticsStore | undefined;

/** Shared store for the configured DATABASE_URL, created on first use. */
export function getStore(): AnalyticsStore {
  if (!store) {
    if (!config.databaseUrl) {
      throw new ConfigError("DATABASE_URL environment variable is not set");
    }
    store = createNeonStore(config.databaseUrl);
    logger.debug("[db] Neon store created for " + config.databaseUrl.replace(/:[^:@]+@/, ":***@"));
  }
  return store;
}
