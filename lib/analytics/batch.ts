/**
 * Multi-route pipeline: one schedule context and one position load for the
 * whole run, nearest stops computed once per position, then the per-route
 * OTP, headway and speed computations over each route's slice.
 *
 * Results equal the per-route entry points for the same inputs; the batch
 * path only removes repeated loading and nearest-stop searches.
 */

import { logger } from "@/lib/logger";
import type { NotFoundResult } from "@/lib/errors";
import type { Position, ScheduleSnapshot, Stop, TimeWindow, VendorPosition } from "@/lib/types";
import type { Nearest } from "./geo";
import { computeHeadways, DEFAULT_HEADWAY_OPTIONS, type HeadwayOptions, type HeadwayResult } from "./headways";
import { computeOtp, DEFAULT_OTP_OPTIONS, type OtpOptions, type OtpResult } from "./otp";
import { isInWindow, type NearestStopLookup, type RouteWorkingSet } from "./positions";
import { ScheduleContext } from "./schedule";
import { computeSpeed, DEFAULT_SPEED_OPTIONS, type SpeedOptions, type SpeedResult } from "./speed";

export interface BatchOptions {
  /** Restrict the run to these routes; default is every route with positions. */
  routeIds?: readonly string[];
  window?: TimeWindow;
  /** Routes with fewer positions in the window are skipped. */
  minPositions?: number;
  otp?: OtpOptions;
  headways?: HeadwayOptions;
  speed?: SpeedOptions;
  vendorPositions?: readonly VendorPosition[];
  signal?: AbortSignal;
  onRouteComplete?: (result: RouteBatchResult) => void | Promise<void>;
}

export interface RouteBatchResult {
  routeId: string;
  positionCount: number;
  uniqueVehicles: number;
  /** Distinct trip ids the feed reported, resolvable or not. */
  uniqueTrips: number;
  otp: OtpResult | NotFoundResult;
  headways: HeadwayResult | NotFoundResult;
  speed: SpeedResult | NotFoundResult;
}

export interface BatchResult {
  routes: RouteBatchResult[];
  skipped: Array<{ routeId: string; positionCount: number }>;
  aborted: boolean;
  durationMs: number;
}

/** Nearest route stop for every position, keyed by the position object. */
export function precomputeNearestStops(
  schedule: ScheduleContext,
  positions: readonly Position[]
): NearestStopLookup {
  const cache = new Map<Position, Nearest<Stop> | null>();
  for (const p of positions) {
    cache.set(p, schedule.nearestRouteStop(p.routeId, p.lat, p.lon));
  }
  return (p) => {
    const hit = cache.get(p);
    return hit !== undefined ? hit : schedule.nearestRouteStop(p.routeId, p.lat, p.lon);
  };
}

export function groupByRoute(
  positions: readonly Position[],
  window?: TimeWindow
): Map<string, Position[]> {
  const byRoute = new Map<string, Position[]>();
  for (const p of positions) {
    if (!isInWindow(p.observedAt, window)) continue;
    const list = byRoute.get(p.routeId);
    if (list) list.push(p);
    else byRoute.set(p.routeId, [p]);
  }
  return byRoute;
}

/**
 * A bare snapshot gets a context without service exceptions; pass a
 * context to apply them.
 */
export async function runBatch(
  scheduleOrSnapshot: ScheduleContext | ScheduleSnapshot,
  positions: readonly Position[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const started = Date.now();
  const schedule =
    scheduleOrSnapshot instanceof ScheduleContext
      ? scheduleOrSnapshot
      : new ScheduleContext(scheduleOrSnapshot);
  const byRoute = groupByRoute(positions, options.window);
  const routeIds = options.routeIds ? [...options.routeIds].sort() : [...byRoute.keys()].sort();
  const minPositions = options.minPositions ?? 0;

  const inScope = routeIds.flatMap((id) => byRoute.get(id) ?? []);
  const nearestStops = precomputeNearestStops(schedule, inScope);
  logger.info(
    `[batch] ${routeIds.length} routes, ${inScope.length} positions, nearest stops precomputed`
  );

  const routes: RouteBatchResult[] = [];
  const skipped: BatchResult["skipped"] = [];
  let aborted = false;

  for (const routeId of routeIds) {
    if (options.signal?.aborted) {
      aborted = true;
      logger.warn(`[batch] Aborted after ${routes.length} routes`);
      break;
    }

    const routePositions = byRoute.get(routeId) ?? [];
    if (routePositions.length < minPositions) {
      skipped.push({ routeId, positionCount: routePositions.length });
      logger.debug(`[batch] Skipping ${routeId}: ${routePositions.length} positions`);
      continue;
    }

    const ws: RouteWorkingSet = {
      routeId,
      window: options.window,
      positions: routePositions,
      schedule,
      nearestStops,
      vendorPositions: options.vendorPositions,
    };

    const result: RouteBatchResult = {
      routeId,
      positionCount: routePositions.length,
      uniqueVehicles: new Set(routePositions.map((p) => p.vehicleId)).size,
      uniqueTrips: new Set(routePositions.flatMap((p) => (p.tripId ? [p.tripId] : []))).size,
      otp: computeOtp(ws, options.otp ?? DEFAULT_OTP_OPTIONS),
      headways: computeHeadways(ws, options.headways ?? DEFAULT_HEADWAY_OPTIONS),
      speed: computeSpeed(ws, options.speed ?? DEFAULT_SPEED_OPTIONS),
    };
    routes.push(result);
    await options.onRouteComplete?.(result);
  }

  const durationMs = Date.now() - started;
  logger.info(
    `[batch] Done: ${routes.length} routes computed, ${skipped.length} skipped in ${durationMs}ms`
  );
  return { routes, skipped, aborted, durationMs };
}
