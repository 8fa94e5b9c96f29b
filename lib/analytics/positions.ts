/**
 * Cleaning applied to a route's raw positions before any metric sees them.
 */

import { isValidCoordinate, type Nearest } from "./geo";
import type { ScheduleContext } from "./schedule";
import type { Position, Stop, TimeWindow, VendorPosition } from "@/lib/types";

export type NearestStopLookup = (position: Position) => Nearest<Stop> | null;

/**
 * Everything one route's computation needs: its raw positions and the
 * schedule context. The batch pipeline also passes nearest stops it has
 * already computed for every position.
 */
export interface RouteWorkingSet {
  routeId: string;
  window?: TimeWindow;
  positions: readonly Position[];
  schedule: ScheduleContext;
  nearestStops?: NearestStopLookup;
  /** Only read by the vendor-deviation OTP strategy. */
  vendorPositions?: readonly VendorPosition[];
}

/** Nearest stop of the working set's route to a position, unbounded. */
export function nearestStopFor(ws: RouteWorkingSet, position: Position): Nearest<Stop> | null {
  return ws.nearestStops
    ? ws.nearestStops(position)
    : ws.schedule.nearestRouteStop(ws.routeId, position.lat, position.lon);
}

export interface PreparedPositions {
  positions: Position[];
  totalPositions: number;
  /** Same vehicle, instant and coordinates seen more than once. */
  duplicatesRemoved: number;
  /** Reported trip belongs to a service variant removed that day. */
  exceptionFiltered: number;
  invalidSkipped: number;
}

export function byObservedAt(a: Position, b: Position): number {
  return (
    a.observedAt.getTime() - b.observedAt.getTime() ||
    (a.vehicleId < b.vehicleId ? -1 : a.vehicleId > b.vehicleId ? 1 : 0)
  );
}

export function isInWindow(at: Date, window: TimeWindow | undefined): boolean {
  if (!window) return true;
  const t = at.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}

/**
 * Drops other-route, out-of-window, unusable and duplicate positions, and
 * positions whose reported trip runs on a cancelled service variant.
 * Positions whose trip id is unknown to the schedule are kept; the matcher
 * decides what they are. The result is ordered by observation time.
 */
export function preparePositions(ws: RouteWorkingSet): PreparedPositions {
  const { schedule, window } = ws;
  const seen = new Set<string>();
  const positions: Position[] = [];
  let duplicatesRemoved = 0;
  let exceptionFiltered = 0;
  let invalidSkipped = 0;
  let totalPositions = 0;

  for (const p of ws.positions) {
    if (p.routeId !== ws.routeId || !isInWindow(p.observedAt, window)) continue;
    totalPositions++;

    if (!isValidCoordinate(p.lat, p.lon) || Number.isNaN(p.observedAt.getTime())) {
      invalidSkipped++;
      continue;
    }

    const key = `${p.vehicleId}|${p.observedAt.getTime()}|${p.lat}|${p.lon}`;
    if (seen.has(key)) {
      duplicatesRemoved++;
      continue;
    }
    seen.add(key);

    const trip = p.tripId ? schedule.trip(p.tripId) : undefined;
    if (trip && schedule.isServiceRemoved(trip, p.observedAt)) {
      exceptionFiltered++;
      continue;
    }

    positions.push(p);
  }

  positions.sort(byObservedAt);
  return { positions, totalPositions, duplicatesRemoved, exceptionFiltered, invalidSkipped };
}
