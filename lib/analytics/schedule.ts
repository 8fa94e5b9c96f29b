/**
 * In-memory view of the current schedule snapshot.
 *
 * A context is built once per session or batch from the loaded snapshot and
 * handed to every computation. The per-route caches (stop lists, service
 * hours) fill on first use and are read-only afterwards, so a context can be
 * shared across route computations once it is populated.
 */

import { gtfsTimeHour, serviceDateKey } from "./gtfs-time";
import { nearest, type Nearest } from "./geo";
import { ExceptionDateIndex } from "./service-exceptions";
import type {
  DirectionId,
  Position,
  Route,
  ScheduledStopTime,
  ScheduledTrip,
  ScheduleSnapshot,
  Stop,
} from "@/lib/types";

export interface ServiceHours {
  /** 0–23 */
  start: number;
  /** May exceed 23 for service running past midnight. */
  end: number;
}

export const DEFAULT_SERVICE_HOURS: ServiceHours = { start: 5, end: 23 };

export class ScheduleContext {
  readonly exceptions: ExceptionDateIndex;

  private readonly routes = new Map<string, Route>();
  private readonly trips = new Map<string, ScheduledTrip>();
  private readonly tripsByRoute = new Map<string, ScheduledTrip[]>();
  private readonly stopTimesByTrip = new Map<string, ScheduledStopTime[]>();
  private readonly stops = new Map<string, Stop>();

  private readonly routeStopsCache = new Map<string, Stop[]>();
  private readonly serviceHoursCache = new Map<string, ServiceHours>();

  constructor(snapshot: ScheduleSnapshot, exceptions: ExceptionDateIndex = ExceptionDateIndex.empty()) {
    this.exceptions = exceptions;

    for (const r of snapshot.routes) this.routes.set(r.routeId, r);
    for (const s of snapshot.stops) this.stops.set(s.stopId, s);

    for (const t of snapshot.trips) {
      this.trips.set(t.tripId, t);
      const list = this.tripsByRoute.get(t.routeId);
      if (list) list.push(t);
      else this.tripsByRoute.set(t.routeId, [t]);
    }

    for (const st of snapshot.stopTimes) {
      const list = this.stopTimesByTrip.get(st.tripId);
      if (list) list.push(st);
      else this.stopTimesByTrip.set(st.tripId, [st]);
    }
    for (const list of this.tripsByRoute.values()) {
      list.sort((a, b) => (a.tripId < b.tripId ? -1 : a.tripId > b.tripId ? 1 : 0));
    }
    for (const list of this.stopTimesByTrip.values()) {
      list.sort((a, b) => a.stopSequence - b.stopSequence);
    }
  }

  hasRoute(routeId: string): boolean {
    return this.routes.has(routeId) || this.tripsByRoute.has(routeId);
  }

  routeIds(): string[] {
    const ids = new Set([...this.routes.keys(), ...this.tripsByRoute.keys()]);
    return [...ids].sort();
  }

  route(routeId: string): Route | undefined {
    return this.routes.get(routeId);
  }

  trip(tripId: string): ScheduledTrip | undefined {
    return this.trips.get(tripId);
  }

  stop(stopId: string): Stop | undefined {
    return this.stops.get(stopId);
  }

  tripsForRoute(routeId: string, directionId?: DirectionId | null): ScheduledTrip[] {
    const all = this.tripsByRoute.get(routeId) ?? [];
    if (directionId === undefined || directionId === null) return all;
    return all.filter((t) => t.directionId === directionId);
  }

  /** Stop-times of a trip ordered by stop sequence. */
  stopTimesForTrip(tripId: string): ScheduledStopTime[] {
    return this.stopTimesByTrip.get(tripId) ?? [];
  }

  stopTimeFor(tripId: string, stopId: string): ScheduledStopTime | undefined {
    return this.stopTimesForTrip(tripId).find((st) => st.stopId === stopId);
  }

  /** Every stop served by any trip of the route, ordered by stop id. */
  stopsForRoute(routeId: string): Stop[] {
    const cached = this.routeStopsCache.get(routeId);
    if (cached) return cached;

    const ids = new Set<string>();
    for (const trip of this.tripsForRoute(routeId)) {
      for (const st of this.stopTimesForTrip(trip.tripId)) ids.add(st.stopId);
    }
    const stops = [...ids]
      .sort()
      .map((id) => this.stops.get(id))
      .filter((s): s is Stop => s !== undefined);

    this.routeStopsCache.set(routeId, stops);
    return stops;
  }

  /** Stops on a single trip's own stop list, in sequence order. */
  stopsForTrip(tripId: string): Stop[] {
    return this.stopTimesForTrip(tripId)
      .map((st) => this.stops.get(st.stopId))
      .filter((s): s is Stop => s !== undefined);
  }

  nearestRouteStop(routeId: string, lat: number, lon: number): Nearest<Stop> | null {
    return nearest(lat, lon, this.stopsForRoute(routeId));
  }

  /**
   * The trip a position reports, when that id exists in the schedule and
   * belongs to the same route. Anything else is treated as unknown.
   */
  reportedTrip(position: Position): ScheduledTrip | undefined {
    if (!position.tripId) return undefined;
    const trip = this.trips.get(position.tripId);
    return trip && trip.routeId === position.routeId ? trip : undefined;
  }

  isServiceRemoved(trip: ScheduledTrip, at: Date): boolean {
    return this.exceptions.has(serviceDateKey(at), trip.serviceId);
  }

  /**
   * Scheduled service span of a route from its arrival times: the earliest
   * hour normalized to 0–23, the latest kept as-is.
   */
  serviceHours(routeId: string): ServiceHours {
    const cached = this.serviceHoursCache.get(routeId);
    if (cached) return cached;

    let min = Infinity;
    let max = -Infinity;
    for (const trip of this.tripsForRoute(routeId)) {
      for (const st of this.stopTimesForTrip(trip.tripId)) {
        const hour = gtfsTimeHour(st.arrivalTime);
        if (hour === null) continue;
        if (hour < min) min = hour;
        if (hour > max) max = hour;
      }
    }

    const hours = Number.isFinite(min) ? { start: min % 24, end: max } : DEFAULT_SERVICE_HOURS;
    this.serviceHoursCache.set(routeId, hours);
    return hours;
  }
}

/** Whether a UTC hour of day falls within the service span. */
export function isWithinServiceHours(hour: number, hours: ServiceHours): boolean {
  if (hours.end <= 23) {
    return hour >= hours.start && hour <= hours.end;
  }
  return hour >= hours.start || hour <= hours.end - 24;
}
