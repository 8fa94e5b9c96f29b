import { describe, it, expect } from "vitest";
import {
  DEFAULT_SERVICE_HOURS,
  isWithinServiceHours,
  ScheduleContext,
} from "@/lib/analytics/schedule";
import { at, context, exceptionRecords, pos, snapshot } from "../../helpers/fixtures";

describe("ScheduleContext", () => {
  const schedule = context();

  it("lists a route's trips ordered by id, optionally by direction", () => {
    expect(schedule.tripsForRoute("R1").map((t) => t.tripId)).toEqual(["T1", "T2", "T3", "T4"]);
    expect(schedule.tripsForRoute("R1", 1).map((t) => t.tripId)).toEqual(["T3"]);
    expect(schedule.tripsForRoute("R9")).toEqual([]);
  });

  it("lists the route's stops by id", () => {
    expect(schedule.stopsForRoute("R1").map((s) => s.stopId)).toEqual(["A", "B", "C", "D", "E"]);
  });

  it("lists a trip's stops in sequence order", () => {
    expect(schedule.stopsForTrip("T3").map((s) => s.stopId)).toEqual(["E", "D", "C", "B", "A"]);
  });

  it("finds a trip's time at a stop", () => {
    expect(schedule.stopTimeFor("T2", "C")?.arrivalTime).toBe("08:50:00");
    expect(schedule.stopTimeFor("T2", "Z")).toBeUndefined();
  });

  it("finds the nearest route stop", () => {
    const hit = schedule.nearestRouteStop("R1", 0.0201, 0);
    expect(hit?.item.stopId).toBe("C");
    expect(hit?.distanceM).toBeCloseTo(11.12, 1);
  });

  it("resolves reported trips on the same route only", () => {
    expect(schedule.reportedTrip(pos({ tripId: "T1", lat: 0, at: at("08:00") }))?.tripId).toBe(
      "T1"
    );
    expect(
      schedule.reportedTrip(pos({ tripId: "T1", routeId: "R2", lat: 0, at: at("08:00") }))
    ).toBeUndefined();
    expect(schedule.reportedTrip(pos({ tripId: "X9", lat: 0, at: at("08:00") }))).toBeUndefined();
    expect(schedule.reportedTrip(pos({ lat: 0, at: at("08:00") }))).toBeUndefined();
  });

  it("knows routes from the routes table or from trips", () => {
    expect(schedule.hasRoute("R1")).toBe(true);
    expect(schedule.hasRoute("R9")).toBe(false);
    expect(schedule.routeIds()).toEqual(["R1"]);
  });

  it("flags trips of a removed service variant on that date only", () => {
    const holiday = context(snapshot(), exceptionRecords(true));
    const t1 = holiday.trip("T1");
    const t4 = holiday.trip("T4");
    expect(t1 && holiday.isServiceRemoved(t1, at("08:00"))).toBe(true);
    expect(t1 && holiday.isServiceRemoved(t1, at("08:00", "2025-01-07"))).toBe(false);
    expect(t4 && holiday.isServiceRemoved(t4, at("08:00"))).toBe(false);
  });
});

describe("serviceHours", () => {
  it("spans the earliest to the latest scheduled hour", () => {
    expect(context().serviceHours("R1")).toEqual({ start: 8, end: 9 });
  });

  it("keeps the end hour unnormalized past midnight", () => {
    const schedule = new ScheduleContext({
      routes: [{ routeId: "N", shortName: "N", longName: null }],
      trips: [{ tripId: "n1", routeId: "N", directionId: 0, serviceId: "WK", shapeId: null }],
      stopTimes: [
        { tripId: "n1", stopId: "A", stopSequence: 1, arrivalTime: "05:10:00", departureTime: "05:10:00" },
        { tripId: "n1", stopId: "B", stopSequence: 2, arrivalTime: "25:30:00", departureTime: "25:30:00" },
        { tripId: "n1", stopId: "C", stopSequence: 3, arrivalTime: "bad", departureTime: "bad" },
      ],
      stops: [],
    });
    expect(schedule.serviceHours("N")).toEqual({ start: 5, end: 25 });
  });

  it("falls back to 5–23 without parsable times", () => {
    const schedule = new ScheduleContext({
      routes: [{ routeId: "N", shortName: "N", longName: null }],
      trips: [],
      stopTimes: [],
      stops: [],
    });
    expect(schedule.serviceHours("N")).toEqual(DEFAULT_SERVICE_HOURS);
  });
});

describe("isWithinServiceHours", () => {
  it("admits hours inside a same-day span", () => {
    const hours = { start: 5, end: 23 };
    expect(isWithinServiceHours(4, hours)).toBe(false);
    expect(isWithinServiceHours(5, hours)).toBe(true);
    expect(isWithinServiceHours(23, hours)).toBe(true);
  });

  it("wraps spans that run past midnight", () => {
    const hours = { start: 5, end: 25 };
    expect(isWithinServiceHours(0, hours)).toBe(true);
    expect(isWithinServiceHours(1, hours)).toBe(true);
    expect(isWithinServiceHours(2, hours)).toBe(false);
    expect(isWithinServiceHours(4, hours)).toBe(false);
    expect(isWithinServiceHours(23, hours)).toBe(true);
  });
});
