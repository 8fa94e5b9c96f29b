import { describe, it, expect } from "vitest";
import {
  classifyOffset,
  computeOtp,
  computeStopOtp,
  otpByTimePeriod,
  summarizeArrivals,
  timePeriodOf,
  vendorDeviationStrategy,
  type OtpArrival,
  type OtpOptions,
  type OtpResult,
  type StopOtpResult,
} from "@/lib/analytics/otp";
import type { RouteWorkingSet } from "@/lib/analytics/positions";
import { isNotFound, type NotFoundResult } from "@/lib/errors";
import type { Position, VendorPosition } from "@/lib/types";
import { at, context, pos, vendorPos } from "../../helpers/fixtures";

const OPTIONS: OtpOptions = {
  earlyThresholdSeconds: -60,
  lateThresholdSeconds: 300,
  fastPathStopMeters: 50,
  matchedStopMeters: 200,
  matcher: {
    earlyWindowMinutes: 5,
    lateWindowMinutes: 15,
    maxDistanceMeters: 500,
    minConfidence: 0.3,
    trustReportedTripId: true,
  },
};

function found<T extends object>(result: T | NotFoundResult): T {
  if (isNotFound(result)) throw new Error(result.message);
  return result;
}

function ws(positions: Position[], vendorPositions: VendorPosition[] = []): RouteWorkingSet {
  return { routeId: "R1", schedule: context(), positions, vendorPositions };
}

const otp = (positions: Position[]): OtpResult => found(computeOtp(ws(positions), OPTIONS));

function arrival(observedAt: Date, offsetSeconds: number): OtpArrival {
  return {
    vehicleId: "v1",
    tripKey: "T1",
    stopId: "C",
    stopName: "Charlie",
    observedAt,
    scheduledAt: null,
    offsetSeconds,
    method: "matched",
    confidence: 0.9,
  };
}

describe("classifyOffset", () => {
  it("treats both thresholds as on time", () => {
    expect(classifyOffset(-60, OPTIONS)).toBe("on_time");
    expect(classifyOffset(300, OPTIONS)).toBe("on_time");
  });

  it("classifies beyond the thresholds", () => {
    expect(classifyOffset(-61, OPTIONS)).toBe("early");
    expect(classifyOffset(301, OPTIONS)).toBe("late");
  });
});

describe("summarizeArrivals", () => {
  it("buckets offsets and computes shares", () => {
    const summary = summarizeArrivals(
      [{ offsetSeconds: -120 }, { offsetSeconds: 30 }, { offsetSeconds: 400 }],
      OPTIONS
    );
    expect(summary).toEqual({
      arrivalsAnalyzed: 3,
      earlyCount: 1,
      onTimeCount: 1,
      lateCount: 1,
      onTimePercentage: 33.33,
      earlyPercentage: 33.33,
      latePercentage: 33.33,
      avgOffsetSeconds: 103.3,
    });
  });

  it("has null shares without arrivals", () => {
    const summary = summarizeArrivals([], OPTIONS);
    expect(summary.arrivalsAnalyzed).toBe(0);
    expect(summary.onTimePercentage).toBeNull();
    expect(summary.avgOffsetSeconds).toBeNull();
  });
});

describe("computeOtp", () => {
  it("pairs reported trips with the nearest stop on their own stop list", () => {
    const result = otp([
      pos({ vehicleId: "v1", tripId: "T1", lat: 0.02, at: at("08:18") }),
      pos({ vehicleId: "v2", tripId: "T2", lat: 0.02, at: at("08:50:30") }),
      pos({ vehicleId: "v3", tripId: "T4", lat: 0.02, at: at("08:26:40") }),
    ]);

    expect(result.source).toBe("schedule_matched");
    expect(result.supplementary).toBe(false);
    expect(result.arrivalsAnalyzed).toBe(3);
    expect(result.onTimePercentage).toBe(33.33);
    expect(result.avgOffsetSeconds).toBe(103.3);
    expect(result.uniqueVehicles).toBe(3);
    expect(result.uniqueTrips).toBe(3);
    expect(result.sampleArrivals.map((a) => [a.vehicleId, a.offsetSeconds, a.status])).toEqual([
      ["v1", -120, "early"],
      ["v3", 400, "late"],
      ["v2", 30, "on_time"],
    ]);
    expect(result.sampleArrivals[0]).toMatchObject({
      stopId: "C",
      stopName: "Charlie",
      method: "fast_path",
      confidence: 1,
      scheduledAt: at("08:20"),
    });
    expect(result.dataQuality).toMatchObject({ matched: 3, fastPathPassages: 3, skipped: 0 });
  });

  it("skips reported trips that are not near one of their stops", () => {
    const result = otp([pos({ tripId: "T1", lat: 0.025, at: at("08:25") })]);
    expect(result.arrivalsAnalyzed).toBe(0);
    expect(result.dataQuality).toMatchObject({ matched: 1, skipped: 1, fastPathPassages: 0 });
  });

  it("keeps one passage per vehicle, trip and stop", () => {
    const result = otp([
      pos({ tripId: "T1", lat: 0.02, at: at("08:18") }),
      pos({ tripId: "T1", lat: 0.0201, at: at("08:19") }),
    ]);
    expect(result.dataQuality.passagesBeforeDedup).toBe(2);
    expect(result.arrivalsAnalyzed).toBe(1);
    expect(result.sampleArrivals[0]?.offsetSeconds).toBe(-60);
    expect(result.onTimeCount).toBe(1);
  });

  it("matches positions without a usable trip id", () => {
    const result = otp([
      pos({ vehicleId: "v1", lat: 0.01, at: at("08:20") }),
      pos({ vehicleId: "v2", lat: 0.01, at: at("14:00") }),
    ]);
    expect(result.dataQuality).toMatchObject({ matched: 1, unmatched: 1, skipped: 0 });
    const [first] = result.sampleArrivals;
    expect(first?.method).toBe("matched");
    expect(first?.tripKey).toBe("T1");
    expect(first?.stopId).toBe("B");
    expect(first?.offsetSeconds).toBe(600);
    expect(first?.status).toBe("late");
    expect(first?.confidence).toBeCloseTo(0.76667, 4);
  });

  it("reports an unknown route as not found", () => {
    expect(computeOtp({ ...ws([]), routeId: "R9" }, OPTIONS)).toMatchObject({
      error: "not_found",
      routeId: "R9",
    });
  });

  it("reads offsets from the vendor feed with the vendor strategy", () => {
    const result = found(
      computeOtp(
        ws(
          [],
          [
            vendorPos("v1", -2, at("08:00")),
            vendorPos("v2", 0.5, at("08:10")),
            vendorPos("v3", null, at("08:20")),
            vendorPos("v1", 7, at("08:30")),
            vendorPos("v9", 1, at("08:40"), "R2"),
          ]
        ),
        OPTIONS,
        vendorDeviationStrategy
      )
    );

    expect(result.source).toBe("vendor_deviation");
    expect(result.supplementary).toBe(true);
    expect(result.arrivalsAnalyzed).toBe(3);
    expect([result.earlyCount, result.onTimeCount, result.lateCount]).toEqual([1, 1, 1]);
    expect(result.uniqueVehicles).toBe(2);
    expect(result.uniqueTrips).toBe(2);
    expect(result.dataQuality).toMatchObject({ totalPositions: 4, matched: 3, skipped: 1 });
  });
});

describe("time periods", () => {
  it("assigns UTC hours to periods", () => {
    expect(timePeriodOf(at("05:59"))).toBe("Night");
    expect(timePeriodOf(at("06:00"))).toBe("AM Peak");
    expect(timePeriodOf(at("09:00"))).toBe("Midday");
    expect(timePeriodOf(at("15:00"))).toBe("PM Peak");
    expect(timePeriodOf(at("19:00"))).toBe("Evening");
    expect(timePeriodOf(at("23:59"))).toBe("Evening");
    expect(timePeriodOf(at("00:00"))).toBe("Night");
  });

  it("summarizes each period separately", () => {
    const periods = otpByTimePeriod(
      [arrival(at("07:00"), 0), arrival(at("07:30"), 600), arrival(at("16:00"), -120)],
      OPTIONS
    );
    expect(periods["AM Peak"]).toMatchObject({ arrivalsAnalyzed: 2, onTimePercentage: 50, lateCount: 1 });
    expect(periods["PM Peak"]).toMatchObject({ arrivalsAnalyzed: 1, earlyPercentage: 100 });
    expect(periods.Midday.arrivalsAnalyzed).toBe(0);
    expect(periods.Midday.onTimePercentage).toBeNull();
  });
});

describe("computeStopOtp", () => {
  it("compares each matched trip with its time at the stop", () => {
    const result: StopOtpResult = found(
      computeStopOtp(
        ws([
          pos({ vehicleId: "v1", tripId: "T1", lat: 0.02, at: at("08:18") }),
          pos({ vehicleId: "v2", lat: 0.02, at: at("08:20") }),
          pos({ vehicleId: "v3", lat: 0.02, at: at("14:00") }),
          pos({ vehicleId: "v4", tripId: "T2", lat: 0.01, at: at("08:40") }),
        ]),
        "C",
        OPTIONS
      )
    );

    expect(result.stop.name).toBe("Charlie");
    expect(result.proximityMeters).toBe(50);
    expect(result.unmatched).toBe(1);
    expect(result.arrivalsAnalyzed).toBe(2);
    expect(result.earlyCount).toBe(1);
    expect(result.onTimePercentage).toBe(50);
  });

  it("reports an unknown stop as not found", () => {
    expect(computeStopOtp(ws([]), "Z", OPTIONS)).toMatchObject({ error: "not_found", stopId: "Z" });
  });

  it("reports an unknown route as not found, even at a known stop", () => {
    const result = computeStopOtp(
      { routeId: "R9", schedule: context(), positions: [] },
      "C",
      OPTIONS
    );
    expect(result).toEqual({
      error: "not_found",
      message: "Route R9 not found in the current schedule",
      routeId: "R9",
    });
  });
});
