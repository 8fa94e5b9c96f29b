import { describe, it, expect } from "vitest";
import {
  gtfsTimeHour,
  isoDate,
  parseGtfsTime,
  scheduledInstantNear,
  serviceDateKey,
  splitGtfsTime,
} from "@/lib/analytics/gtfs-time";
import { GtfsTimeParseError } from "@/lib/errors";

describe("parseGtfsTime", () => {
  it("rolls hours past 23 into the next day", () => {
    const result = parseGtfsTime("25:30:00", new Date("2025-01-01T10:00:00Z"));
    expect(result.toISOString()).toBe("2025-01-02T01:30:00.000Z");
  });

  it("anchors ordinary times on the reference's UTC date", () => {
    const result = parseGtfsTime("08:05:30", new Date("2025-01-01T23:59:00Z"));
    expect(result.toISOString()).toBe("2025-01-01T08:05:30.000Z");
  });

  it("adds one day per 24 hours", () => {
    const result = parseGtfsTime("48:00:00", new Date("2025-01-01T00:00:00Z"));
    expect(result.toISOString()).toBe("2025-01-03T00:00:00.000Z");
  });

  it("accepts single-digit hours and surrounding whitespace", () => {
    const result = parseGtfsTime(" 7:05:00 ", new Date("2025-01-01T12:00:00Z"));
    expect(result.toISOString()).toBe("2025-01-01T07:05:00.000Z");
  });

  it.each(["8:5", "ab:00:00", "08:60:00", "08:00:61", "", "08:00:00:00"])(
    "rejects %j",
    (value) => {
      expect(() => parseGtfsTime(value, new Date("2025-01-01T00:00:00Z"))).toThrow(
        GtfsTimeParseError
      );
    }
  );

  it("keeps the offending value on the error", () => {
    try {
      splitGtfsTime("bad");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GtfsTimeParseError);
      expect(err instanceof GtfsTimeParseError && err.value).toBe("bad");
    }
  });
});

describe("gtfsTimeHour", () => {
  it("returns the unnormalized hour", () => {
    expect(gtfsTimeHour("25:30:00")).toBe(25);
    expect(gtfsTimeHour("06:00:00")).toBe(6);
  });

  it("returns null for malformed times", () => {
    expect(gtfsTimeHour("x")).toBeNull();
  });
});

describe("scheduledInstantNear", () => {
  it("uses the previous service day for an after-midnight observation", () => {
    const result = scheduledInstantNear("25:30:00", new Date("2025-01-02T01:35:00Z"));
    expect(result.toISOString()).toBe("2025-01-02T01:30:00.000Z");
  });

  it("keeps the same-day anchor when it is closer", () => {
    const result = scheduledInstantNear("25:30:00", new Date("2025-01-01T23:50:00Z"));
    expect(result.toISOString()).toBe("2025-01-02T01:30:00.000Z");
  });

  it("matches parseGtfsTime below 24 hours", () => {
    const observed = new Date("2025-01-01T08:03:00Z");
    expect(scheduledInstantNear("08:00:00", observed)).toEqual(parseGtfsTime("08:00:00", observed));
  });
});

describe("date keys", () => {
  it("formats UTC calendar dates", () => {
    const d = new Date("2025-03-09T23:59:59Z");
    expect(isoDate(d)).toBe("2025-03-09");
    expect(serviceDateKey(d)).toBe("20250309");
  });
});
