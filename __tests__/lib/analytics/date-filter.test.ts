import { describe, it, expect } from "vitest";
import { dayWindow, lastNDays, parseDateFilter, spanWindow } from "@/lib/analytics/date-filter";
import { ConfigError } from "@/lib/errors";

const NOW = new Date("2025-01-06T10:30:00Z");

describe("dayWindow", () => {
  it("covers the whole UTC day inclusively", () => {
    const w = dayWindow("2025-01-06");
    expect(w.start.toISOString()).toBe("2025-01-06T00:00:00.000Z");
    expect(w.end.toISOString()).toBe("2025-01-06T23:59:59.999Z");
  });

  it.each(["2025-02-30", "2025-1-6", "yesterday"])("rejects %j", (date) => {
    expect(() => dayWindow(date)).toThrow(ConfigError);
  });
});

describe("lastNDays", () => {
  it("lists dates oldest first, today included", () => {
    expect(lastNDays(3, NOW)).toEqual(["2025-01-04", "2025-01-05", "2025-01-06"]);
  });

  it("crosses month and year boundaries", () => {
    expect(lastNDays(2, new Date("2025-01-01T00:00:00Z"))).toEqual(["2024-12-31", "2025-01-01"]);
  });
});

describe("spanWindow", () => {
  it("spans the first to the last date", () => {
    const w = spanWindow(["2025-01-04", "2025-01-06"]);
    expect(w?.start.toISOString()).toBe("2025-01-04T00:00:00.000Z");
    expect(w?.end.toISOString()).toBe("2025-01-06T23:59:59.999Z");
  });

  it("is null for no dates", () => {
    expect(spanWindow([])).toBeNull();
  });
});

describe("parseDateFilter", () => {
  it("prefers a specific date", () => {
    expect(parseDateFilter("7", "2025-01-02", 7, NOW)).toEqual({
      mode: "date",
      dates: ["2025-01-02"],
    });
  });

  it("uses a day count", () => {
    expect(parseDateFilter("2", null, 7, NOW)).toEqual({
      mode: "period",
      days: 2,
      dates: ["2025-01-05", "2025-01-06"],
    });
  });

  it("falls back to the default day count", () => {
    expect(parseDateFilter(undefined, undefined, 1, NOW)).toEqual({
      mode: "period",
      days: 1,
      dates: ["2025-01-06"],
    });
  });

  it.each(["0", "-3", "1.5", "abc"])("rejects a day count of %j", (days) => {
    expect(() => parseDateFilter(days, null, 7, NOW)).toThrow(ConfigError);
  });

  it("rejects an invalid date", () => {
    expect(() => parseDateFilter(null, "2025-13-01", 7, NOW)).toThrow(ConfigError);
  });
});
