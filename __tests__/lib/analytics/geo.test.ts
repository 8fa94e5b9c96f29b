import { describe, it, expect } from "vitest";
import { haversineM, isValidCoordinate, nearest } from "@/lib/analytics/geo";

describe("haversineM", () => {
  it("is zero for the same point", () => {
    expect(haversineM(52.37, 4.89, 52.37, 4.89)).toBe(0);
  });

  it("measures 0.001° of latitude as about 111.2 m", () => {
    expect(haversineM(0, 0, 0.001, 0)).toBeCloseTo(111.195, 2);
  });

  it("is symmetric", () => {
    const a = haversineM(38.9, -77.03, 38.91, -77.0);
    const b = haversineM(38.91, -77.0, 38.9, -77.03);
    expect(a).toBeCloseTo(b, 9);
  });
});

describe("isValidCoordinate", () => {
  it("accepts in-range values", () => {
    expect(isValidCoordinate(-90, 180)).toBe(true);
  });

  it("rejects out-of-range and non-finite values", () => {
    expect(isValidCoordinate(91, 0)).toBe(false);
    expect(isValidCoordinate(0, -181)).toBe(false);
    expect(isValidCoordinate(Number.NaN, 0)).toBe(false);
  });
});

describe("nearest", () => {
  const points = [
    { id: "a", lat: 0, lon: 0 },
    { id: "b", lat: 0.002, lon: 0 },
    { id: "c", lat: 0.002, lon: 0 },
  ];

  it("returns the closest candidate and its distance", () => {
    const hit = nearest(0.0015, 0, points);
    expect(hit?.item.id).toBe("b");
    expect(hit?.distanceM).toBeCloseTo(55.6, 1);
  });

  it("keeps the first of equally distant candidates", () => {
    expect(nearest(0.003, 0, points)?.item.id).toBe("b");
  });

  it("returns null beyond the bound", () => {
    expect(nearest(0.01, 0, points, 100)).toBeNull();
  });

  it("returns null without candidates", () => {
    expect(nearest(0, 0, [])).toBeNull();
  });
});
