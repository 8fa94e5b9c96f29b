import { describe, it, expect } from "vitest";
import { parseWorkerArgs } from "@/worker/src/args";
import { ConfigError } from "@/lib/errors";

describe("parseWorkerArgs", () => {
  it("defaults to the scheduler loop", () => {
    expect(parseWorkerArgs([])).toEqual({ once: false, days: null, date: null, routeId: null });
  });

  it("reads every option", () => {
    expect(parseWorkerArgs(["--once", "--days=3", "--date=2025-01-06", "--route=R1"])).toEqual({
      once: true,
      days: "3",
      date: "2025-01-06",
      routeId: "R1",
    });
  });

  it("leaves value validation to the date filter", () => {
    expect(parseWorkerArgs(["--days=abc"]).days).toBe("abc");
  });

  it("rejects a route option without a value", () => {
    expect(() => parseWorkerArgs(["--route="])).toThrow("--route needs a route id");
  });

  it.each([{ argv: ["--verbose"] }, { argv: ["once"] }, { argv: ["--once", "extra"] }])(
    "rejects $argv",
    ({ argv }) => {
      expect(() => parseWorkerArgs(argv)).toThrow(ConfigError);
    }
  );
});
