/**
 * Error types for the analytics engine.
 *
 * Thrown errors are reserved for failures that should stop a run (bad
 * configuration, an unreachable store). Everything that only concerns one
 * record or one route is reported as a value instead.
 */

export class AnalyticsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AnalyticsError {}

export class StoreError extends AnalyticsError {}

export class GtfsTimeParseError extends AnalyticsError {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid GTFS time "${value}"`);
    this.value = value;
  }
}

export interface NotFoundResult {
  error: "not_found";
  message: string;
  routeId: string;
  stopId?: string;
}

export function notFound(routeId: string, message: string, stopId?: string): NotFoundResult {
  return stopId === undefined
    ? { error: "not_found", message, routeId }
    : { error: "not_found", message, routeId, stopId };
}

export function isNotFound<T extends object>(result: T | NotFoundResult): result is NotFoundResult {
  return "error" in result && result.error === "not_found";
}
