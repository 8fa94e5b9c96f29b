/**
 * UTC day windows, and parsing of the day selection the daily job accepts:
 * `date=YYYY-MM-DD` for a single day or `days=N` for the last N days
 * (today included).
 */

import { ConfigError } from "@/lib/errors";
import type { TimeWindow } from "@/lib/types";
import { isoDate } from "./gtfs-time";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type DateFilter =
  | { mode: "date"; dates: string[] }
  | { mode: "period"; days: number; dates: string[] };

/** Inclusive window covering one UTC calendar day. */
export function dayWindow(date: string): TimeWindow {
  const start = new Date(date + "T00:00:00Z");
  if (!DATE_PATTERN.test(date) || Number.isNaN(start.getTime()) || isoDate(start) !== date) {
    throw new ConfigError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return { start, end: new Date(start.getTime() + DAY_MS - 1) };
}

/** The last `days` UTC dates ending with `now`'s, oldest first. */
export function lastNDays(days: number, now: Date = new Date()): string[] {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const dates: string[] = [];
  for (let i = days - 1; i >= 0; i--) {
    dates.push(isoDate(new Date(today - i * DAY_MS)));
  }
  return dates;
}

/** Window spanning the first and last of a list of dates. */
export function spanWindow(dates: readonly string[]): TimeWindow | null {
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (first === undefined || last === undefined) return null;
  return { start: dayWindow(first).start, end: dayWindow(last).end };
}

export function parseDateFilter(
  days: string | null | undefined,
  dateParam: string | null | undefined,
  defaultDays: number,
  now: Date = new Date()
): DateFilter {
  // Specific date takes priority
  if (dateParam) {
    dayWindow(dateParam);
    return { mode: "date", dates: [dateParam] };
  }

  let n = defaultDays;
  if (days !== null && days !== undefined) {
    n = Number(days);
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigError(`Invalid day count "${days}", expected a positive integer`);
    }
  }
  return { mode: "period", days: n, dates: lastNDays(n, now) };
}
