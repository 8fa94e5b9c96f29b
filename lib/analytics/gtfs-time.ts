/**
 * GTFS schedule clock.
 *
 * Schedule times are "H:MM:SS" strings relative to the service day, where H
 * may run past 23 for trips that continue after midnight ("25:30:00" is
 * 01:30 the following calendar day). All calendar arithmetic is in UTC.
 */

import { GtfsTimeParseError } from "@/lib/errors";

const DAY_MS = 24 * 60 * 60 * 1000;
const TIME_PATTERN = /^(\d+):(\d{2}):(\d{2})$/;

export interface GtfsTimeParts {
  hours: number;
  minutes: number;
  seconds: number;
}

export function splitGtfsTime(value: string): GtfsTimeParts {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) throw new GtfsTimeParseError(value);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);
  if (minutes > 59 || seconds > 59) throw new GtfsTimeParseError(value);
  return { hours, minutes, seconds };
}

/**
 * Absolute instant of a schedule time on the UTC date of `reference`:
 * hour H mod 24 on that date, plus ⌊H/24⌋ days.
 */
export function parseGtfsTime(value: string, reference: Date): Date {
  const { hours, minutes, seconds } = splitGtfsTime(value);
  const midnight = Date.UTC(
    reference.getUTCFullYear(),
    reference.getUTCMonth(),
    reference.getUTCDate()
  );
  const wallClock = ((hours % 24) * 3600 + minutes * 60 + seconds) * 1000;
  return new Date(midnight + Math.floor(hours / 24) * DAY_MS + wallClock);
}

/** Unnormalized hour of a schedule time, or null when it does not parse. */
export function gtfsTimeHour(value: string): number | null {
  try {
    return splitGtfsTime(value).hours;
  } catch {
    return null;
  }
}

/**
 * Scheduled instant for an observation. Times past 24:00 may belong to the
 * previous day's service, so for those both anchors are tried and the one
 * closer to `observedAt` wins.
 */
export function scheduledInstantNear(value: string, observedAt: Date): Date {
  const sameDay = parseGtfsTime(value, observedAt);
  if (splitGtfsTime(value).hours < 24) return sameDay;

  const previousDay = new Date(sameDay.getTime() - DAY_MS);
  const t = observedAt.getTime();
  return Math.abs(t - previousDay.getTime()) < Math.abs(t - sameDay.getTime())
    ? previousDay
    : sameDay;
}

/** UTC calendar date as YYYY-MM-DD. */
export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** UTC calendar date as YYYYMMDD, the GTFS calendar format. */
export function serviceDateKey(d: Date): string {
  return isoDate(d).replace(/-/g, "");
}
