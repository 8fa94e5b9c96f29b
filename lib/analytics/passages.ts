/**
 * Stop-passage deduplication shared by OTP and headway calculations.
 *
 * With 30–120 s sampling a vehicle is usually seen several times near the
 * same stop. Only the last sighting per vehicle, trip, stop and day is kept:
 * it approximates the departure, and a bus that arrives early but holds
 * until its scheduled time still lets passengers board.
 */

import { isoDate } from "./gtfs-time";

export interface StopObservation {
  vehicleId: string;
  /** Scheduled trip id, or a per-vehicle fallback key when none is known. */
  tripKey: string;
  stopId: string;
  observedAt: Date;
  /** Observed minus scheduled, seconds. Null when no schedule applies. */
  offsetSeconds: number | null;
}

export function fallbackTripKey(vehicleId: string): string {
  return `unknown_${vehicleId}`;
}

export function passageKey(o: StopObservation): string {
  return [o.vehicleId, o.tripKey, o.stopId, isoDate(o.observedAt)].join("|");
}

function isLater(candidate: StopObservation, current: StopObservation): boolean {
  const dt = candidate.observedAt.getTime() - current.observedAt.getTime();
  if (dt !== 0) return dt > 0;
  return (candidate.offsetSeconds ?? -Infinity) > (current.offsetSeconds ?? -Infinity);
}

/**
 * One observation per (vehicle, trip, stop, UTC date), the latest one. The
 * date is part of the key, so the same combination on different days never
 * merges. Output is ordered by observation time.
 */
export function deduplicatePassages<T extends StopObservation>(records: readonly T[]): T[] {
  const latest = new Map<string, T>();
  for (const r of records) {
    const key = passageKey(r);
    const current = latest.get(key);
    if (current === undefined || isLater(r, current)) {
      latest.set(key, r);
    }
  }
  return [...latest.values()].sort(
    (a, b) =>
      a.observedAt.getTime() - b.observedAt.getTime() ||
      (passageKey(a) < passageKey(b) ? -1 : passageKey(a) > passageKey(b) ? 1 : 0)
  );
}
