/**
 * Index of (date, service variant) pairs whose normal service was removed.
 *
 * "Added" exceptions are not indexed: they mark the holiday or special
 * schedule that runs that day, and its trips are valid service. Only trips
 * of a cancelled variant are excluded.
 */

import type { ServiceExceptionDate } from "@/lib/types";

export class ExceptionDateIndex {
  private readonly removed = new Set<string>();
  private readonly removedDates = new Set<string>();

  constructor(records: Iterable<ServiceExceptionDate>) {
    for (const r of records) {
      if (r.kind !== "removed") continue;
      this.removed.add(key(r.date, r.serviceId));
      this.removedDates.add(r.date);
    }
  }

  static empty(): ExceptionDateIndex {
    return new ExceptionDateIndex([]);
  }

  /** `date` is YYYYMMDD. */
  has(date: string, serviceId: string): boolean {
    return this.removed.has(key(date, serviceId));
  }

  get size(): number {
    return this.removed.size;
  }

  /** Distinct dates carrying at least one removal, ascending. */
  dates(): string[] {
    return [...this.removedDates].sort();
  }
}

const key = (date: string, serviceId: string) => `${date}|${serviceId}`;
