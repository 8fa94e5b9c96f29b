/**
 * Great-circle distance and nearest-stop lookup.
 */

const EARTH_RADIUS_M = 6371000;

export const METERS_PER_SECOND_TO_MPH = 2.23694;
export const METERS_PER_MILE = 1609.34;

export function haversineM(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = ((lat2 - lat1) * Math.PI) / 180;
  const dLon = ((lon2 - lon1) * Math.PI) / 180;
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos((lat1 * Math.PI) / 180) * Math.cos((lat2 * Math.PI) / 180) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) && Number.isFinite(lon) && Math.abs(lat) <= 90 && Math.abs(lon) <= 180
  );
}

export interface Located {
  lat: number;
  lon: number;
}

export interface Nearest<T> {
  item: T;
  distanceM: number;
}

/**
 * Closest candidate to a point, optionally bounded by `maxDistM`. The first
 * candidate wins on equal distance.
 */
export function nearest<T extends Located>(
  lat: number,
  lon: number,
  candidates: Iterable<T>,
  maxDistM: number = Infinity
): Nearest<T> | null {
  let best: Nearest<T> | null = null;
  for (const c of candidates) {
    const distanceM = haversineM(lat, lon, c.lat, c.lon);
    if (distanceM > maxDistM) continue;
    if (best === null || distanceM < best.distanceM) {
      best = { item: c, distanceM };
    }
  }
  return best;
}
