import type { TrackPoint } from './types';

export const EARTH_RADIUS_KM = 6371.0;
export const KM_PER_NAUTICAL_MILE = 1.852;

/**
 * Calculate great-circle distance between two coordinates using the Haversine formula.
 * Returns distance in kilometers.
 */
export function haversineDistanceKm(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const φ1 = lat1 * Math.PI / 180;
  const φ2 = lat2 * Math.PI / 180;
  const Δφ = (lat2 - lat1) * Math.PI / 180;
  const Δλ = (lon2 - lon1) * Math.PI / 180;

  const h = Math.sin(Δφ / 2) ** 2 +
            Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) ** 2;
  // Rounding can push h just past 1 for antipodal points
  const a = Math.min(1, Math.max(0, h));
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

/**
 * Calculate great-circle distance between two coordinates.
 * Returns distance in nautical miles
 */
export function distanceNm(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  return haversineDistanceKm(lat1, lon1, lat2, lon2) / KM_PER_NAUTICAL_MILE;
}

export function pointDistanceNm(p1: TrackPoint, p2: TrackPoint): number {
  return distanceNm(p1.lat, p1.lon, p2.lat, p2.lon);
}

/**
 * Sum of distances between consecutive points, in nautical miles
 */
export function pathDistanceNm(points: readonly TrackPoint[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += pointDistanceNm(points[i - 1], points[i]);
  }
  return total;
}
