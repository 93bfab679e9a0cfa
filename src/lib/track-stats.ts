import type { Track, TrackPoint } from './types';
import { pathDistanceNm } from './distance';
import { ValidationError } from './errors';

/**
 * Build a track from time-ordered points, deriving its statistics.
 */
export function buildTrack(name: string, points: TrackPoint[]): Track {
  if (points.length === 0) {
    throw new ValidationError(`Track "${name}" has no points`);
  }

  const startTime = points[0].time;
  const endTime = points[points.length - 1].time;

  return {
    name,
    points,
    startTime,
    endTime,
    durationMs: endTime.getTime() - startTime.getTime(),
    totalDistanceNm: pathDistanceNm(points),
    pointCount: points.length,
  };
}

/**
 * Stable ascending sort by timestamp. Returns a new array.
 */
export function sortByTime(points: readonly TrackPoint[]): TrackPoint[] {
  return [...points].sort((a, b) => a.time.getTime() - b.time.getTime());
}
