import type { PlaceNames, TrackFile, TrackSummary } from './types';
import { formatTimestamp } from './timestamp';

const HOUR_MS = 3_600_000;

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function formatCoords(lat: number, lon: number): string {
  return `${lat.toFixed(4)},${lon.toFixed(4)}`;
}

/**
 * JSON-ready view of a split track for display and download
 */
export function summarizeTrack(
  track: TrackFile,
  places: PlaceNames = { startPlaceName: '', endPlaceName: '' }
): TrackSummary {
  const start = track.points[0];
  const end = track.points[track.points.length - 1];

  return {
    name: track.name,
    startTime: formatTimestamp(track.startTime),
    endTime: formatTimestamp(track.endTime),
    durationHours: round(track.durationMs / HOUR_MS, 2),
    totalDistanceNm: round(track.totalDistanceNm, 2),
    pointCount: track.pointCount,
    content: track.content,
    points: track.points.map(pt => ({ lat: pt.lat, lon: pt.lon, time: formatTimestamp(pt.time) })),
    startLat: start.lat,
    startLon: start.lon,
    endLat: end.lat,
    endLon: end.lon,
    startCoords: formatCoords(start.lat, start.lon),
    endCoords: formatCoords(end.lat, end.lon),
    startPlaceName: places.startPlaceName,
    endPlaceName: places.endPlaceName,
  };
}

/**
 * Newest track first. Returns a new array.
 */
export function sortNewestFirst(summaries: readonly TrackSummary[]): TrackSummary[] {
  return [...summaries].sort((a, b) => Date.parse(b.startTime) - Date.parse(a.startTime));
}
