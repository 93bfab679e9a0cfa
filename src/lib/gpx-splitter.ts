import type { Clock, SplitGpxOptions, TimeSplitOptions, Track, TrackFile, TrackPoint } from './types';
import { parseGpx, generateGpx } from './gpx-parser';
import { distanceNm, pointDistanceNm } from './distance';
import { ValidationError } from './errors';
import { logInfo } from './logger';
import { buildTrack, sortByTime } from './track-stats';

const DEFAULT_OPTIONS: TimeSplitOptions = {
  maxDistanceNm: 1.0,
  maxTimeHours: 1.0,
  requireTimestamps: false,
};

/** Segments whose ends are closer than this (nm) are named by time instead of coordinates */
export const SAME_PLACE_THRESHOLD_NM = 0.1;

const HOUR_MS = 3_600_000;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in YYYYMMDD_HHMM form
 */
export function formatNameTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}`;
}

/**
 * Name a segment after its endpoints, or after the current time when it
 * starts and ends in the same place.
 */
export function generateTrackName(start: TrackPoint, end: TrackPoint, now: Clock = () => new Date()): string {
  if (distanceNm(start.lat, start.lon, end.lat, end.lon) < SAME_PLACE_THRESHOLD_NM) {
    return `Track_${formatNameTimestamp(now())}`;
  }
  return `${start.lat.toFixed(4)},${start.lon.toFixed(4)} to ${end.lat.toFixed(4)},${end.lon.toFixed(4)}`;
}

/**
 * One output per parsed track, keeping each track's own name and points.
 */
export function splitByTracks(tracks: readonly Track[]): Track[] {
  return tracks.map(track => buildTrack(track.name, track.points));
}

/**
 * Merge the points of all tracks and re-split them where the gap to the
 * previous point is at least maxTimeHours long AND no more than
 * maxDistanceNm wide. A long gap with a large jump stays in one segment.
 *
 * @throws ValidationError when there are no points at all
 */
export function splitByTimeGap(
  tracks: readonly Track[],
  options: Partial<TimeSplitOptions> = {},
  now: Clock = () => new Date()
): Track[] {
  const opts: TimeSplitOptions = {
    maxDistanceNm: options.maxDistanceNm ?? DEFAULT_OPTIONS.maxDistanceNm,
    maxTimeHours: options.maxTimeHours ?? DEFAULT_OPTIONS.maxTimeHours,
    requireTimestamps: options.requireTimestamps ?? DEFAULT_OPTIONS.requireTimestamps,
  };
  const allPoints = sortByTime(tracks.flatMap(track => track.points));

  if (allPoints.length === 0) {
    throw new ValidationError('No valid track points found in GPX file');
  }

  const segments: TrackPoint[][] = [];
  let current: TrackPoint[] = [allPoints[0]];

  for (let i = 1; i < allPoints.length; i++) {
    const previous = allPoints[i - 1];
    const point = allPoints[i];
    const timeDiffHours = (point.time.getTime() - previous.time.getTime()) / HOUR_MS;
    const distance = pointDistanceNm(previous, point);

    if (timeDiffHours >= opts.maxTimeHours && distance <= opts.maxDistanceNm) {
      segments.push(current);
      current = [point];
    } else {
      current.push(point);
    }
  }
  segments.push(current);

  return segments.map(points =>
    buildTrack(generateTrackName(points[0], points[points.length - 1], now), points)
  );
}

/**
 * Parse GPX content, split it with the chosen method and serialize each
 * resulting track.
 */
export function splitGpx(gpxContent: string, options: SplitGpxOptions = {}): TrackFile[] {
  const { method = 'tracks', now, onWarning, ...timeOptions } = options;
  const tracks = parseGpx(gpxContent, { now, onWarning });

  const split = method === 'time'
    ? splitByTimeGap(tracks, timeOptions, now)
    : splitByTracks(tracks);

  logInfo('gpx-splitter', `Created ${split.length} track files`, { method });

  return split.map(track => ({
    ...track,
    content: generateGpx(track.points, track.name),
  }));
}

export { DEFAULT_OPTIONS as GPX_SPLITTER_DEFAULTS };
