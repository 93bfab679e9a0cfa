import { describe, it, expect } from 'vitest';
import {
  splitGpx,
  splitByTracks,
  splitByTimeGap,
  generateTrackName,
  formatNameTimestamp,
  GPX_SPLITTER_DEFAULTS,
} from './gpx-splitter';
import { generateGpx, parseGpx } from './gpx-parser';
import { buildTrack } from './track-stats';
import { ValidationError } from './errors';
import type { TrackPoint } from './types';

const HOUR_MS = 3_600_000;
const T0 = Date.UTC(2024, 0, 1, 10);

// Local time, so the expected name does not depend on the machine's zone
const now = () => new Date(2024, 0, 2, 3, 4);

function point(lat: number, lon: number, hoursFromStart: number): TrackPoint {
  return { lat, lon, time: new Date(T0 + hoursFromStart * HOUR_MS) };
}

function createGpx(tracks: { name: string; points: TrackPoint[] }[]): string {
  const body = tracks.map(track => {
    const points = track.points.map(p =>
      `      <trkpt lat="${p.lat}" lon="${p.lon}"><time>${p.time.toISOString()}</time></trkpt>`
    ).join('\n');
    return `  <trk>
    <name>${track.name}</name>
    <trkseg>
${points}
    </trkseg>
  </trk>`;
  }).join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">
${body}
</gpx>`;
}

describe('generateTrackName', () => {
  it('should use the current time when start and end are in the same place', () => {
    expect(generateTrackName(point(0, 0, 0), point(0.0008, 0, 1), now)).toBe('Track_20240102_0304');
  });

  it('should use endpoint coordinates otherwise', () => {
    expect(generateTrackName(point(0, 0, 0), point(0.8333, 0, 1), now)).toBe('0.0000,0.0000 to 0.8333,0.0000');
    expect(generateTrackName(point(-33.8688, 151.2093, 0), point(0, 0, 1), now))
      .toBe('-33.8688,151.2093 to 0.0000,0.0000');
  });
});

describe('formatNameTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatNameTimestamp(new Date(2024, 8, 5, 7, 9))).toBe('20240905_0709');
  });
});

describe('splitByTracks', () => {
  it('should return one track per input track with its own name', () => {
    const tracks = [
      buildTrack('First', [point(0, 0, 0), point(0, 1, 1)]),
      buildTrack('Second', [point(1, 1, 5)]),
    ];

    const result = splitByTracks(tracks);

    expect(result.map(t => [t.name, t.pointCount])).toEqual([['First', 2], ['Second', 1]]);
    expect(result[0].durationMs).toBe(HOUR_MS);
  });
});

describe('splitByTimeGap', () => {
  it('should split only where the gap is long AND the jump is short', () => {
    const p1 = point(0, 0, 0);
    const p2 = point(0, 0.0001, 2);   // long gap, short jump: split
    const p3 = point(10, 10, 4);      // long gap, long jump: no split

    const segments = splitByTimeGap([buildTrack('All', [p1, p2, p3])], {}, now);

    expect(segments.map(s => s.points)).toEqual([[p1], [p2, p3]]);
    expect(segments.map(s => s.name)).toEqual([
      'Track_20240102_0304',
      '0.0000,0.0001 to 10.0000,10.0000',
    ]);
  });

  it('should not split on gaps shorter than maxTimeHours', () => {
    const points = [point(0, 0, 0), point(0, 0, 0.5), point(0, 0, 1.4)];
    expect(splitByTimeGap([buildTrack('All', points)], {}, now)).toHaveLength(1);
  });

  it('should split on a gap exactly maxTimeHours long', () => {
    const points = [point(0, 0, 0), point(0, 0, 1)];
    expect(splitByTimeGap([buildTrack('All', points)], {}, now)).toHaveLength(2);
  });

  it('should honour custom thresholds', () => {
    const points = [point(0, 0, 0), point(0, 0.5, 0.5), point(0, 0.5, 3)];

    // 30 minute gap with a 30 nm jump splits under loose limits
    const loose = splitByTimeGap([buildTrack('All', points)], { maxTimeHours: 0.25, maxDistanceNm: 40 }, now);
    expect(loose.map(s => s.pointCount)).toEqual([1, 1, 1]);

    const tight = splitByTimeGap([buildTrack('All', points)], { maxTimeHours: 3, maxDistanceNm: 0.5 }, now);
    expect(tight.map(s => s.pointCount)).toEqual([3]);
  });

  it('should merge and reorder points across tracks', () => {
    const a = buildTrack('A', [point(0, 0, 0), point(0, 0, 4)]);
    const b = buildTrack('B', [point(0, 0, 0.5)]);

    const segments = splitByTimeGap([a, b], {}, now);

    expect(segments.map(s => s.points.map(p => p.time.getTime()))).toEqual([
      [T0, T0 + 0.5 * HOUR_MS],
      [T0 + 4 * HOUR_MS],
    ]);
  });

  it('should keep every point exactly once', () => {
    const points = [0, 0.2, 1.5, 1.6, 5, 5.1, 9].map(h => point(0, 0, h));
    const segments = splitByTimeGap([buildTrack('All', points)], {}, now);

    expect(segments.flatMap(s => s.points)).toEqual(points);
    expect(segments.map(s => s.pointCount)).toEqual([2, 2, 2, 1]);
  });

  it('should throw ValidationError without points', () => {
    expect(() => splitByTimeGap([], {}, now)).toThrow(ValidationError);
  });
});

describe('splitGpx', () => {
  const gpx = createGpx([
    { name: 'Outbound', points: [point(-33.86, 151.21, 0), point(-33.8, 151.28, 1)] },
    { name: 'Return', points: [point(-33.8, 151.28, 3), point(-33.86, 151.21, 4)] },
  ]);

  it('should split by existing tracks by default', () => {
    const results = splitGpx(gpx, { now });

    expect(results.map(r => r.name)).toEqual(['Outbound', 'Return']);
    expect(results[0].content).toBe(generateGpx(results[0].points, 'Outbound'));
  });

  it('should produce content that parses back to the same points', () => {
    const [first] = splitGpx(gpx, { now });
    const [reparsed] = parseGpx(first.content);

    expect(reparsed.name).toBe('Outbound');
    expect(reparsed.points).toEqual(first.points);
  });

  it('should split by time gaps when asked', () => {
    const results = splitGpx(gpx, { method: 'time', now });

    // The 2 hour stop ends where it started, so the merged points split there
    expect(results.map(r => r.pointCount)).toEqual([2, 2]);
    expect(results.map(r => r.name)).toEqual([
      '-33.8600,151.2100 to -33.8000,151.2800',
      '-33.8000,151.2800 to -33.8600,151.2100',
    ]);
  });

  it('should not change the result when timestamps are required', () => {
    const withFlag = splitGpx(gpx, { method: 'time', requireTimestamps: true, now });
    const withoutFlag = splitGpx(gpx, { method: 'time', requireTimestamps: false, now });

    expect(withFlag.map(r => r.name)).toEqual(withoutFlag.map(r => r.name));
  });

  it('should expose its defaults', () => {
    expect(GPX_SPLITTER_DEFAULTS).toEqual({ maxDistanceNm: 1.0, maxTimeHours: 1.0, requireTimestamps: false });
  });
});
