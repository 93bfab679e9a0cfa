import { JSDOM } from 'jsdom';
import type { ParseOptions, Track, TrackPoint, WarningHandler } from './types';
import { FormatError } from './errors';
import { logWarn } from './logger';
import { buildTrack, sortByTime } from './track-stats';
import { formatTimestamp, parseTimestamp } from './timestamp';

export const GPX_1_1_NAMESPACE = 'http://www.topografix.com/GPX/1/1';
export const GPX_1_0_NAMESPACE = 'http://www.topografix.com/GPX/1/0';

/**
 * Namespace conventions probed when locating GPX elements, in order.
 * null stands for unnamespaced elements.
 */
export const GPX_NAMESPACES: readonly (string | null)[] = [
  GPX_1_1_NAMESPACE,
  null,
  GPX_1_0_NAMESPACE,
];

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const MINUTE_MS = 60_000;

const defaultWarningHandler: WarningHandler = (message, extra) => {
  logWarn('gpx-parser', message, extra);
};

function parseXml(xml: string): Document {
  let doc: Document;
  try {
    doc = new JSDOM(xml, { contentType: 'text/xml' }).window.document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Invalid GPX file format: ${reason}`, { cause: error });
  }

  const parserError = doc.getElementsByTagName('parsererror')[0];
  if (parserError) {
    throw new FormatError(`Invalid GPX file format: ${parserError.textContent?.trim() ?? 'parse error'}`);
  }
  return doc;
}

/**
 * Descendants named localName under the first namespace convention that has any.
 */
function findElements(parent: Element, localName: string): Element[] {
  for (const namespace of GPX_NAMESPACES) {
    const found = parent.getElementsByTagNameNS(namespace, localName);
    if (found.length > 0) {
      return Array.from(found);
    }
  }
  return [];
}

/**
 * Direct child named localName, probing namespace conventions in order.
 */
function findChild(parent: Element, localName: string): Element | null {
  const children = Array.from(parent.children);
  for (const namespace of GPX_NAMESPACES) {
    const child = children.find(c => c.localName === localName && c.namespaceURI === namespace);
    if (child) return child;
  }
  return null;
}

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function parseCoordinate(value: string | null, min: number, max: number): number | null {
  if (value === null) return null;
  const text = value.trim();
  // Number() would also take hex, octal and binary literals
  if (!DECIMAL_PATTERN.test(text)) return null;
  const parsed = Number(text);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) return null;
  return parsed;
}

function parsePoint(trkpt: Element, index: number, now: () => Date): TrackPoint | null {
  const lat = parseCoordinate(trkpt.getAttribute('lat'), -90, 90);
  const lon = parseCoordinate(trkpt.getAttribute('lon'), -180, 180);
  if (lat === null || lon === null) {
    return null;
  }

  const timeText = findChild(trkpt, 'time')?.textContent ?? '';
  // Missing or unreadable times are spaced one minute apart from the current time
  const time = parseTimestamp(timeText) ?? new Date(now().getTime() + index * MINUTE_MS);

  return { lat, lon, time };
}

/**
 * Parse GPX XML content into tracks of time-ordered points.
 *
 * Tracks are located under the GPX 1.1 namespace, without a namespace, or
 * under the GPX 1.0 namespace, whichever matches first. Points with missing or
 * invalid coordinates are skipped and reported through options.onWarning;
 * tracks left without points are dropped.
 *
 * @throws FormatError when the XML is malformed or no track survives
 */
export function parseGpx(xml: string, options: ParseOptions = {}): Track[] {
  const now = options.now ?? (() => new Date());
  const onWarning = options.onWarning ?? defaultWarningHandler;
  const doc = parseXml(xml);

  const tracks: Track[] = [];
  const trkElements = findElements(doc.documentElement, 'trk');

  trkElements.forEach((trk, trackIndex) => {
    const defaultName = `Track_${String(trackIndex + 1).padStart(3, '0')}`;
    const name = findChild(trk, 'name')?.textContent?.trim() || defaultName;

    const points: TrackPoint[] = [];
    findElements(trk, 'trkpt').forEach((trkpt, pointIndex) => {
      const point = parsePoint(trkpt, pointIndex, now);
      if (point) {
        points.push(point);
      } else {
        onWarning('Skipping track point with invalid coordinates', {
          track: name,
          pointIndex,
          lat: trkpt.getAttribute('lat'),
          lon: trkpt.getAttribute('lon'),
        });
      }
    });

    if (points.length > 0) {
      tracks.push(buildTrack(name, sortByTime(points)));
    }
  });

  if (tracks.length === 0) {
    throw new FormatError('No valid tracks found in GPX file');
  }

  return tracks;
}

/**
 * Escape XML special characters
 */
function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Generate a single-track GPX 1.1 document. The XML declaration is left out;
 * see withXmlDeclaration.
 */
export function generateGpx(points: readonly TrackPoint[], trackName: string): string {
  let xml = `<gpx version="1.1" creator="Track Splitter" xmlns="${GPX_1_1_NAMESPACE}">
  <trk>
    <name>${escapeXml(trackName)}</name>
    <trkseg>
`;

  for (const pt of points) {
    xml += `      <trkpt lat="${pt.lat}" lon="${pt.lon}">
        <time>${formatTimestamp(pt.time)}</time>
      </trkpt>
`;
  }

  xml += `    </trkseg>
  </trk>
</gpx>`;

  return xml;
}

export function withXmlDeclaration(content: string): string {
  const trimmed = content.trimStart();
  if (trimmed.startsWith('<?xml')) {
    return trimmed;
  }
  return `${XML_DECLARATION}\n${trimmed}`;
}

/**
 * Re-emit the first track of a GPX document under a new name.
 */
export function renameGpxTrack(content: string, trackName: string, options: ParseOptions = {}): string {
  const [track] = parseGpx(content, options);
  return generateGpx(track.points, trackName);
}
