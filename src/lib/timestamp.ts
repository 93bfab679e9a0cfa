/**
 * Timestamp parsing for GPX <time> values.
 *
 * Formats are tried in order; the first that yields a valid date wins.
 * Times without a zone designator are read as UTC.
 */

type TimestampParser = (text: string) => Date | null;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?(?:([+-])(\d{2})(?::?(\d{2}))?)?)?$/;
const UTC_SECONDS_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
const LOCAL_SECONDS_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Build a UTC date from calendar parts, rejecting out-of-range values
 * such as month 13 or 25:00 instead of letting Date roll them over.
 */
function fromParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0,
  offsetMinutes = 0
): Date | null {
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  const check = new Date(utc);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }
  return new Date(utc - offsetMinutes * 60_000);
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

const parseIso: TimestampParser = (text) => {
  // A trailing Z is the +00:00 offset
  const normalized = text.endsWith('Z') ? `${text.slice(0, -1)}+00:00` : text;
  const match = ISO_PATTERN.exec(normalized);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, sign, offsetHours, offsetMins] = match;
  const millisecond = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  let offsetMinutes = 0;
  if (sign && offsetHours) {
    offsetMinutes = (Number(offsetHours) * 60 + Number(offsetMins ?? 0)) * (sign === '-' ? -1 : 1);
  }

  return fromParts(
    Number(year),
    Number(month),
    Number(day),
    optionalNumber(hour),
    optionalNumber(minute),
    optionalNumber(second),
    millisecond,
    offsetMinutes
  );
};

function secondsParser(pattern: RegExp): TimestampParser {
  return (text) => {
    const match = pattern.exec(text);
    if (!match) return null;
    const [, year, month, day, hour, minute, second] = match;
    return fromParts(
      Number(year),
      Number(month),
      Number(day),
      Number(hour),
      Number(minute),
      Number(second)
    );
  };
}

export const TIMESTAMP_PARSERS: readonly TimestampParser[] = [
  parseIso,
  secondsParser(UTC_SECONDS_PATTERN),
  secondsParser(LOCAL_SECONDS_PATTERN),
];

/**
 * Parse a GPX timestamp. Returns null when no known format matches.
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  for (const parser of TIMESTAMP_PARSERS) {
    const date = parser(trimmed);
    if (date) return date;
  }
  return null;
}

/**
 * ISO-8601 in UTC, without milliseconds when they are zero.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('.000Z', 'Z');
}
