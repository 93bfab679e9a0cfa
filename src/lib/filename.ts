const MAX_FILENAME_LENGTH = 240;

/**
 * Sanitize a track name to make it a valid filename (without extension)
 */
export function sanitizeFilename(name: string): string {
  const sanitized = name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/[, ]+/g, '_')
    .replace(/^[_.]+|[_.]+$/g, '')
    .slice(0, MAX_FILENAME_LENGTH);

  return sanitized || 'track';
}

/**
 * Filenames for a list of track names, with _2, _3, ... appended to repeats
 */
export function uniqueFilenames(names: readonly string[], extension = '.gpx'): string[] {
  const seen = new Map<string, number>();

  return names.map(name => {
    const base = sanitizeFilename(name);
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? `${base}${extension}` : `${base}_${count}${extension}`;
  });
}
