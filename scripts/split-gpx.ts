/**
 * Split a GPX file into one file per track, or into segments separated by
 * stops, and write them to a directory.
 *
 * Usage: tsx scripts/split-gpx.ts <input.gpx> [options]
 *   --method tracks|time   split by existing tracks (default) or by time gaps
 *   --max-distance <nm>    largest jump across a gap that still splits (default 1.0)
 *   --max-time <hours>     shortest gap that splits (default 1.0)
 *   --out <dir>            output directory (default: next to the input file)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  splitGpx,
  withXmlDeclaration,
  uniqueFilenames,
  isClientError,
  GPX_SPLITTER_DEFAULTS,
  type SplitMethod,
  type TrackFile,
} from '../src/lib/index.js';

const VALUE_OPTIONS = ['--method', '--max-distance', '--max-time', '--out'];

function printUsage(): void {
  console.log('Usage: tsx scripts/split-gpx.ts <input.gpx> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --method tracks|time   Split by existing tracks or by time gaps (default tracks)');
  console.log(`  --max-distance <nm>    Largest jump across a gap that still splits (default ${GPX_SPLITTER_DEFAULTS.maxDistanceNm})`);
  console.log(`  --max-time <hours>     Shortest gap that splits (default ${GPX_SPLITTER_DEFAULTS.maxTimeHours})`);
  console.log('  --out <dir>            Output directory');
}

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function numberOption(args: string[], name: string, fallback: number): number {
  const value = optionValue(args, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.error(`Error: ${name} must be a non-negative number, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}

function main() {
  const args = process.argv.slice(2);
  const fileArgs = args.filter((arg, i) => !arg.startsWith('--') && !VALUE_OPTIONS.includes(args[i - 1]));

  if (fileArgs.length < 1) {
    printUsage();
    process.exit(1);
  }

  const inputPath = fileArgs[0];
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: Input file not found: ${inputPath}`);
    process.exit(1);
  }

  const methodArg = optionValue(args, '--method') ?? 'tracks';
  if (methodArg !== 'tracks' && methodArg !== 'time') {
    console.error(`Error: --method must be "tracks" or "time", got "${methodArg}"`);
    process.exit(1);
  }
  const method: SplitMethod = methodArg;
  const maxDistanceNm = numberOption(args, '--max-distance', GPX_SPLITTER_DEFAULTS.maxDistanceNm);
  const maxTimeHours = numberOption(args, '--max-time', GPX_SPLITTER_DEFAULTS.maxTimeHours);
  const outDir = optionValue(args, '--out') ?? path.dirname(inputPath);

  console.log('GPX Track Splitter');
  console.log('==================');
  console.log(`Input: ${inputPath}`);
  console.log(`Method: ${method}${method === 'time' ? ` (gap >= ${maxTimeHours}h, jump <= ${maxDistanceNm}nm)` : ''}`);

  let trackFiles: TrackFile[];
  try {
    trackFiles = splitGpx(fs.readFileSync(inputPath, 'utf-8'), { method, maxDistanceNm, maxTimeHours });
  } catch (error) {
    if (isClientError(error)) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  fs.mkdirSync(outDir, { recursive: true });
  const filenames = uniqueFilenames(trackFiles.map(t => t.name));

  console.log(`\nWriting ${trackFiles.length} track(s) to ${outDir}`);
  trackFiles.forEach((track, i) => {
    const outputPath = path.join(outDir, filenames[i]);
    fs.writeFileSync(outputPath, withXmlDeclaration(track.content));
    const hours = (track.durationMs / 3_600_000).toFixed(2);
    console.log(`  ✓ ${filenames[i]} (${track.pointCount} points, ${hours}h, ${track.totalDistanceNm.toFixed(2)}nm)`);
  });
}

main();
