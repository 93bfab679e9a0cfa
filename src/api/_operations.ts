import { randomUUID } from 'crypto';
import type {
  Clock,
  Operation,
  PlaceNames,
  ProgressResponse,
  SplitMethod,
  TrackFile,
  TrackSummary,
} from '../lib/types';
import { splitGpx } from '../lib/gpx-splitter';
import { renameGpxTrack } from '../lib/gpx-parser';
import { summarizeTrack, sortNewestFirst } from '../lib/track-summary';
import { logError, logInfo, logWarn } from '../lib/logger';
import type { OperationStore } from './_store';
import type { PlaceNameLookup } from './_geocode';

export interface SplitRequest {
  gpxContent: string;
  splitMethod: SplitMethod;
  maxDistanceNm: number;
  maxTimeHours: number;
  requireTimestamps: boolean;
  lookupPlaceNames: boolean;
}

export interface TrackRename {
  newName: string;
  startPlaceName?: string;
  endPlaceName?: string;
}

interface ServiceDeps {
  generateId: () => string;
  now: Clock;
}

const HEALTH_CHECK_ID = 'health-check';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs split operations: splits synchronously, then annotates place names in
 * the background while progress is written to the store.
 */
export class OperationService {
  private deps: ServiceDeps;
  private pending = new Map<string, Promise<void>>();

  constructor(
    private store: OperationStore,
    private geocoder: PlaceNameLookup,
    deps: Partial<ServiceDeps> = {}
  ) {
    this.deps = {
      generateId: deps.generateId ?? randomUUID,
      now: deps.now ?? (() => new Date()),
    };
  }

  /**
   * Split the GPX content and register the operation. Place-name annotation
   * continues after this resolves; poll progress() for the outcome.
   *
   * @throws FormatError or ValidationError for unusable input
   */
  async start(request: SplitRequest): Promise<Operation> {
    const trackFiles = splitGpx(request.gpxContent, {
      method: request.splitMethod,
      maxDistanceNm: request.maxDistanceNm,
      maxTimeHours: request.maxTimeHours,
      requireTimestamps: request.requireTimestamps,
      now: this.deps.now,
      onWarning: (message, extra) => logWarn('gpx-parser', message, extra),
    });

    const operation: Operation = {
      id: this.deps.generateId(),
      splitMethod: request.splitMethod,
      status: 'processing',
      lookupPlaceNames: request.lookupPlaceNames,
      total: request.lookupPlaceNames ? trackFiles.length * 2 : 0,
      completed: 0,
      currentTrack: 0,
      totalTracks: trackFiles.length,
      tracks: null,
      error: null,
      createdAt: this.deps.now().toISOString(),
    };
    await this.store.set(operation.id, operation);

    // The annotation works on its own copy; the caller keeps the initial state
    const task = this.annotate({ ...operation }, trackFiles).finally(() => {
      this.pending.delete(operation.id);
    });
    this.pending.set(operation.id, task);

    return operation;
  }

  /**
   * Resolves once background work for the operation has finished.
   */
  async settled(id: string): Promise<void> {
    await this.pending.get(id);
  }

  async getOperation(id: string): Promise<Operation | null> {
    return this.store.get(id);
  }

  async progress(id: string): Promise<ProgressResponse | null> {
    const operation = await this.store.get(id);
    if (!operation) return null;

    const percentage = operation.total > 0
      ? Math.round((operation.completed / operation.total) * 1000) / 10
      : 0;

    const response: ProgressResponse = {
      success: true,
      total: operation.total,
      completed: operation.completed,
      remaining: operation.total - operation.completed,
      currentTrack: operation.currentTrack,
      totalTracks: operation.totalTracks,
      percentage,
      status: operation.status,
    };

    if (operation.status === 'complete' && operation.tracks) {
      response.tracks = operation.tracks;
      response.splitMethod = operation.splitMethod;
      response.operationId = operation.id;
    } else if (operation.status === 'error' && operation.error) {
      response.error = operation.error;
    }

    return response;
  }

  /**
   * Rename a stored track, regenerating its GPX content, and optionally
   * replace its place names.
   */
  async renameTrack(operation: Operation, trackIndex: number, rename: TrackRename): Promise<TrackSummary> {
    if (!operation.tracks || trackIndex < 0 || trackIndex >= operation.tracks.length) {
      throw new RangeError(`No track ${trackIndex} in operation ${operation.id}`);
    }

    const current = operation.tracks[trackIndex];
    const name = rename.newName.trim();
    const updated: TrackSummary = {
      ...current,
      name,
      content: renameGpxTrack(current.content, name),
      startPlaceName: rename.startPlaceName ?? current.startPlaceName,
      endPlaceName: rename.endPlaceName ?? current.endPlaceName,
    };

    const tracks = [...operation.tracks];
    tracks[trackIndex] = updated;
    await this.store.set(operation.id, { ...operation, tracks });

    logInfo('operations', `Track ${trackIndex} renamed`, { operationId: operation.id, name });
    return updated;
  }

  /**
   * Write, read back and remove a probe entry.
   */
  async checkStore(): Promise<boolean> {
    const probe: Operation = {
      id: HEALTH_CHECK_ID,
      splitMethod: 'tracks',
      status: 'complete',
      lookupPlaceNames: false,
      total: 0,
      completed: 0,
      currentTrack: 0,
      totalTracks: 0,
      tracks: [],
      error: null,
      createdAt: this.deps.now().toISOString(),
    };
    await this.store.set(HEALTH_CHECK_ID, probe);
    const retrieved = await this.store.get(HEALTH_CHECK_ID);
    await this.store.delete(HEALTH_CHECK_ID);
    return retrieved?.createdAt === probe.createdAt;
  }

  private async lookupPlaces(operation: Operation, track: TrackFile): Promise<PlaceNames> {
    const start = track.points[0];
    const end = track.points[track.points.length - 1];

    const startPlaceName = (await this.geocoder.lookup(start.lat, start.lon)) ?? '';
    operation.completed += 1;
    await this.store.set(operation.id, operation);

    const endPlaceName = (await this.geocoder.lookup(end.lat, end.lon)) ?? '';
    operation.completed += 1;
    await this.store.set(operation.id, operation);

    return { startPlaceName, endPlaceName };
  }

  // Never rejects: failures are recorded on the operation
  private async annotate(operation: Operation, trackFiles: TrackFile[]): Promise<void> {
    try {
      const summaries: TrackSummary[] = [];

      for (const [index, track] of trackFiles.entries()) {
        let places: PlaceNames = { startPlaceName: '', endPlaceName: '' };

        if (operation.lookupPlaceNames) {
          operation.currentTrack = index + 1;
          await this.store.set(operation.id, operation);
          logInfo('operations', `Looking up place names for track ${index + 1}/${trackFiles.length}`, {
            operationId: operation.id,
            track: track.name,
          });
          places = await this.lookupPlaces(operation, track);
        }

        summaries.push(summarizeTrack(track, places));
      }

      operation.tracks = sortNewestFirst(summaries);
      operation.status = 'complete';
      operation.currentTrack = trackFiles.length;
      await this.store.set(operation.id, operation);

      logInfo('operations', `Processed GPX file into ${summaries.length} tracks`, {
        operationId: operation.id,
        splitMethod: operation.splitMethod,
        lookupPlaceNames: operation.lookupPlaceNames,
      });
    } catch (error) {
      logError('operations:annotate', error, { operationId: operation.id });
      operation.status = 'error';
      operation.error = errorMessage(error);
      await this.store.set(operation.id, operation).catch((storeError: unknown) => {
        logError('operations:store', storeError, { operationId: operation.id });
      });
    }
  }
}
