import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parseGpx } from '../lib/gpx-parser';
import { FormatError } from '../lib/errors';
import type { Operation } from '../lib/types';
import { OperationService, type SplitRequest } from './_operations';
import { MemoryOperationStore, type OperationStore } from './_store';
import type { PlaceNameLookup } from './_geocode';

const GPX = `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <name>Older</name>
    <trkseg>
      <trkpt lat="-33.86" lon="151.21"><time>2024-01-01T09:00:00Z</time></trkpt>
      <trkpt lat="-33.8" lon="151.28"><time>2024-01-01T10:00:00Z</time></trkpt>
    </trkseg>
  </trk>
  <trk>
    <name>Newer</name>
    <trkseg>
      <trkpt lat="-34" lon="151"><time>2024-02-01T09:00:00Z</time></trkpt>
      <trkpt lat="-34.1" lon="151.1"><time>2024-02-01T09:30:00Z</time></trkpt>
    </trkseg>
  </trk>
</gpx>`;

class FakeGeocoder implements PlaceNameLookup {
  calls: [number, number][] = [];

  async lookup(lat: number, lon: number): Promise<string | null> {
    this.calls.push([lat, lon]);
    return `Place ${lat},${lon}`;
  }
}

function request(overrides: Partial<SplitRequest> = {}): SplitRequest {
  return {
    gpxContent: GPX,
    splitMethod: 'tracks',
    maxDistanceNm: 1,
    maxTimeHours: 1,
    requireTimestamps: false,
    lookupPlaceNames: false,
    ...overrides,
  };
}

function createService(geocoder: PlaceNameLookup = new FakeGeocoder(), store: OperationStore = new MemoryOperationStore(60)) {
  return new OperationService(store, geocoder, {
    generateId: () => 'op-1',
    now: () => new Date(Date.UTC(2024, 5, 1, 12)),
  });
}

describe('OperationService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register a processing operation', async () => {
    const service = createService();

    const operation = await service.start(request());

    expect(operation).toMatchObject({
      id: 'op-1',
      status: 'processing',
      total: 0,
      completed: 0,
      totalTracks: 2,
      tracks: null,
      createdAt: '2024-06-01T12:00:00.000Z',
    });
  });

  it('should complete with tracks sorted newest first', async () => {
    const service = createService();
    await service.start(request());
    await service.settled('op-1');

    const progress = await service.progress('op-1');

    expect(progress).toMatchObject({
      status: 'complete',
      percentage: 0,
      currentTrack: 2,
      splitMethod: 'tracks',
      operationId: 'op-1',
    });
    expect(progress?.tracks?.map(t => t.name)).toEqual(['Newer', 'Older']);
    expect(progress?.tracks?.[1].durationHours).toBe(1);
  });

  it('should look up start and end place names', async () => {
    const geocoder = new FakeGeocoder();
    const service = createService(geocoder);

    const operation = await service.start(request({ lookupPlaceNames: true }));
    expect(operation.total).toBe(4);

    await service.settled('op-1');
    const progress = await service.progress('op-1');

    expect(progress).toMatchObject({ completed: 4, remaining: 0, percentage: 100, status: 'complete' });
    expect(geocoder.calls).toEqual([[-33.86, 151.21], [-33.8, 151.28], [-34, 151], [-34.1, 151.1]]);
    expect(progress?.tracks?.[0]).toMatchObject({
      name: 'Newer',
      startPlaceName: 'Place -34,151',
      endPlaceName: 'Place -34.1,151.1',
    });
  });

  it('should report partial progress while looking up', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => { release = resolve; });
    const geocoder: PlaceNameLookup = {
      lookup: async (lat) => {
        if (lat === -33.8) await gate;
        return 'Somewhere';
      },
    };
    const service = createService(geocoder);

    await service.start(request({ lookupPlaceNames: true }));
    // Let the first lookup finish; the second waits on the gate
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(await service.progress('op-1')).toMatchObject({
      total: 4,
      completed: 1,
      remaining: 3,
      percentage: 25,
      currentTrack: 1,
      status: 'processing',
    });
    expect((await service.progress('op-1'))?.tracks).toBeUndefined();

    release();
    await service.settled('op-1');
    expect((await service.progress('op-1'))?.status).toBe('complete');
  });

  it('should record failures on the operation', async () => {
    const geocoder: PlaceNameLookup = {
      lookup: async () => {
        throw new Error('lookup down');
      },
    };
    const service = createService(geocoder);

    await service.start(request({ lookupPlaceNames: true }));
    await service.settled('op-1');

    expect(await service.progress('op-1')).toMatchObject({ status: 'error', error: 'lookup down' });
  });

  it('should reject unusable GPX before registering anything', async () => {
    const store = new MemoryOperationStore(60);
    const service = createService(new FakeGeocoder(), store);

    await expect(service.start(request({ gpxContent: '<gpx/>' }))).rejects.toThrow(FormatError);
    expect(store.size).toBe(0);
  });

  it('should return null progress for unknown operations', async () => {
    expect(await createService().progress('nope')).toBeNull();
  });

  it('should rename a track and regenerate its content', async () => {
    const service = createService();
    await service.start(request());
    await service.settled('op-1');
    const operation = await service.getOperation('op-1');
    if (!operation) throw new Error('operation missing');

    const track = await service.renameTrack(operation, 1, { newName: '  Harbour Loop ', endPlaceName: 'Manly' });

    expect(track.name).toBe('Harbour Loop');
    expect(track.endPlaceName).toBe('Manly');
    expect(track.startPlaceName).toBe('');
    expect(parseGpx(track.content)[0].name).toBe('Harbour Loop');

    const stored = await service.getOperation('op-1');
    expect(stored?.tracks?.map(t => t.name)).toEqual(['Newer', 'Harbour Loop']);
  });

  it('should refuse to rename a missing track', async () => {
    const service = createService();
    await service.start(request());
    await service.settled('op-1');
    const operation = await service.getOperation('op-1');
    if (!operation) throw new Error('operation missing');

    await expect(service.renameTrack(operation, 2, { newName: 'X' })).rejects.toThrow(RangeError);
  });

  it('should check the store with a probe entry', async () => {
    const store = new MemoryOperationStore(60);
    expect(await createService(new FakeGeocoder(), store).checkStore()).toBe(true);
    expect(store.size).toBe(0);
  });

  it('should report a store that loses writes', async () => {
    const forgetful: OperationStore = {
      get: async (): Promise<Operation | null> => null,
      set: async () => {},
      delete: async () => {},
    };
    expect(await createService(new FakeGeocoder(), forgetful).checkStore()).toBe(false);
  });
});
