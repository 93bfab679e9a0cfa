import { describe, it, expect } from 'vitest';
import type { Operation } from '../lib/types';
import {
  createOperationStore,
  KvOperationStore,
  MemoryOperationStore,
  type KvClient,
} from './_store';

function operation(id: string): Operation {
  return {
    id,
    splitMethod: 'tracks',
    status: 'processing',
    lookupPlaceNames: false,
    total: 0,
    completed: 0,
    currentTrack: 0,
    totalTracks: 1,
    tracks: null,
    error: null,
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

class FakeKv implements KvClient {
  data = new Map<string, Operation>();
  expiries = new Map<string, number>();

  async get(key: string): Promise<Operation | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: Operation, options: { ex: number }): Promise<unknown> {
    this.data.set(key, value);
    this.expiries.set(key, options.ex);
    return 'OK';
  }

  async del(key: string): Promise<unknown> {
    return this.data.delete(key) ? 1 : 0;
  }
}

describe('MemoryOperationStore', () => {
  it('should store and return operations', async () => {
    const store = new MemoryOperationStore(60);
    await store.set('a', operation('a'));

    expect(await store.get('a')).toEqual(operation('a'));
    expect(await store.get('b')).toBeNull();
  });

  it('should hand out copies', async () => {
    const store = new MemoryOperationStore(60);
    await store.set('a', operation('a'));

    const copy = await store.get('a');
    if (copy) copy.completed = 99;

    expect((await store.get('a'))?.completed).toBe(0);
  });

  it('should expire entries after the TTL', async () => {
    let now = 0;
    const store = new MemoryOperationStore(10, () => now);
    await store.set('a', operation('a'));

    now = 9_999;
    expect(await store.get('a')).not.toBeNull();

    now = 10_000;
    expect(await store.get('a')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should refresh the TTL on every write', async () => {
    let now = 0;
    const store = new MemoryOperationStore(10, () => now);
    await store.set('a', operation('a'));

    now = 8_000;
    await store.set('a', operation('a'));

    now = 15_000;
    expect(await store.get('a')).not.toBeNull();
  });

  it('should delete entries', async () => {
    const store = new MemoryOperationStore(60);
    await store.set('a', operation('a'));
    await store.delete('a');

    expect(await store.get('a')).toBeNull();
  });
});

describe('KvOperationStore', () => {
  it('should prefix keys and pass the TTL in whole seconds', async () => {
    const client = new FakeKv();
    const store = new KvOperationStore(1.5, client);

    await store.set('abc', operation('abc'));

    expect([...client.data.keys()]).toEqual(['operation:abc']);
    expect(client.expiries.get('operation:abc')).toBe(2);
    expect(await store.get('abc')).toEqual(operation('abc'));
  });

  it('should delete entries', async () => {
    const client = new FakeKv();
    const store = new KvOperationStore(60, client);

    await store.set('abc', operation('abc'));
    await store.delete('abc');

    expect(await store.get('abc')).toBeNull();
  });
});

describe('createOperationStore', () => {
  it('should pick the configured backend', () => {
    expect(createOperationStore({ storeBackend: 'memory', operationTtlSeconds: 60 }))
      .toBeInstanceOf(MemoryOperationStore);
    expect(createOperationStore({ storeBackend: 'kv', operationTtlSeconds: 60 }))
      .toBeInstanceOf(KvOperationStore);
  });
});
