import { kv } from '@vercel/kv';
import type { Operation } from '../lib/types';
import type { ServiceConfig } from './_config';

/**
 * Where split operations and their results live between requests.
 * Entries expire after the configured TTL.
 */
export interface OperationStore {
  get(id: string): Promise<Operation | null>;
  set(id: string, operation: Operation): Promise<void>;
  delete(id: string): Promise<void>;
}

interface MemoryEntry {
  operation: Operation;
  expiresAt: number;
}

/**
 * In-process store. Expired entries are evicted whenever the store is touched.
 */
export class MemoryOperationStore implements OperationStore {
  private entries = new Map<string, MemoryEntry>();

  constructor(
    private ttlSeconds: number,
    private now: () => number = Date.now
  ) {}

  private evictExpired(): void {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(id);
      }
    }
  }

  async get(id: string): Promise<Operation | null> {
    this.evictExpired();
    const entry = this.entries.get(id);
    // Callers get a copy so that updates always go through set()
    return entry ? structuredClone(entry.operation) : null;
  }

  async set(id: string, operation: Operation): Promise<void> {
    this.evictExpired();
    this.entries.set(id, {
      operation: structuredClone(operation),
      expiresAt: this.now() + this.ttlSeconds * 1000,
    });
  }

  async delete(id: string): Promise<void> {
    this.entries.delete(id);
  }

  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }
}

/** The subset of the @vercel/kv client used here */
export interface KvClient {
  get(key: string): Promise<Operation | null>;
  set(key: string, value: Operation, options: { ex: number }): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

const KEY_PREFIX = 'operation:';

/**
 * Store shared between function instances, backed by Vercel KV.
 */
export class KvOperationStore implements OperationStore {
  constructor(
    private ttlSeconds: number,
    private client: KvClient = kv
  ) {}

  async get(id: string): Promise<Operation | null> {
    return this.client.get(`${KEY_PREFIX}${id}`);
  }

  async set(id: string, operation: Operation): Promise<void> {
    await this.client.set(`${KEY_PREFIX}${id}`, operation, { ex: Math.ceil(this.ttlSeconds) });
  }

  async delete(id: string): Promise<void> {
    await this.client.del(`${KEY_PREFIX}${id}`);
  }
}

export function createOperationStore(
  config: Pick<ServiceConfig, 'storeBackend' | 'operationTtlSeconds'>
): OperationStore {
  return config.storeBackend === 'kv'
    ? new KvOperationStore(config.operationTtlSeconds)
    : new MemoryOperationStore(config.operationTtlSeconds);
}
