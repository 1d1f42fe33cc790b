/**
 * In-process KeyValueStore with wall-clock TTLs.
 *
 * Used by the tests and by the server when no REDIS_URL is configured. Keys
 * live only as long as the process.
 */

import type { KeyValueStore } from '../types/store';
import type { StoreCallOptions } from '../types/token';
import { throwIfAborted } from './abort';

interface StoredRecord {
  value: string;
  expiresAtMs: number;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly records = new Map<string, StoredRecord>();

  async get(key: string, options: StoreCallOptions = {}): Promise<string | null> {
    throwIfAborted(options.signal);
    return this.read(key);
  }

  async set(key: string, value: string, ttlMs: number, options: StoreCallOptions = {}): Promise<void> {
    throwIfAborted(options.signal);
    this.records.set(key, { value, expiresAtMs: Date.now() + ttlMs });
  }

  async take(key: string, options: StoreCallOptions = {}): Promise<string | null> {
    throwIfAborted(options.signal);

    const value = this.read(key);
    this.records.delete(key);
    return value;
  }

  async del(key: string, options: StoreCallOptions = {}): Promise<void> {
    throwIfAborted(options.signal);
    this.records.delete(key);
  }

  /**
   * Drop expired records. Reads already ignore them.
   */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, record] of this.records) {
      if (now >= record.expiresAtMs) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private read(key: string): string | null {
    const record = this.records.get(key);
    if (!record) return null;

    if (Date.now() >= record.expiresAtMs) {
      this.records.delete(key);
      return null;
    }
    return record.value;
  }

  get size(): number {
    return this.records.size;
  }
}
