import type { StoreCallOptions } from './token';

/**
 * Minimal key-value capability the stateful tokens need. Implementations must
 * expire keys on their own once the TTL lapses.
 */
export interface KeyValueStore {
  /** Resolves `null` when the key is absent or expired. */
  get(key: string, options?: StoreCallOptions): Promise<string | null>;

  set(key: string, value: string, ttlMs: number, options?: StoreCallOptions): Promise<void>;

  /**
   * Read and delete in one step. Of several concurrent takes of one key, at
   * most one sees the value.
   */
  take(key: string, options?: StoreCallOptions): Promise<string | null>;

  /** Deleting an absent key is not an error. */
  del(key: string, options?: StoreCallOptions): Promise<void>;
}

/**
 * Value written under a stateful token key.
 */
export interface StoredTokenEnvelope {
  v: 1;
  token: string;
}
