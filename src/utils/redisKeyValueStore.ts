/**
 * Redis-backed key-value store for stateful tokens.
 */

import type { KeyValueStore } from '../types/store';
import type { StoreCallOptions } from '../types/token';
import { withAbort } from './abort';

/**
 * The ioredis commands this store issues. A `Redis` instance satisfies it;
 * tests pass a stand-in.
 */
export interface RedisCommands {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<unknown>;
    getdel(key: string): Promise<string | null>;
    del(key: string): Promise<number>;
}

export class RedisKeyValueStore implements KeyValueStore {
    constructor(
        private readonly redis: RedisCommands,
        private readonly keyPrefix: string = ''
    ) {}

    async get(key: string, options: StoreCallOptions = {}): Promise<string | null> {
        return withAbort(() => this.redis.get(this.buildKey(key)), options.signal);
    }

    /**
     * SET with PX so the key expires on the Redis side
     */
    async set(key: string, value: string, ttlMs: number, options: StoreCallOptions = {}): Promise<void> {
        const milliseconds = Math.ceil(ttlMs);
        await withAbort(() => this.redis.set(this.buildKey(key), value, 'PX', milliseconds), options.signal);
    }

    /**
     * GETDEL, so a key can be consumed only once (Redis 6.2+)
     */
    async take(key: string, options: StoreCallOptions = {}): Promise<string | null> {
        return withAbort(() => this.redis.getdel(this.buildKey(key)), options.signal);
    }

    async del(key: string, options: StoreCallOptions = {}): Promise<void> {
        await withAbort(() => this.redis.del(this.buildKey(key)), options.signal);
    }

    private buildKey(key: string): string {
        return `${this.keyPrefix}${key}`;
    }
}
