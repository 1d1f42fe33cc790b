import { beforeEach, describe, expect, test } from 'vitest';
import { OperationAbortedError } from './abort';
import { RedisKeyValueStore, type RedisCommands } from './redisKeyValueStore';

/**
 * In-process stand-in for the ioredis client. TTLs are recorded, not enforced.
 */
class FakeRedis implements RedisCommands {
  readonly calls: unknown[][] = [];
  readonly values = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    this.calls.push(['get', key]);
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<'OK'> {
    this.calls.push(['set', key, value, millisecondsToken, milliseconds]);
    this.values.set(key, value);
    return 'OK';
  }

  async getdel(key: string): Promise<string | null> {
    this.calls.push(['getdel', key]);
    const value = this.values.get(key) ?? null;
    this.values.delete(key);
    return value;
  }

  async del(key: string): Promise<number> {
    this.calls.push(['del', key]);
    return this.values.delete(key) ? 1 : 0;
  }
}

describe('RedisKeyValueStore', () => {
  let redis: FakeRedis;
  let store: RedisKeyValueStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisKeyValueStore(redis, 'auth:token:');
  });

  test('writes with a PX expiry under the key prefix', async () => {
    await store.set('abc', 'value', 1500.2);

    expect(redis.calls).toEqual([['set', 'auth:token:abc', 'value', 'PX', 1501]]);
  });

  test('reads through the key prefix', async () => {
    redis.values.set('auth:token:abc', 'value');

    expect(await store.get('abc')).toBe('value');
    expect(await store.get('other')).toBeNull();
  });

  test('takes a key with a single GETDEL', async () => {
    redis.values.set('auth:token:abc', 'value');

    expect(await store.take('abc')).toBe('value');
    expect(await store.take('abc')).toBeNull();
    expect(redis.calls).toEqual([
      ['getdel', 'auth:token:abc'],
      ['getdel', 'auth:token:abc'],
    ]);
  });

  test('deletes through the key prefix and ignores absent keys', async () => {
    redis.values.set('auth:token:abc', 'value');

    await store.del('abc');
    await store.del('abc');

    expect(redis.calls).toEqual([
      ['del', 'auth:token:abc'],
      ['del', 'auth:token:abc'],
    ]);
    expect(redis.values.size).toBe(0);
  });

  test('propagates client errors unchanged', async () => {
    const failure = new Error('ECONNREFUSED 127.0.0.1:6379');
    redis.get = async () => {
      throw failure;
    };

    await expect(store.get('abc')).rejects.toBe(failure);
  });

  test('does not issue a command when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('deadline');

    await expect(store.set('abc', 'value', 1000, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationAbortedError
    );
    expect(redis.calls).toEqual([]);
  });

  test('stops waiting on a command when the signal fires', async () => {
    redis.get = () => new Promise<string | null>(() => {});
    const controller = new AbortController();

    const pending = store.get('abc', { signal: controller.signal });
    controller.abort('deadline');

    const error = await pending.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(OperationAbortedError);
    expect((error as OperationAbortedError).name).toBe('AbortError');
    expect((error as OperationAbortedError).cause).toBe('deadline');
  });
});
