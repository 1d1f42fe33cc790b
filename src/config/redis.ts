/**
 * Redis client factory
 */

import Redis from 'ioredis';
import { SecurityLogger } from '../utils/securityLogger';

export interface RedisConnectionConfig {
    url: string;
    password?: string;
}

export function createRedisClient(config: RedisConnectionConfig): Redis {
    const redis = new Redis(config.url, {
        password: config.password || undefined,
        // Token calls fail fast; callers decide on retries.
        maxRetriesPerRequest: 1,
        retryStrategy(times) {
            const delay = Math.min(times * 50, 2000);
            SecurityLogger.warn(`Redis reconnecting in ${delay}ms`, { type: 'store_error', attempt: times });
            return delay;
        },
        reconnectOnError(err) {
            const targetErrors = ['READONLY', 'ECONNRESET', 'ECONNREFUSED'];
            return targetErrors.some(e => err.message.includes(e));
        },
    });

    redis.on('connect', () => {
        SecurityLogger.info('Connected to Redis server');
    });

    redis.on('error', (err: Error) => {
        SecurityLogger.error('Redis connection error', err, { type: 'store_error' });
    });

    redis.on('close', () => {
        SecurityLogger.info('Redis connection closed');
    });

    return redis;
}

export async function closeRedis(redis: Redis): Promise<void> {
    SecurityLogger.info('Closing Redis connection');
    await redis.quit();
}
