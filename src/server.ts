import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config/env';
import { closeRedis, createRedisClient } from './config/redis';
import { TokenManager } from './security/tokenManager';
import type { KeyValueStore } from './types/store';
import { MemoryKeyValueStore } from './utils/memoryKeyValueStore';
import { RedisKeyValueStore } from './utils/redisKeyValueStore';
import { SecurityLogger } from './utils/securityLogger';

const MEMORY_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

interface StoreHandle {
  store: KeyValueStore;
  close(): Promise<void>;
}

function createStore(config: Readonly<AppConfig>): StoreHandle {
  if (!config.redisUrl) {
    SecurityLogger.warn('REDIS_URL not set; stateful tokens will use the in-memory store');
    const store = new MemoryKeyValueStore();
    const timer = setInterval(() => store.cleanupExpired(), MEMORY_CLEANUP_INTERVAL_MS);
    timer.unref();
    return {
      store,
      close: async () => clearInterval(timer),
    };
  }

  const redis = createRedisClient({ url: config.redisUrl, password: config.redisPassword });
  return {
    store: new RedisKeyValueStore(redis, config.tokenKeyPrefix),
    close: () => closeRedis(redis),
  };
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  const { store, close } = createStore(config);
  const manager = new TokenManager(store, { privateKey: config.jwtSecret });

  const app = createApp(manager, {
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
    statefulTokenTtlSeconds: config.statefulTokenTtlSeconds,
    storeTimeoutMs: config.storeTimeoutMs,
    rateLimit: { windowMs: config.rateLimitWindowMs, maxRequests: config.rateLimitMax },
    corsOrigins: config.corsOrigins,
  });

  const server: Server = app.listen(config.port, () => {
    SecurityLogger.info(`Token service listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    SecurityLogger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      close().then(
        () => process.exit(0),
        (error: unknown) => {
          SecurityLogger.error('Failed to close token store', error);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  SecurityLogger.error('Failed to start token service', error);
  process.exit(1);
});
