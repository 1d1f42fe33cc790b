export * from './types/token';
export * from './types/store';
export * from './security';
export { newTokenClaims, encodeClaims, decodeClaims, type EncodedClaims } from './utils/tokenClaims';
export { generateRandomString, TOKEN_BYTE_LENGTH } from './utils/secureToken';
export { OperationAbortedError, withAbort } from './utils/abort';
export { MemoryKeyValueStore } from './utils/memoryKeyValueStore';
export { RedisKeyValueStore, type RedisCommands } from './utils/redisKeyValueStore';
export { createRedisClient, closeRedis, type RedisConnectionConfig } from './config/redis';
export { loadConfig, ConfigError, DEFAULT_CONFIG, type AppConfig } from './config/env';
export { createApp, type AppOptions } from './app';
export { requireAccessToken } from './middleware/requireAccessToken';
export { SecurityLogger } from './utils/securityLogger';
