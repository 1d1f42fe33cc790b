/**
 * Environment configuration
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfig {
  jwtSecret: string;
  redisUrl?: string;
  redisPassword?: string;
  port: number;
  tokenKeyPrefix: string;
  storeTimeoutMs: number;
  accessTokenTtlSeconds: number;
  statefulTokenTtlSeconds: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  corsOrigins: string[];
}

export const DEFAULT_CONFIG = {
  port: 3000,
  tokenKeyPrefix: 'auth:token:',
  storeTimeoutMs: 2000,
  accessTokenTtlSeconds: 60 * 60, // 1 hour
  statefulTokenTtlSeconds: 15 * 60, // 15 minutes
  rateLimitWindowMs: 60 * 1000,
  rateLimitMax: 60,
} as const;

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readOptional(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

/**
 * Build the service configuration. JWT_SECRET has no fallback.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new ConfigError('JWT_SECRET environment variable is required but not set');
  }

  const corsOrigins = (env.CORS_ORIGINS ?? '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return Object.freeze({
    jwtSecret,
    redisUrl: readOptional(env, 'REDIS_URL'),
    redisPassword: readOptional(env, 'REDIS_PASSWORD'),
    port: readPositiveInt(env, 'PORT', DEFAULT_CONFIG.port),
    tokenKeyPrefix: env.TOKEN_KEY_PREFIX ?? DEFAULT_CONFIG.tokenKeyPrefix,
    storeTimeoutMs: readPositiveInt(env, 'STORE_TIMEOUT_MS', DEFAULT_CONFIG.storeTimeoutMs),
    accessTokenTtlSeconds: readPositiveInt(env, 'ACCESS_TOKEN_TTL_SECONDS', DEFAULT_CONFIG.accessTokenTtlSeconds),
    statefulTokenTtlSeconds: readPositiveInt(env, 'STATEFUL_TOKEN_TTL_SECONDS', DEFAULT_CONFIG.statefulTokenTtlSeconds),
    rateLimitWindowMs: readPositiveInt(env, 'RATE_LIMIT_WINDOW_MS', DEFAULT_CONFIG.rateLimitWindowMs),
    rateLimitMax: readPositiveInt(env, 'RATE_LIMIT_MAX', DEFAULT_CONFIG.rateLimitMax),
    corsOrigins,
  });
}
