import express, { type Application, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';

import { TokenType, type StatefulTokenType, type StoreCallOptions } from './types/token';
import type { RateLimitConfig } from './types/rateLimit';
import type { TokenManager } from './security/tokenManager';
import { newTokenClaims } from './utils/tokenClaims';
import { SecurityLogger } from './utils/securityLogger';
import { createRateLimiter } from './middleware/rateLimiter';
import { requireAccessToken } from './middleware/requireAccessToken';
import { logTokenRejection, sendTokenError, tokenErrorCode } from './middleware/tokenErrors';

export interface AppOptions {
  accessTokenTtlSeconds: number;
  statefulTokenTtlSeconds: number;
  storeTimeoutMs: number;
  rateLimit: RateLimitConfig;
  corsOrigins: string[];
}

/** URL segment for each stateful token type */
export const TOKEN_TYPE_ROUTES: Readonly<Record<string, StatefulTokenType>> = {
  'reset-password': TokenType.ResetPassword,
  'verify-email': TokenType.VerifyEmail,
  'refresh-token': TokenType.RefreshToken,
};

function readString(body: unknown, field: string): string | null {
  if (typeof body !== 'object' || body === null) return null;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * `ttlSeconds` from the body, the fallback when absent, or null when invalid.
 */
function readTtlSeconds(body: unknown, fallback: number): number | null {
  const value: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'ttlSeconds') : undefined;
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) return null;
  return value;
}

function routeTokenType(req: Request, res: Response): StatefulTokenType | null {
  const tokenType = Object.hasOwn(TOKEN_TYPE_ROUTES, req.params.type) ? TOKEN_TYPE_ROUTES[req.params.type] : undefined;
  if (!tokenType) {
    res.status(404).json({ success: false, error: 'unknown_token_type' });
    return null;
  }
  return tokenType;
}

export function createApp(manager: TokenManager, options: AppOptions): Application {
  const app = express();
  const allowedOrigins = new Set(options.corsOrigins);

  const storeOptions = (): StoreCallOptions => ({
    signal: AbortSignal.timeout(options.storeTimeoutMs),
  });

  app.use(helmet());
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.has(origin)) return callback(null, true);
      SecurityLogger.warn('CORS blocked origin', { origin });
      return callback(null, false);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json({ limit: '10kb' }));

  const tokenRateLimiter = createRateLimiter(options.rateLimit);

  // =====================================================
  // ACCESS TOKENS (stateless)
  // =====================================================
  app.post('/api/tokens/access', tokenRateLimiter, async (req: Request, res: Response) => {
    const subject = readString(req.body, 'subject');
    const ttlSeconds = readTtlSeconds(req.body, options.accessTokenTtlSeconds);
    if (!subject || ttlSeconds === null) {
      res.status(400).json({ success: false, error: 'invalid_request' });
      return;
    }

    try {
      const token = await manager.generateAccessToken(subject, ttlSeconds * 1000);
      SecurityLogger.info('Access token issued', { type: 'token_issued', subject, tokenType: TokenType.AccessToken });
      res.status(201).json({ success: true, token, expiresIn: ttlSeconds });
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  app.post('/api/tokens/access/verify', tokenRateLimiter, async (req: Request, res: Response) => {
    const token = readString(req.body, 'token');
    if (!token) {
      res.status(400).json({ success: false, error: 'invalid_request' });
      return;
    }

    try {
      const result = await manager.decodeAccessToken(token);
      if (result.error) {
        logTokenRejection(req, result.error);
        res.json({ success: true, valid: false, error: tokenErrorCode(result.error) });
        return;
      }
      res.json({ success: true, valid: result.valid });
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  app.get('/api/me', requireAccessToken(manager), (req: Request, res: Response) => {
    res.json({ success: true, subject: req.auth?.subject, tokenType: req.auth?.tokenType });
  });

  // =====================================================
  // STATEFUL TOKENS (store-backed)
  // =====================================================
  app.post('/api/tokens/:type', tokenRateLimiter, async (req: Request, res: Response) => {
    const tokenType = routeTokenType(req, res);
    if (!tokenType) return;

    const subject = readString(req.body, 'subject');
    const ttlSeconds = readTtlSeconds(req.body, options.statefulTokenTtlSeconds);
    if (!subject || ttlSeconds === null) {
      res.status(400).json({ success: false, error: 'invalid_request' });
      return;
    }

    try {
      const claims = newTokenClaims(subject, tokenType);
      const token = await manager.generateToken(tokenType, claims, ttlSeconds * 1000, storeOptions());
      SecurityLogger.info('Stateful token issued', { type: 'token_issued', subject, tokenType });
      res.status(201).json({ success: true, token, expiresIn: ttlSeconds });
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  app.post('/api/tokens/:type/decode', tokenRateLimiter, async (req: Request, res: Response) => {
    const tokenType = routeTokenType(req, res);
    if (!tokenType) return;

    const token = readString(req.body, 'token');
    if (!token) {
      res.status(400).json({ success: false, error: 'invalid_request' });
      return;
    }

    try {
      const claims = await manager.decodeToken(token, tokenType, storeOptions());
      res.json({ success: true, claims });
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  app.post('/api/tokens/:type/consume', tokenRateLimiter, async (req: Request, res: Response) => {
    const tokenType = routeTokenType(req, res);
    if (!tokenType) return;

    const token = readString(req.body, 'token');
    if (!token) {
      res.status(400).json({ success: false, error: 'invalid_request' });
      return;
    }

    try {
      const claims = await manager.consumeToken(token, tokenType, storeOptions());
      SecurityLogger.info('Stateful token consumed', { type: 'token_revoked', subject: claims.subject, tokenType });
      res.json({ success: true, claims });
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  app.delete('/api/tokens/:token', tokenRateLimiter, async (req: Request, res: Response) => {
    try {
      await manager.destroyToken(req.params.token, storeOptions());
      SecurityLogger.info('Stateful token revoked', { type: 'token_revoked' });
      res.status(204).end();
    } catch (error) {
      sendTokenError(req, res, error);
    }
  });

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString(), service: 'token-lifecycle-service' });
  });

  return app;
}
