import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import type { Request, Response } from 'express';
import type { RateLimitConfig } from '../types/rateLimit';
import { SecurityLogger } from '../utils/securityLogger';

/**
 * Per-IP rate limiter for the token endpoints. Counters are kept in process.
 */
export function createRateLimiter(config: RateLimitConfig): RateLimitRequestHandler {
  const message = config.message || 'Too many requests, please try again later.';

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: config.standardHeaders ?? true,
    legacyHeaders: config.legacyHeaders ?? false,
    handler: (req: Request, res: Response) => {
      SecurityLogger.warn('Rate limit exceeded', {
        type: 'rate_limit_exceeded',
        ip: req.ip,
        path: req.path,
        method: req.method,
      });
      res.status(429).json({
        success: false,
        message,
      });
    },
  });
}
