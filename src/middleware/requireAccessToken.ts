import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { TokenClaims } from '../types/token';
import type { TokenManager } from '../security/tokenManager';
import { sendTokenError } from './tokenErrors';

declare global {
  namespace Express {
    interface Request {
      auth?: TokenClaims;
    }
  }
}

function readBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [scheme, token] = header.split(' ');
  if (scheme !== 'Bearer' || !token) return null;
  return token;
}

/**
 * Rejects requests without a valid Bearer access token and exposes the
 * verified claims as `req.auth`.
 */
export function requireAccessToken(manager: TokenManager): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    if (!token) {
      res.status(401).json({ success: false, error: 'missing_token' });
      return;
    }

    try {
      req.auth = await manager.verifyAccessToken(token);
    } catch (error) {
      sendTokenError(req, res, error);
      return;
    }
    next();
  };
}
