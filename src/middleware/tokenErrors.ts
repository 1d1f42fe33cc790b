import type { Request, Response } from 'express';
import { type TokenError, isTokenError, UnexpectedSigningMethodError } from '../security/errors';
import { OperationAbortedError } from '../utils/abort';
import { SecurityLogger } from '../utils/securityLogger';

/**
 * Response code for a refused token. Only a type mismatch is told apart.
 */
export function tokenErrorCode(error: TokenError): 'invalid_token' | 'invalid_token_type' {
  return error.code === 'INVALID_TOKEN_TYPE' ? 'invalid_token_type' : 'invalid_token';
}

export function logTokenRejection(req: Request, error: TokenError): void {
  if (error instanceof UnexpectedSigningMethodError) {
    SecurityLogger.critical('Token signed with unexpected algorithm', {
      type: 'signing_method_mismatch',
      ip: req.ip,
      path: req.path,
      algorithm: error.algorithm,
    });
    return;
  }

  SecurityLogger.warn('Token rejected', {
    type: 'token_rejected',
    ip: req.ip,
    path: req.path,
    code: error.code,
  });
}

/**
 * Map a failed token operation to a response: refused tokens are 401, store
 * trouble and timeouts are 503.
 */
export function sendTokenError(req: Request, res: Response, error: unknown): void {
  if (isTokenError(error)) {
    logTokenRejection(req, error);
    res.status(401).json({ success: false, error: tokenErrorCode(error) });
    return;
  }

  const message = error instanceof OperationAbortedError ? 'Token store call aborted' : 'Token store call failed';
  SecurityLogger.error(message, error, { type: 'store_error', path: req.path });
  res.status(503).json({ success: false, error: 'store_unavailable' });
}
