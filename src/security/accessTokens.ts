/**
 * Stateless access tokens: signed claims, checked by signature and expiry
 * alone. Nothing touches the key-value store.
 */

import { TokenType, type AccessTokenCheck, type TokenClaims } from '../types/token';
import { newTokenClaims } from '../utils/tokenClaims';
import { isTokenError } from './errors';
import { verifyOfType, type TokenSigner } from './tokenSigner';

export class AccessTokenService {
  constructor(private readonly signer: TokenSigner) {}

  generate(subject: string, ttlMs: number): string {
    return this.signer.sign(newTokenClaims(subject, TokenType.AccessToken), ttlMs);
  }

  /**
   * Claims of a valid access token. Throws a TokenError otherwise.
   */
  verify(token: string): TokenClaims {
    return verifyOfType(this.signer, token, TokenType.AccessToken);
  }

  decode(token: string): AccessTokenCheck {
    try {
      this.verify(token);
      return { valid: true };
    } catch (error) {
      if (isTokenError(error)) {
        return { valid: false, error };
      }
      throw error;
    }
  }
}
