import jwt, { type Algorithm, type Jwt, type JwtPayload } from 'jsonwebtoken';
import type { TokenClaims, TokenType } from '../types/token';
import { decodeClaims, encodeClaims, type EncodedClaims } from '../utils/tokenClaims';
import {
  InvalidTokenError,
  InvalidTokenTypeError,
  UnexpectedSigningMethodError,
} from './errors';

/** The only algorithm this service signs with or accepts */
export const TOKEN_SIGNING_ALGORITHM: Algorithm = 'HS512';

export interface TokenSigner {
  sign(claims: TokenClaims, ttlMs: number): string;
  verify(token: string): TokenClaims;
}

export function assertValidTtl(ttlMs: number): void {
  if (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new RangeError(`ttl must be a positive number of milliseconds, got ${ttlMs}`);
  }
}

/**
 * HS512 JWT signer backed by jsonwebtoken.
 */
export class JwtTokenSigner implements TokenSigner {
  private readonly secret: string;

  constructor(secret: string) {
    if (!secret) {
      throw new TypeError('token signing key must be a non-empty string');
    }
    this.secret = secret;
  }

  /**
   * Sign claims. `exp` is the instant the TTL ends, rounded up to the next
   * whole second, so the token never lapses before a store entry written with
   * the same TTL.
   */
  sign(claims: TokenClaims, ttlMs: number): string {
    assertValidTtl(ttlMs);

    const payload: EncodedClaims = {
      ...encodeClaims(claims),
      exp: Math.ceil((Date.now() + ttlMs) / 1000),
    };
    return jwt.sign(payload, this.secret, { algorithm: TOKEN_SIGNING_ALGORITHM });
  }

  /**
   * Verify a signed token and return its claims.
   *
   * The header algorithm is checked before any signature work so that a token
   * naming `none` or another algorithm never reaches the HMAC check.
   */
  verify(token: string): TokenClaims {
    const algorithm = this.readAlgorithm(token);
    if (algorithm !== TOKEN_SIGNING_ALGORITHM) {
      throw new UnexpectedSigningMethodError(algorithm);
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [TOKEN_SIGNING_ALGORITHM],
      });
    } catch (error) {
      throw new InvalidTokenError({ cause: error });
    }

    const claims = decodeClaims(payload);
    if (!claims) {
      throw new InvalidTokenError();
    }
    return claims;
  }

  private readAlgorithm(token: string): string {
    let decoded: Jwt | null;
    try {
      decoded = jwt.decode(token, { complete: true });
    } catch (error) {
      throw new InvalidTokenError({ cause: error });
    }

    const algorithm: unknown = decoded?.header.alg;
    if (typeof algorithm !== 'string') {
      throw new InvalidTokenError();
    }
    return algorithm;
  }
}

/**
 * Verify with `signer` and require a specific token type.
 */
export function verifyOfType(
  signer: TokenSigner,
  token: string,
  expectedType: TokenType
): TokenClaims {
  const claims = signer.verify(token);
  if (claims.tokenType !== expectedType) {
    throw new InvalidTokenTypeError();
  }
  return claims;
}
