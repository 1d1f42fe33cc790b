import { type TokenClaims, type TokenType, isTokenType } from '../types/token';

/**
 * JWT payload layout for token claims.
 */
export interface EncodedClaims {
  sub: string;
  createdAt: number;
  tokenType: TokenType;
  iat?: number;
  exp?: number;
}

export function newTokenClaims(subject: string, tokenType: TokenType): TokenClaims {
  return {
    subject,
    createdAt: Date.now(),
    tokenType,
  };
}

/**
 * Standard fields are left to the signer, which sets `iat` and `exp` itself.
 */
export function encodeClaims(claims: TokenClaims): EncodedClaims {
  return {
    sub: claims.subject,
    createdAt: claims.createdAt,
    tokenType: claims.tokenType,
  };
}

function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Rebuild claims from a verified payload. Returns null when the payload does
 * not have the expected shape.
 */
export function decodeClaims(payload: unknown): TokenClaims | null {
  if (typeof payload !== 'object' || payload === null) return null;

  const sub: unknown = Reflect.get(payload, 'sub');
  const createdAt: unknown = Reflect.get(payload, 'createdAt');
  const tokenType: unknown = Reflect.get(payload, 'tokenType');
  const iat: unknown = Reflect.get(payload, 'iat');
  const exp: unknown = Reflect.get(payload, 'exp');

  if (typeof sub !== 'string') return null;
  if (typeof createdAt !== 'number' || !Number.isFinite(createdAt)) return null;
  if (!isTokenType(tokenType)) return null;
  if (!isOptionalNumber(iat) || !isOptionalNumber(exp)) return null;

  const claims: TokenClaims = { subject: sub, createdAt, tokenType };
  if (iat !== undefined) claims.issuedAt = iat;
  if (exp !== undefined) claims.expiresAt = exp;
  return claims;
}
