import type { TokenError } from '../security/errors';

export const TokenType = {
  ResetPassword: 'reset_password',
  VerifyEmail: 'verify_email',
  AccessToken: 'access_token',
  RefreshToken: 'refresh_token',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Token types that live in the key-value store. Access tokens are signed and
 * verified without the store and have their own methods.
 */
export type StatefulTokenType = Exclude<TokenType, typeof TokenType.AccessToken>;

export const TOKEN_TYPES: readonly TokenType[] = Object.values(TokenType);

export function isTokenType(value: unknown): value is TokenType {
  return TOKEN_TYPES.some((tokenType) => tokenType === value);
}

export interface TokenClaims {
  subject: string;
  /** Epoch milliseconds */
  createdAt: number;
  tokenType: TokenType;
  /** Epoch seconds, set by the signer */
  issuedAt?: number;
  /** Epoch seconds, set by the signer */
  expiresAt?: number;
}

export interface AccessTokenCheck {
  valid: boolean;
  error?: TokenError;
}

export interface TokenManagerOptions {
  /** HMAC secret shared by every signed token */
  privateKey: string;
}

export interface StoreCallOptions {
  signal?: AbortSignal;
}

export function isStatefulTokenType(value: unknown): value is StatefulTokenType {
  return isTokenType(value) && value !== TokenType.AccessToken;
}
