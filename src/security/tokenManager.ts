import type { KeyValueStore } from '../types/store';
import type {
  AccessTokenCheck,
  StatefulTokenType,
  StoreCallOptions,
  TokenClaims,
  TokenManagerOptions,
  TokenType,
} from '../types/token';
import { AccessTokenService } from './accessTokens';
import { StatefulTokenService } from './statefulTokens';
import { StatefulTokenStore } from './statefulTokenStore';
import { JwtTokenSigner } from './tokenSigner';

/**
 * Token Lifecycle Manager
 *
 * One entry point over the stateless access tokens and the store-backed
 * tokens. Both share the signer built from `options.privateKey`. Errors are
 * returned to the caller untouched; nothing here logs.
 */
export class TokenManager {
  readonly accessTokens: AccessTokenService;
  readonly statefulTokens: StatefulTokenService;

  constructor(store: KeyValueStore, options: TokenManagerOptions) {
    const signer = new JwtTokenSigner(options.privateKey);
    this.accessTokens = new AccessTokenService(signer);
    this.statefulTokens = new StatefulTokenService(new StatefulTokenStore(store, signer));
  }

  async generateAccessToken(subject: string, ttlMs: number): Promise<string> {
    return this.accessTokens.generate(subject, ttlMs);
  }

  async decodeAccessToken(token: string): Promise<AccessTokenCheck> {
    return this.accessTokens.decode(token);
  }

  async verifyAccessToken(token: string): Promise<TokenClaims> {
    return this.accessTokens.verify(token);
  }

  /**
   * For reset-password, verify-email and refresh tokens only. Never use it
   * for access tokens.
   */
  async generateToken(
    tokenType: StatefulTokenType,
    claims: TokenClaims,
    ttlMs: number,
    options?: StoreCallOptions
  ): Promise<string> {
    return this.statefulTokens.generate(tokenType, claims, ttlMs, options);
  }

  async decodeToken(key: string, tokenType: TokenType, options?: StoreCallOptions): Promise<TokenClaims> {
    return this.statefulTokens.decode(key, tokenType, options);
  }

  async consumeToken(key: string, tokenType: TokenType, options?: StoreCallOptions): Promise<TokenClaims> {
    return this.statefulTokens.consume(key, tokenType, options);
  }

  async destroyToken(key: string, options?: StoreCallOptions): Promise<void> {
    return this.statefulTokens.destroy(key, options);
  }
}
