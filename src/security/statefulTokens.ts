/**
 * Stateful tokens: reset-password, verify-email and refresh tokens that stay
 * valid only while their key is present in the store.
 *
 *   Issued --decode--> Validated
 *   Issued --ttl-----> Expired    (decode: InvalidTokenError)
 *   Issued --destroy-> Destroyed  (decode: InvalidTokenError)
 */

import {
  isStatefulTokenType,
  type StatefulTokenType,
  type StoreCallOptions,
  type TokenClaims,
  type TokenType,
} from '../types/token';
import { InvalidTokenError, InvalidTokenTypeError, NotFoundError } from './errors';
import type { StatefulTokenStore } from './statefulTokenStore';

export class StatefulTokenService {
  constructor(private readonly store: StatefulTokenStore) {}

  /**
   * Store `claims` under a new random key and return the key.
   *
   * Access tokens must never go through here; they are stateless. The claims'
   * own type has to agree with `tokenType`.
   */
  async generate(
    tokenType: StatefulTokenType,
    claims: TokenClaims,
    ttlMs: number,
    options: StoreCallOptions = {}
  ): Promise<string> {
    if (!isStatefulTokenType(tokenType) || claims.tokenType !== tokenType) {
      throw new InvalidTokenTypeError();
    }
    return this.store.put(claims, ttlMs, options);
  }

  /**
   * Claims for `key` when it is still stored and of `expectedType`.
   * An absent key is reported as InvalidTokenError.
   */
  async decode(
    key: string,
    expectedType: TokenType,
    options: StoreCallOptions = {}
  ): Promise<TokenClaims> {
    let claims: TokenClaims;
    try {
      claims = await this.store.read(key, options);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InvalidTokenError({ cause: error });
      }
      throw error;
    }

    if (claims.tokenType !== expectedType) {
      throw new InvalidTokenTypeError();
    }
    return claims;
  }

  async destroy(key: string, options: StoreCallOptions = {}): Promise<void> {
    await this.store.delete(key, options);
  }

  /**
   * Decode and revoke in one store step, for single-use links. Concurrent
   * consumers of one key get the claims at most once. A token of the wrong
   * type is put back.
   */
  async consume(
    key: string,
    expectedType: TokenType,
    options: StoreCallOptions = {}
  ): Promise<TokenClaims> {
    try {
      return await this.store.take(key, expectedType, options);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new InvalidTokenError({ cause: error });
      }
      throw error;
    }
  }
}
