/**
 * Stateful Token Store - random keys whose signed claims live in a
 * key-value store until their TTL lapses or they are deleted.
 *
 * Stored value, version 1: the JSON text `{"v":1,"token":"<jwt>"}` where the
 * JWT carries the claims signed by the configured TokenSigner.
 */

import type { KeyValueStore, StoredTokenEnvelope } from '../types/store';
import type { StoreCallOptions, TokenClaims, TokenType } from '../types/token';
import { generateRandomString, TOKEN_BYTE_LENGTH } from '../utils/secureToken';
import { throwIfAborted } from '../utils/abort';
import { InvalidTokenError, InvalidTokenTypeError, NotFoundError } from './errors';
import { assertValidTtl, type TokenSigner } from './tokenSigner';

export const STORED_TOKEN_VERSION = 1;

export function encodeEnvelope(token: string): string {
    const envelope: StoredTokenEnvelope = { v: STORED_TOKEN_VERSION, token };
    return JSON.stringify(envelope);
}

/**
 * Extract the signed token from a stored value, or throw InvalidTokenError.
 */
export function decodeEnvelope(value: string): string {
    let parsed: unknown;
    try {
        parsed = JSON.parse(value);
    } catch (error) {
        throw new InvalidTokenError({ cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null) {
        throw new InvalidTokenError();
    }

    const version: unknown = Reflect.get(parsed, 'v');
    const token: unknown = Reflect.get(parsed, 'token');
    if (version !== STORED_TOKEN_VERSION || typeof token !== 'string') {
        throw new InvalidTokenError();
    }
    return token;
}

export class StatefulTokenStore {
    constructor(
        private readonly store: KeyValueStore,
        private readonly signer: TokenSigner
    ) {}

    /**
     * Issue a fresh key and store the signed claims under it.
     */
    async put(claims: TokenClaims, ttlMs: number, options: StoreCallOptions = {}): Promise<string> {
        assertValidTtl(ttlMs);
        throwIfAborted(options.signal);

        const key = generateRandomString(TOKEN_BYTE_LENGTH);
        const signed = this.signer.sign(claims, ttlMs);

        await this.store.set(key, encodeEnvelope(signed), ttlMs, options);
        return key;
    }

    async lookup(key: string, options: StoreCallOptions = {}): Promise<string | null> {
        return this.store.get(key, options);
    }

    async exists(key: string, options: StoreCallOptions = {}): Promise<boolean> {
        return (await this.lookup(key, options)) !== null;
    }

    /**
     * Read and verify the claims stored under `key`.
     * Throws NotFoundError when the key is absent or expired.
     */
    async read(key: string, options: StoreCallOptions = {}): Promise<TokenClaims> {
        const value = await this.lookup(key, options);
        if (value === null) {
            throw new NotFoundError();
        }
        return this.signer.verify(decodeEnvelope(value));
    }

    /**
     * Remove the key and return its claims when they are of `expectedType`.
     *
     * The key is taken atomically, so only one caller gets the claims. A
     * token of another type is written back for the rest of its lifetime
     * and InvalidTokenTypeError is thrown. Throws NotFoundError when the key
     * is absent or expired.
     */
    async take(key: string, expectedType: TokenType, options: StoreCallOptions = {}): Promise<TokenClaims> {
        const value = await this.store.take(key, options);
        if (value === null) {
            throw new NotFoundError();
        }

        const claims = this.signer.verify(decodeEnvelope(value));
        if (claims.tokenType !== expectedType) {
            await this.restore(key, value, claims);
            throw new InvalidTokenTypeError();
        }
        return claims;
    }

    async delete(key: string, options: StoreCallOptions = {}): Promise<void> {
        await this.store.del(key, options);
    }

    // No signal: a taken token must go back even when the caller has given up.
    private async restore(key: string, value: string, claims: TokenClaims): Promise<void> {
        if (claims.expiresAt === undefined) return;

        const remainingMs = claims.expiresAt * 1000 - Date.now();
        if (remainingMs > 0) {
            await this.store.set(key, value, remainingMs);
        }
    }
}
