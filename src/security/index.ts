/**
 * Token security exports
 */

// Errors
export * from './errors';

// Signing
export * from './tokenSigner';

// Store bridge
export * from './statefulTokenStore';

// Lifecycle
export * from './accessTokens';
export * from './statefulTokens';
export * from './tokenManager';
