/**
 * Token error taxonomy.
 *
 * Messages stay generic so a caller cannot learn why a token was refused.
 * Library and store failures are attached as `cause` for operators only.
 */

export type TokenErrorCode =
  | 'INVALID_TOKEN'
  | 'INVALID_TOKEN_TYPE'
  | 'UNEXPECTED_SIGNING_METHOD'
  | 'NOT_FOUND';

export class TokenError extends Error {
  readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenError';
    this.code = code;
  }
}

export class InvalidTokenError extends TokenError {
  constructor(options?: { cause?: unknown }) {
    super('INVALID_TOKEN', 'invalid token', options);
    this.name = 'InvalidTokenError';
  }
}

export class InvalidTokenTypeError extends TokenError {
  constructor() {
    super('INVALID_TOKEN_TYPE', 'invalid token type');
    this.name = 'InvalidTokenTypeError';
  }
}

export class UnexpectedSigningMethodError extends TokenError {
  /** Algorithm named in the rejected token header */
  readonly algorithm: string;

  constructor(algorithm: string) {
    super('UNEXPECTED_SIGNING_METHOD', 'unexpected token signing method');
    this.name = 'UnexpectedSigningMethodError';
    this.algorithm = algorithm;
  }
}

/** Store-level absence. Folded into InvalidTokenError at the decode boundary. */
export class NotFoundError extends TokenError {
  constructor() {
    super('NOT_FOUND', 'not found');
    this.name = 'NotFoundError';
  }
}

export function isTokenError(error: unknown): error is TokenError {
  return error instanceof TokenError;
}
