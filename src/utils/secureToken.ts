import crypto from 'crypto';

/** Bytes of entropy in every stateful token key */
export const TOKEN_BYTE_LENGTH = 32;

/**
 * Hex-encoded random string from the OS CSPRNG. `randomBytes` throws when the
 * entropy source fails; that error reaches the caller as is.
 */
export function generateRandomString(byteLength: number = TOKEN_BYTE_LENGTH): string {
  if (!Number.isInteger(byteLength) || byteLength <= 0) {
    throw new RangeError(`byteLength must be a positive integer, got ${byteLength}`);
  }
  return crypto.randomBytes(byteLength).toString('hex');
}
