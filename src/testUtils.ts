/**
 * Shared helpers for the test suites.
 */

/** Flip one character in the middle of a JWT's signature segment */
export function tamperSignature(token: string): string {
  const [header, payload, signature] = token.split('.');
  const index = Math.floor(signature.length / 2);
  const replacement = signature[index] === 'A' ? 'B' : 'A';
  return `${header}.${payload}.${signature.slice(0, index)}${replacement}${signature.slice(index + 1)}`;
}

export function base64urlJson(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

/** An unsigned token with `alg: none` */
export function unsignedToken(payload: object): string {
  return `${base64urlJson({ alg: 'none', typ: 'JWT' })}.${base64urlJson(payload)}.`;
}
