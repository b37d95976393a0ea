import { createHmac, timingSafeEqual } from 'node:crypto';
import { fromBase64Url, generateRandomBytes, toBase64Url } from './random.js';

/**
 * Raised when the random source cannot produce key material.
 * Treated as an operational fault, never as a per-request OAuth error.
 */
export class TokenGenerationError extends Error {
  constructor(cause: unknown) {
    super('Unable to generate token key material');
    this.name = 'TokenGenerationError';
    this.cause = cause;
  }
}

/**
 * Raised when a presented token string is structurally invalid or its
 * signature was not produced with the server secret
 */
export class MalformedTokenError extends Error {
  constructor(message: string = 'malformed token') {
    super(message);
    this.name = 'MalformedTokenError';
  }
}

const SEPARATOR = '.';

function sign(secret: Buffer, key: Buffer): Buffer {
  return createHmac('sha256', secret).update(key).digest();
}

/**
 * Opaque token: a random key and its HMAC-SHA256 signature.
 *
 * String form is `base64url(key).base64url(signature)`. Only the signature
 * is ever stored server-side; it is the lookup key for the credential.
 */
export class OpaqueToken {
  private readonly key: Buffer;
  private readonly signatureBytes: Buffer;

  constructor(key: Buffer, signature: Buffer) {
    this.key = key;
    this.signatureBytes = signature;
  }

  /**
   * Canonical lookup key, stable across re-encoding
   */
  get signature(): string {
    return toBase64Url(this.signatureBytes);
  }

  toString(): string {
    return `${toBase64Url(this.key)}${SEPARATOR}${this.signature}`;
  }
}

/**
 * Generate a new token from the server secret
 *
 * @throws TokenGenerationError when the random source fails
 */
export function generateToken(secret: Buffer, keyLength: number): OpaqueToken {
  let key: Buffer;
  try {
    key = generateRandomBytes(keyLength);
  } catch (error) {
    throw new TokenGenerationError(error);
  }
  return new OpaqueToken(key, sign(secret, key));
}

/**
 * Parse and verify a presented token string
 *
 * @throws MalformedTokenError when the string is invalid or forged
 */
export function parseToken(secret: Buffer, text: string): OpaqueToken {
  const parts = text.split(SEPARATOR);
  if (parts.length !== 2) {
    throw new MalformedTokenError();
  }

  const key = fromBase64Url(parts[0] ?? '');
  const signature = fromBase64Url(parts[1] ?? '');
  if (!key || !signature) {
    throw new MalformedTokenError();
  }

  const expected = sign(secret, key);
  if (expected.length !== signature.length || !timingSafeEqual(expected, signature)) {
    throw new MalformedTokenError('invalid token signature');
  }

  return new OpaqueToken(key, signature);
}
