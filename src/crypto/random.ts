import { randomBytes } from 'node:crypto';

/**
 * Encode bytes as unpadded base64url
 */
export function toBase64Url(bytes: Buffer): string {
  return bytes
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Decode unpadded base64url, or null unless the text is the canonical
 * encoding of the decoded bytes
 */
export function fromBase64Url(text: string): Buffer | null {
  if (!BASE64URL_PATTERN.test(text)) {
    return null;
  }
  const bytes = Buffer.from(text, 'base64url');
  return toBase64Url(bytes) === text ? bytes : null;
}

/**
 * Generate cryptographically secure random bytes
 */
export function generateRandomBytes(length: number): Buffer {
  return randomBytes(length);
}

