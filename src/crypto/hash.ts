import { timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

/**
 * Verifies a presented secret against the stored one.
 * Used for both client and resource owner authentication.
 */
export type SecretVerifier = (stored: string, presented: string) => boolean | Promise<boolean>;

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a secret using scrypt for long-term storage
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(16);
  const N = 16384; // CPU/memory cost
  const r = 8; // Block size
  const p = 1; // Parallelization
  const keyLength = 64;

  const hash = await scryptAsync(secret, salt, keyLength, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a secret against its scrypt hash
 */
export async function verifySecretHash(secret: string, hash: string): Promise<boolean> {
  const parts = hash.split('$');

  // Expected format: $scrypt$N$r$p$salt$hash
  const [, algorithm, nPart, rPart, pPart, saltPart, hashPart] = parts;
  if (
    parts.length !== 7 ||
    algorithm !== 'scrypt' ||
    !nPart || !rPart || !pPart || !saltPart || !hashPart
  ) {
    return false;
  }

  const N = parseInt(nPart, 10);
  const r = parseInt(rPart, 10);
  const p = parseInt(pPart, 10);
  const salt = Buffer.from(saltPart, 'base64');
  const storedHash = Buffer.from(hashPart, 'base64');

  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p) || storedHash.length === 0) {
    return false;
  }

  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Verifier for secrets stored as plaintext (tests, development)
 */
export const plainSecretVerifier: SecretVerifier = (stored, presented) =>
  constantTimeCompare(stored, presented);

/**
 * Verifier for secrets stored with hashSecret()
 */
export const scryptSecretVerifier: SecretVerifier = (stored, presented) =>
  verifySecretHash(presented, stored);
