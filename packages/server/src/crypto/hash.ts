import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

const SCRYPT_N = 16384; // CPU/memory cost
const SCRYPT_R = 8; // Block size
const SCRYPT_P = 1; // Parallelization
const SCRYPT_KEY_LENGTH = 64;

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
 * Hash a value using SHA-256, hex encoded
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
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
 * Hash a password with scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16);
  const hash = await scryptAsync(password, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$scrypt$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a password against a digest produced by `hashPassword`
 */
export async function verifyPassword(password: string, digest: string): Promise<boolean> {
  const parts = digest.split('$');

  // Expected format: $scrypt$N$r$p$salt$hash
  const [, scheme, nPart, rPart, pPart, saltPart, hashPart] = parts;
  if (parts.length !== 7 || scheme !== 'scrypt' || !nPart || !rPart || !pPart || !saltPart || !hashPart) {
    return false;
  }

  const N = parseInt(nPart, 10);
  const r = parseInt(rPart, 10);
  const p = parseInt(pPart, 10);
  const salt = Buffer.from(saltPart, 'base64');
  const storedHash = Buffer.from(hashPart, 'base64');

  const derivedHash = await scryptAsync(password, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Hash an opaque refresh secret for storage and lookup.
 * Secrets are already random and high-entropy, so a fast hash is enough.
 */
export function hashToken(token: string): string {
  return sha256(token);
}
