import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

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
 * Hash a value using SHA-256 (for tokens, codes, session ids)
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Compare two strings in constant time
 *
 * Both sides are digested first so the comparison time does not depend on
 * where (or whether) the lengths differ.
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a, 'utf8').digest();
  const digestB = createHash('sha256').update(b, 'utf8').digest();

  return timingSafeEqual(digestA, digestB) && a.length === b.length;
}

/**
 * Hash a password or client secret using scrypt
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
 * Verify a password or client secret against its scrypt hash
 */
export async function verifySecret(secret: string, hash: string): Promise<boolean> {
  const parts = hash.split('$');

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

  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Hash for token lookup (quick hash, not for long-term storage of secrets)
 * Used for values that are already random and high-entropy
 */
export function hashToken(token: string): string {
  return sha256(token);
}
