import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

/**
 * scrypt cost parameters for client secrets
 */
const SCRYPT_N = 16384; // CPU/memory cost
const SCRYPT_R = 8; // Block size
const SCRYPT_P = 1; // Parallelization
const SCRYPT_KEY_LENGTH = 64;
const SCRYPT_SALT_LENGTH = 16;

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
 * Hash a value using SHA-256 (for tokens, codes)
 * Used for storing authorization codes, refresh tokens and personal access tokens
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}

/**
 * Compare two strings in constant time.
 * Both sides are digested first so the comparison length never depends on the input.
 */
export function constantTimeEqual(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a, 'utf8').digest();
  const digestB = createHash('sha256').update(b, 'utf8').digest();

  return timingSafeEqual(digestA, digestB) && a.length === b.length;
}

/**
 * Hash a client secret using scrypt (memory-hard, for long-term storage)
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashClientSecret(secret: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$scrypt$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a client secret against its hash
 */
export async function verifyClientSecret(secret: string, hash: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, scheme, n, r, p, salt, stored, ...rest] = hash.split('$');

  if (
    empty !== '' ||
    scheme !== 'scrypt' ||
    n === undefined ||
    r === undefined ||
    p === undefined ||
    salt === undefined ||
    stored === undefined ||
    rest.length > 0
  ) {
    return false;
  }

  const storedHash = Buffer.from(stored, 'base64');
  const derivedHash = await scryptAsync(secret, Buffer.from(salt, 'base64'), storedHash.length, {
    N: parseInt(n, 10),
    r: parseInt(r, 10),
    p: parseInt(p, 10),
  });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Hash for token lookup (quick hash, not for long-term secret storage)
 * Used for tokens that are already random and high-entropy
 */
export function hashToken(token: string): string {
  return sha256(token);
}
