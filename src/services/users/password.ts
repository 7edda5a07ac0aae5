/**
 * Password Hashing
 *
 * PBKDF2-SHA256 with a random per-password salt.
 * Stored format: $pbkdf2-sha256$<iterations>$<salt>$<hash> (base64url parts).
 *
 * @module services/users/password
 */

import crypto from 'crypto';
import { promisify } from 'util';

const pbkdf2 = promisify(crypto.pbkdf2);

const PBKDF2_ITERATIONS = 100_000;
const SALT_BYTE_LENGTH = 16;
const KEY_BYTE_LENGTH = 32;
const DIGEST = 'sha256';
const SCHEME = 'pbkdf2-sha256';

/**
 * Hash a password with a fresh salt
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTE_LENGTH);
  const hash = await pbkdf2(password, salt, PBKDF2_ITERATIONS, KEY_BYTE_LENGTH, DIGEST);
  return `$${SCHEME}$${String(PBKDF2_ITERATIONS)}$${salt.toString('base64url')}$${hash.toString('base64url')}`;
}

/**
 * Check a password against a stored hash
 * @returns false for a wrong password or a hash in any other format
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parts = stored.split('$');
  if (parts.length !== 5 || parts[1] !== SCHEME) {
    return false;
  }

  const iterations = Number.parseInt(parts[2], 10);
  if (!Number.isInteger(iterations) || iterations <= 0) {
    return false;
  }

  const salt = Buffer.from(parts[3], 'base64url');
  const expected = Buffer.from(parts[4], 'base64url');
  if (expected.length === 0) {
    return false;
  }

  const actual = await pbkdf2(password, salt, iterations, expected.length, DIGEST);
  return crypto.timingSafeEqual(actual, expected);
}

/** True when the value looks like a hash this module produced */
export function isPasswordHash(value: string): boolean {
  return /^\$pbkdf2-sha256\$\d+\$[A-Za-z0-9_-]+\$[A-Za-z0-9_-]+$/.test(value);
}
