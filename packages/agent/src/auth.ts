import { randomBytes, createHash, timingSafeEqual } from 'node:crypto';

/** Token length in bytes (generates a 64-char hex string). */
const TOKEN_BYTES = 32;

/**
 * Generate a random agent token.
 */
export function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString('hex');
}

/**
 * Read the token out of an `Authorization: Bearer <token>` header.
 */
export function parseBearerToken(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;

  const match = /^Bearer\s+(\S+)\s*$/i.exec(value);
  return match ? match[1] : null;
}

/**
 * Check a presented token against the accepted ones. Both sides are hashed
 * first so the comparison is constant-time regardless of token length, and
 * every accepted token is compared.
 */
export function verifyToken(token: string, acceptedTokens: readonly string[]): boolean {
  const presented = digest(token);
  let valid = false;

  for (const accepted of acceptedTokens) {
    if (timingSafeEqual(presented, digest(accepted))) {
      valid = true;
    }
  }

  return valid;
}

function digest(token: string): Buffer {
  return createHash('sha256').update(token).digest();
}
