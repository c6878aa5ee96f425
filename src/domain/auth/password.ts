import { hash, verify, needsRehash } from 'argon2';
import { createHash, timingSafeEqual } from 'crypto';

const ARGON2_PREFIX = '$argon2';
const LEGACY_SEPARATOR = ':';

/**
 * Password hashing using Argon2id.
 *
 * Credentials written before the move to Argon2 have the form `salt:digest`
 * (hex SHA-256 of password + salt). They still verify, and `needsRehash`
 * reports them so callers can upgrade them after a successful login.
 */
export class Password {
  /**
   * Hash a plain text password. Every call uses a fresh random salt.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a stored credential.
   * Malformed credentials verify as false.
   */
  static async verify(plainPassword: string, credential: string): Promise<boolean> {
    if (credential.startsWith(ARGON2_PREFIX)) {
      try {
        return await verify(credential, plainPassword);
      } catch {
        return false;
      }
    }
    return verifyLegacy(plainPassword, credential);
  }

  static needsRehash(credential: string): boolean {
    if (!credential.startsWith(ARGON2_PREFIX)) {
      return true;
    }
    try {
      return needsRehash(credential);
    } catch {
      return true;
    }
  }
}

function verifyLegacy(plainPassword: string, credential: string): boolean {
  const parts = credential.split(LEGACY_SEPARATOR);
  if (parts.length !== 2) {
    return false;
  }

  const [salt, storedDigest] = parts;
  const computed = Buffer.from(legacyDigest(plainPassword, salt));
  const stored = Buffer.from(storedDigest);

  if (computed.length !== stored.length) {
    return false;
  }
  return timingSafeEqual(computed, stored);
}

export function legacyDigest(plainPassword: string, salt: string): string {
  return createHash('sha256').update(plainPassword + salt).digest('hex');
}
