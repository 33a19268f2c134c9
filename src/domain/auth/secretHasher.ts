import { hash, verify, argon2id } from 'argon2';
import { createHmac, randomBytes } from 'crypto';

/**
 * Longest secret prefix, in UTF-8 bytes, that reaches the hash. Both the
 * hashing and the verification path cut secrets here. Changing this value
 * invalidates every key already issued.
 */
export const SECRET_HASH_INPUT_BYTES = 72;

export const API_KEY_PREFIX = 'ffk_';
const API_KEY_RANDOM_BYTES = 32;

export interface SecretHasherOptions {
  /** HMAC key for the deterministic lookup digest. */
  lookupSecret: string;
  memoryCost?: number;
  timeCost?: number;
  parallelism?: number;
}

/**
 * Cut a secret to its first SECRET_HASH_INPUT_BYTES bytes. Works on the raw
 * bytes so a multi-byte character split at the boundary is handled the same
 * way on every path.
 */
export function truncateSecret(secret: string): Buffer {
  const bytes = Buffer.from(secret, 'utf8');
  return bytes.length > SECRET_HASH_INPUT_BYTES
    ? bytes.subarray(0, SECRET_HASH_INPUT_BYTES)
    : bytes;
}

/**
 * Argon2id hashing for API key secrets and passwords, plus the keyed digest
 * used to narrow credential lookups. Only API key secrets are truncated;
 * passwords are hashed whole.
 */
export class SecretHasher {
  private readonly lookupSecret: string;
  private readonly argonOptions: {
    type: typeof argon2id;
    memoryCost?: number;
    timeCost?: number;
    parallelism?: number;
  };

  constructor(options: SecretHasherOptions) {
    if (options.lookupSecret.length === 0) {
      throw new Error('lookupSecret must not be empty');
    }
    this.lookupSecret = options.lookupSecret;
    // argon2 spreads these over its defaults, so unset keys must be absent
    this.argonOptions = { type: argon2id };
    if (options.memoryCost !== undefined) this.argonOptions.memoryCost = options.memoryCost;
    if (options.timeCost !== undefined) this.argonOptions.timeCost = options.timeCost;
    if (options.parallelism !== undefined) this.argonOptions.parallelism = options.parallelism;
  }

  /**
   * Generate a new plaintext API key. Callers reveal it once and keep only
   * hash() and lookupDigest() of it.
   */
  generateSecret(): string {
    return API_KEY_PREFIX + randomBytes(API_KEY_RANDOM_BYTES).toString('hex');
  }

  async hash(secret: string): Promise<string> {
    return await hash(truncateSecret(secret), this.argonOptions);
  }

  /**
   * Verify a plain secret against an Argon2 hash. Malformed hashes verify as false.
   */
  async verify(secret: string, keyHash: string): Promise<boolean> {
    try {
      return await verify(keyHash, truncateSecret(secret));
    } catch {
      return false;
    }
  }

  async hashPassword(password: string): Promise<string> {
    return await hash(password, this.argonOptions);
  }

  async verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }

  /** HMAC-SHA256 of the truncated secret as 64-char hex. */
  lookupDigest(secret: string): string {
    return createHmac('sha256', this.lookupSecret)
      .update(truncateSecret(secret))
      .digest('hex');
  }
}
