import { describe, it, expect } from 'vitest';
import {
  API_KEY_PREFIX,
  SECRET_HASH_INPUT_BYTES,
  SecretHasher,
  truncateSecret,
} from '../secretHasher.js';
import { createTestHasher } from '../../../__tests__/fixtures.js';

describe('truncateSecret', () => {
  it('should leave secrets within the boundary untouched', () => {
    expect(truncateSecret('short-secret').toString('utf8')).toBe('short-secret');
  });

  it('should cut at SECRET_HASH_INPUT_BYTES bytes', () => {
    const secret = 'a'.repeat(100);
    const bytes = truncateSecret(secret);

    expect(SECRET_HASH_INPUT_BYTES).toBe(72);
    expect(bytes.length).toBe(72);
    expect(bytes.toString('utf8')).toBe('a'.repeat(72));
  });

  it('should count bytes, not characters', () => {
    // 'é' is two bytes in UTF-8: 40 of them are 80 bytes
    const bytes = truncateSecret('é'.repeat(40));

    expect(bytes.length).toBe(72);
    expect(bytes.equals(Buffer.from('é'.repeat(36), 'utf8'))).toBe(true);
  });

  it('should split a multi-byte character at the boundary', () => {
    // 71 ASCII bytes, then a 2-byte character straddling byte 72
    const bytes = truncateSecret('a'.repeat(71) + 'é');

    expect(bytes.length).toBe(72);
    expect(bytes[71]).toBe(Buffer.from('é', 'utf8')[0]);
  });
});

describe('SecretHasher', () => {
  const hasher = createTestHasher();

  it('should generate prefixed 64-hex-digit secrets within the hash boundary', () => {
    const secret = hasher.generateSecret();

    expect(secret).toMatch(/^ffk_[0-9a-f]{64}$/);
    expect(secret.startsWith(API_KEY_PREFIX)).toBe(true);
    expect(Buffer.byteLength(secret, 'utf8')).toBeLessThanOrEqual(SECRET_HASH_INPUT_BYTES);
    expect(hasher.generateSecret()).not.toBe(secret);
  });

  it('should verify a secret against its own hash', async () => {
    const secret = hasher.generateSecret();
    const keyHash = await hasher.hash(secret);

    expect(keyHash.startsWith('$argon2id$')).toBe(true);
    expect(keyHash).not.toContain(secret);
    await expect(hasher.verify(secret, keyHash)).resolves.toBe(true);
    await expect(hasher.verify(`${secret}x`, keyHash)).resolves.toBe(false);
  });

  it('should salt hashes so the same secret hashes differently', async () => {
    const secret = 'same-secret';
    const [first, second] = await Promise.all([hasher.hash(secret), hasher.hash(secret)]);

    expect(first).not.toBe(second);
    await expect(hasher.verify(secret, first)).resolves.toBe(true);
    await expect(hasher.verify(secret, second)).resolves.toBe(true);
  });

  it('should verify secrets longer than the boundary', async () => {
    const secret = 'k'.repeat(72) + '-tail-beyond-the-boundary';
    const keyHash = await hasher.hash(secret);

    await expect(hasher.verify(secret, keyHash)).resolves.toBe(true);
    // Only the first 72 bytes take part
    await expect(hasher.verify('k'.repeat(72), keyHash)).resolves.toBe(true);
    await expect(hasher.verify('k'.repeat(72) + '-other-tail', keyHash)).resolves.toBe(true);
    await expect(hasher.verify('k'.repeat(71), keyHash)).resolves.toBe(false);
  });

  it('should verify long secrets whose boundary splits a multi-byte character', async () => {
    const secret = 'a'.repeat(71) + 'ééé';
    const keyHash = await hasher.hash(secret);

    await expect(hasher.verify(secret, keyHash)).resolves.toBe(true);
    expect(hasher.lookupDigest(secret)).toBe(hasher.lookupDigest('a'.repeat(71) + 'é'));
  });

  it('should treat a malformed hash as a mismatch', async () => {
    await expect(hasher.verify('anything', 'not-a-hash')).resolves.toBe(false);
  });

  it('should derive a deterministic, keyed lookup digest', () => {
    const digest = hasher.lookupDigest('ffk_abc');

    expect(digest).toMatch(/^[0-9a-f]{64}$/);
    expect(hasher.lookupDigest('ffk_abc')).toBe(digest);
    expect(hasher.lookupDigest('ffk_abd')).not.toBe(digest);
    expect(createTestHasher('another-test-secret').lookupDigest('ffk_abc')).not.toBe(digest);
  });

  it('should hash passwords without cutting them at the boundary', async () => {
    const prefix = 'p'.repeat(SECRET_HASH_INPUT_BYTES);
    const passwordHash = await hasher.hashPassword(`${prefix}-first`);

    await expect(hasher.verifyPassword(`${prefix}-first`, passwordHash)).resolves.toBe(true);
    await expect(hasher.verifyPassword(`${prefix}-second`, passwordHash)).resolves.toBe(false);
    await expect(hasher.verifyPassword(prefix, passwordHash)).resolves.toBe(false);
  });

  it('should treat a malformed password hash as a mismatch', async () => {
    await expect(hasher.verifyPassword('password123', 'not-a-hash')).resolves.toBe(false);
  });

  it('should refuse an empty lookup secret', () => {
    expect(() => new SecretHasher({ lookupSecret: '' })).toThrow('lookupSecret must not be empty');
  });
});
