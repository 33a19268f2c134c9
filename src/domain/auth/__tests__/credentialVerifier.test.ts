import { describe, it, expect, beforeAll } from 'vitest';
import { Credential, isExpired } from '../credential.js';
import { findFirstValidCredential } from '../credentialVerifier.js';
import { createTestHasher } from '../../../__tests__/fixtures.js';

describe('findFirstValidCredential', () => {
  const hasher = createTestHasher();
  const now = new Date('2025-06-01T12:00:00Z');
  const secret = 'ffk_test-secret-one';

  let matchingHash: string;
  let otherMatchingHash: string;
  let foreignHash: string;

  const credential = (id: number, keyHash: string, expiresAt: Date | null = null): Credential => ({
    id,
    identityId: 100 + id,
    keyHash,
    lookupDigest: null,
    name: `key-${id}`,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    lastUsedAt: null,
    expiresAt,
  });

  beforeAll(async () => {
    [matchingHash, otherMatchingHash, foreignHash] = await Promise.all([
      hasher.hash(secret),
      hasher.hash(secret),
      hasher.hash('ffk_test-secret-two'),
    ]);
  });

  it('should return the credential whose hash matches', async () => {
    const candidates = [credential(1, foreignHash), credential(2, matchingHash)];

    const match = await findFirstValidCredential(secret, candidates, now, hasher);

    expect(match?.id).toBe(2);
  });

  it('should return null when no hash matches', async () => {
    const match = await findFirstValidCredential(secret, [credential(1, foreignHash)], now, hasher);

    expect(match).toBeNull();
  });

  it('should return null for an empty candidate list', async () => {
    await expect(findFirstValidCredential(secret, [], now, hasher)).resolves.toBeNull();
  });

  it('should pick the first valid match in iteration order', async () => {
    const candidates = [credential(5, otherMatchingHash), credential(3, matchingHash)];

    const match = await findFirstValidCredential(secret, candidates, now, hasher);

    expect(match?.id).toBe(5);
  });

  it('should skip an expired match and keep scanning', async () => {
    const candidates = [
      credential(1, matchingHash, new Date('2025-06-01T11:59:59Z')),
      credential(2, otherMatchingHash, new Date('2025-06-02T00:00:00Z')),
    ];

    const match = await findFirstValidCredential(secret, candidates, now, hasher);

    expect(match?.id).toBe(2);
  });

  it('should return null when the only match is expired', async () => {
    const candidates = [credential(1, matchingHash, new Date('2025-05-31T00:00:00Z'))];

    await expect(findFirstValidCredential(secret, candidates, now, hasher)).resolves.toBeNull();
  });

  it('should accept a match expiring after now', async () => {
    const candidates = [credential(1, matchingHash, new Date('2025-06-01T12:00:01Z'))];

    const match = await findFirstValidCredential(secret, candidates, now, hasher);

    expect(match?.id).toBe(1);
  });
});

describe('isExpired', () => {
  const now = new Date('2025-06-01T12:00:00Z');

  it('should never expire a credential without expiry', () => {
    expect(isExpired({ expiresAt: null }, now)).toBe(false);
  });

  it('should treat the expiry instant itself as expired', () => {
    expect(isExpired({ expiresAt: new Date('2025-06-01T12:00:00Z') }, now)).toBe(true);
    expect(isExpired({ expiresAt: new Date('2025-06-01T12:00:00.001Z') }, now)).toBe(false);
  });
});
