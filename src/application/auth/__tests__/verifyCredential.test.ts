import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { VerifyCredentialUseCase } from '../verifyCredential.js';
import { IssueCredentialUseCase } from '../issueCredential.js';
import {
  IdentityMissingError,
  InvalidOrExpiredCredentialError,
  MissingCredentialError,
} from '../../errors.js';
import { MemoryStore, MemoryRepositories, createMemoryRepositories } from '../../../__tests__/memoryStore.js';
import { createTestHasher } from '../../../__tests__/fixtures.js';

describe('VerifyCredentialUseCase', () => {
  const hasher = createTestHasher();
  const issuedAt = new Date('2025-04-10T08:00:00Z');
  let store: MemoryStore;
  let repos: MemoryRepositories;
  let issue: IssueCredentialUseCase;
  let useCase: VerifyCredentialUseCase;
  let identityId: number;

  beforeEach(() => {
    store = new MemoryStore(() => issuedAt);
    repos = createMemoryRepositories(store);
    issue = new IssueCredentialUseCase(repos.credentials, hasher);
    useCase = new VerifyCredentialUseCase(repos.credentials, repos.identities, hasher);
    identityId = store.insertIdentity({ email: 'verify@example.com', passwordHash: 'hash' }).id;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should resolve a valid key to its identity and stamp last use', async () => {
    const { credential, secret } = await issue.execute({ identityId, name: 'ci' });
    const now = new Date('2025-04-10T09:30:00Z');

    const identity = await useCase.execute(secret, now);

    expect(identity.id).toBe(identityId);
    expect(identity.email).toBe('verify@example.com');
    expect(repos.credentials.touchCalls).toEqual([{ id: credential.id, usedAt: now }]);
    expect(store.credentials[0].lastUsedAt).toEqual(now);
  });

  it('should reject a missing or empty secret without touching the store', async () => {
    const findCandidates = vi.spyOn(repos.credentials, 'findCandidates');

    await expect(useCase.execute(undefined)).rejects.toBeInstanceOf(MissingCredentialError);
    await expect(useCase.execute('')).rejects.toBeInstanceOf(MissingCredentialError);
    expect(findCandidates).not.toHaveBeenCalled();
  });

  it('should reject an unknown secret', async () => {
    await issue.execute({ identityId, name: 'ci' });

    await expect(useCase.execute('ffk_not-a-real-key', issuedAt)).rejects.toBeInstanceOf(
      InvalidOrExpiredCredentialError
    );
    expect(repos.credentials.touchCalls).toEqual([]);
  });

  it('should reject an expired key on every attempt and never stamp it', async () => {
    const expiresAt = new Date('2025-04-10T12:00:00Z');
    const { secret } = await issue.execute({ identityId, name: 'short-lived', expiresAt });
    const later = new Date('2025-04-10T12:00:01Z');

    for (let attempt = 0; attempt < 3; attempt++) {
      await expect(useCase.execute(secret, later)).rejects.toBeInstanceOf(
        InvalidOrExpiredCredentialError
      );
    }
    expect(repos.credentials.touchCalls).toEqual([]);
    expect(store.credentials[0].lastUsedAt).toBeNull();
  });

  it('should use the injected clock when no time is passed', async () => {
    const { secret } = await issue.execute({
      identityId,
      name: 'short-lived',
      expiresAt: new Date('2025-04-10T12:00:00Z'),
    });
    const clocked = new VerifyCredentialUseCase(
      repos.credentials,
      repos.identities,
      hasher,
      () => new Date('2025-04-10T12:00:00Z')
    );

    await expect(clocked.execute(secret)).rejects.toBeInstanceOf(InvalidOrExpiredCredentialError);
  });

  it('should find a key stored without a lookup digest', async () => {
    const secret = 'ffk_legacy-test-secret';
    const legacy = store.insertCredential({
      identityId,
      keyHash: await hasher.hash(secret),
      lookupDigest: null,
      name: 'legacy',
      expiresAt: null,
    });

    const identity = await useCase.execute(secret, issuedAt);

    expect(identity.id).toBe(identityId);
    expect(repos.credentials.touchCalls).toEqual([{ id: legacy.id, usedAt: issuedAt }]);
  });

  it('should not find digested keys once the lookup secret changes', async () => {
    const { secret } = await issue.execute({ identityId, name: 'ci' });
    const rotated = createTestHasher('rotated-test-secret');
    const afterRotation = new VerifyCredentialUseCase(repos.credentials, repos.identities, rotated);

    await expect(afterRotation.execute(secret, issuedAt)).rejects.toBeInstanceOf(
      InvalidOrExpiredCredentialError
    );
    await expect(useCase.execute(secret, issuedAt)).resolves.toMatchObject({ id: identityId });
  });

  it('should fail with IdentityMissingError when the owner row is gone', async () => {
    const { secret } = await issue.execute({ identityId, name: 'orphan' });
    store.identities = [];

    await expect(useCase.execute(secret, issuedAt)).rejects.toBeInstanceOf(IdentityMissingError);
  });

  it('should still authenticate when the last-use stamp fails', async () => {
    const { credential, secret } = await issue.execute({ identityId, name: 'ci' });
    const stampError = new Error('connection reset');
    repos.credentials.touchError = stampError;
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const identity = await useCase.execute(secret, issuedAt);

    expect(identity.id).toBe(identityId);
    expect(warn).toHaveBeenCalledWith(
      `[auth] Could not record last use of API key ${credential.id}:`,
      stampError
    );
    expect(store.credentials[0].lastUsedAt).toBeNull();
  });
});
