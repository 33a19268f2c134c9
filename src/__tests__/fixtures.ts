import { SecretHasher } from '../domain/auth/secretHasher.js';

export const TEST_LOOKUP_SECRET = 'test-secret';

/** Argon2 at low cost so suites stay fast. */
export function createTestHasher(lookupSecret: string = TEST_LOOKUP_SECRET): SecretHasher {
  return new SecretHasher({ lookupSecret, memoryCost: 4096, timeCost: 2, parallelism: 1 });
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}
