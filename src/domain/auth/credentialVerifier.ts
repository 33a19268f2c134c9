import { Credential, isExpired } from './credential.js';

export interface SecretVerifier {
  verify(secret: string, keyHash: string): Promise<boolean>;
}

/**
 * Find the credential a presented secret authenticates as.
 *
 * Candidates are checked in the order given. Expiry is only looked at after
 * the hash matches, and an expired match does not end the scan: a later
 * candidate with the same secret can still win. Returns null when nothing
 * matches.
 */
export async function findFirstValidCredential(
  secret: string,
  candidates: readonly Credential[],
  now: Date,
  hasher: SecretVerifier
): Promise<Credential | null> {
  for (const candidate of candidates) {
    if (!(await hasher.verify(secret, candidate.keyHash))) {
      continue;
    }
    if (isExpired(candidate, now)) {
      continue;
    }
    return candidate;
  }
  return null;
}
