/**
 * Stored API key record. Only the one-way hash and the lookup digest of the
 * secret are kept; the plaintext exists solely in the issuance response.
 */
export interface Credential {
  readonly id: number;
  readonly identityId: number;
  readonly keyHash: string;
  /** Null for keys issued before lookup digests existed. */
  readonly lookupDigest: string | null;
  readonly name: string;
  readonly createdAt: Date;
  readonly lastUsedAt: Date | null;
  readonly expiresAt: Date | null;
}

export interface NewCredential {
  identityId: number;
  keyHash: string;
  lookupDigest: string | null;
  name: string;
  expiresAt: Date | null;
}

export function isExpired(credential: Pick<Credential, 'expiresAt'>, now: Date): boolean {
  return credential.expiresAt !== null && credential.expiresAt.getTime() <= now.getTime();
}
