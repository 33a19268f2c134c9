import pg from 'pg';
import { Credential, NewCredential } from '../../domain/auth/credential.js';
import { CredentialRepository } from '../../application/ports.js';
import { NotFoundOrForbiddenError } from '../../application/errors.js';
import { isForeignKeyViolation, withStore } from './storeErrors.js';

export interface CredentialRow {
  id: number;
  user_id: number;
  key_hash: string;
  lookup_digest: string | null;
  name: string;
  created_at: Date;
  last_used_at: Date | null;
  expires_at: Date | null;
}

export const CREDENTIAL_COLUMNS =
  'id, user_id, key_hash, lookup_digest, name, created_at, last_used_at, expires_at';

export function toCredential(row: CredentialRow): Credential {
  return {
    id: row.id,
    identityId: row.user_id,
    keyHash: row.key_hash,
    lookupDigest: row.lookup_digest,
    name: row.name,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
    expiresAt: row.expires_at,
  };
}

export class CredentialRepo implements CredentialRepository {
  constructor(private pool: pg.Pool) {}

  async findCandidates(lookupDigest: string): Promise<Credential[]> {
    const result = await withStore(() =>
      this.pool.query<CredentialRow>(
        `SELECT ${CREDENTIAL_COLUMNS}
         FROM api_keys
         WHERE lookup_digest = $1 OR lookup_digest IS NULL
         ORDER BY id ASC`,
        [lookupDigest]
      )
    );
    return result.rows.map(toCredential);
  }

  async create(credential: NewCredential): Promise<Credential> {
    try {
      const result = await withStore(() =>
        this.pool.query<CredentialRow>(
          `INSERT INTO api_keys (user_id, key_hash, lookup_digest, name, expires_at)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${CREDENTIAL_COLUMNS}`,
          [
            credential.identityId,
            credential.keyHash,
            credential.lookupDigest,
            credential.name,
            credential.expiresAt,
          ]
        )
      );
      return toCredential(result.rows[0]);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundOrForbiddenError('Identity');
      }
      throw error;
    }
  }

  async touchLastUsed(id: number, usedAt: Date): Promise<void> {
    await withStore(() =>
      this.pool.query('UPDATE api_keys SET last_used_at = $2 WHERE id = $1', [id, usedAt])
    );
  }

  async listByIdentity(identityId: number): Promise<Credential[]> {
    const result = await withStore(() =>
      this.pool.query<CredentialRow>(
        `SELECT ${CREDENTIAL_COLUMNS} FROM api_keys WHERE user_id = $1 ORDER BY id ASC`,
        [identityId]
      )
    );
    return result.rows.map(toCredential);
  }

  async deleteOwned(id: number, identityId: number): Promise<boolean> {
    const result = await withStore(() =>
      this.pool.query('DELETE FROM api_keys WHERE id = $1 AND user_id = $2', [id, identityId])
    );
    return (result.rowCount ?? 0) > 0;
  }
}
