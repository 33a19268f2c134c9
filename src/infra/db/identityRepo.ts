import pg from 'pg';
import { Identity, NewIdentity } from '../../domain/auth/identity.js';
import { Credential, NewCredential } from '../../domain/auth/credential.js';
import { IdentityRepository } from '../../application/ports.js';
import { ConflictError } from '../../application/errors.js';
import { CREDENTIAL_COLUMNS, CredentialRow, toCredential } from './credentialRepo.js';
import { isUniqueViolation, toStoreError, withStore } from './storeErrors.js';

interface IdentityRow {
  id: number;
  email: string;
  password_hash: string;
  created_at: Date;
}

function toIdentity(row: IdentityRow): Identity {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class IdentityRepo implements IdentityRepository {
  constructor(private pool: pg.Pool) {}

  async findByEmail(email: string): Promise<Identity | null> {
    const result = await withStore(() =>
      this.pool.query<IdentityRow>(
        'SELECT id, email, password_hash, created_at FROM users WHERE email = $1',
        [email]
      )
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toIdentity(result.rows[0]);
  }

  async findById(id: number): Promise<Identity | null> {
    const result = await withStore(() =>
      this.pool.query<IdentityRow>(
        'SELECT id, email, password_hash, created_at FROM users WHERE id = $1',
        [id]
      )
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toIdentity(result.rows[0]);
  }

  async createWithCredential(
    identity: NewIdentity,
    credential: Omit<NewCredential, 'identityId'>,
    options: { onlyIfEmpty?: boolean } = {}
  ): Promise<{ identity: Identity; credential: Credential } | null> {
    const client = await withStore(() => this.pool.connect());
    try {
      await client.query('BEGIN');

      if (options.onlyIfEmpty) {
        // Serialize concurrent bootstraps; the second one sees the first's row
        await client.query('LOCK TABLE users IN SHARE ROW EXCLUSIVE MODE');
        const existing = await client.query<{ present: boolean }>(
          'SELECT EXISTS (SELECT 1 FROM users) AS present'
        );
        if (existing.rows[0].present) {
          await client.query('ROLLBACK');
          return null;
        }
      }

      const userResult = await client.query<IdentityRow>(
        `INSERT INTO users (email, password_hash)
         VALUES ($1, $2)
         RETURNING id, email, password_hash, created_at`,
        [identity.email, identity.passwordHash]
      );
      const created = toIdentity(userResult.rows[0]);

      const keyResult = await client.query<CredentialRow>(
        `INSERT INTO api_keys (user_id, key_hash, lookup_digest, name, expires_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${CREDENTIAL_COLUMNS}`,
        [created.id, credential.keyHash, credential.lookupDigest, credential.name, credential.expiresAt]
      );

      await client.query('COMMIT');
      return { identity: created, credential: toCredential(keyResult.rows[0]) };
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('[db] Rollback failed:', rollbackError);
      });
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw toStoreError(error);
    } finally {
      client.release();
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await withStore(() => this.pool.query('DELETE FROM users WHERE id = $1', [id]));
    return (result.rowCount ?? 0) > 0;
  }
}
