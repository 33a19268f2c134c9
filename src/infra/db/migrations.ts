import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import pg from 'pg';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Numbered .sql files in `dir`, sorted by version.
 */
export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return { filename, version: parseInt(match[1], 10) };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function applyMigration(pool: pg.Pool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
    console.log(`[db] Applied migration ${migration.version}: ${migration.filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every migration not yet recorded in schema_migrations.
 * Returns the versions applied by this call.
 */
export async function applyMigrations(
  pool: pg.Pool,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await listMigrations(dir);
  const applied = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  const appliedVersions = new Set(applied.rows.map((row) => row.version));

  const pending = migrations.filter((m) => !appliedVersions.has(m.version));
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }
  return pending.map((m) => m.version);
}
