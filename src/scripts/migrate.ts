import dotenv from 'dotenv';
import { createPool } from '../infra/db/pool.js';
import { applyMigrations } from '../infra/db/migrations.js';

dotenv.config();

export async function migrate(databaseUrl: string): Promise<void> {
  const pool = createPool({ databaseUrl, max: 1 });
  try {
    console.log('[db] Starting migrations...');
    const applied = await applyMigrations(pool);
    console.log(
      applied.length === 0
        ? '[db] No pending migrations.'
        : `[db] Applied ${applied.length} migration(s).`
    );
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('migrate.ts')) {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error('DATABASE_URL environment variable is required');
    process.exit(1);
  }
  migrate(databaseUrl)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('[db] Migration failed:', error);
      process.exit(1);
    });
}
