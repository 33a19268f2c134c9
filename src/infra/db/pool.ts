import pg from 'pg';

const { Pool } = pg;

export interface PoolOptions {
  databaseUrl: string;
  max?: number;
}

/**
 * Create the process-wide connection pool. Built once at startup and handed
 * to every repository; closed only on shutdown.
 */
export function createPool(options: PoolOptions): pg.Pool {
  const pool = new Pool({
    connectionString: options.databaseUrl,
    max: options.max ?? 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('[db] Unexpected idle client error:', err);
  });

  return pool;
}
