import { loadConfigFromEnvironment } from '../config.js';
import { createPool } from '../db/pool.js';
import { createPgRepositories } from '../db/repositories.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { createApp } from './app.js';

const config = loadConfigFromEnvironment();

// The one store handle for the life of the process
const pool = createPool({ databaseUrl: config.databaseUrl });

const hasher = new SecretHasher({
  lookupSecret: config.apiKeyLookupSecret,
  memoryCost: config.argon2.memoryCost,
  timeCost: config.argon2.timeCost,
});

const app = createApp({
  env: config.env,
  rateLimitPerMinute: config.rateLimitPerMinute,
  hasher,
  repositories: createPgRepositories(pool),
  healthProbe: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  console.log(`[http] Server running on http://localhost:${config.port} (${config.env})`);
  console.log(`[http] Health check: http://localhost:${config.port}/health`);
});

function shutdown(signal: string): void {
  console.log(`[http] ${signal} received, shutting down`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[db] Error closing pool:', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
