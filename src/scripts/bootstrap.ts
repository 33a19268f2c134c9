import { loadConfigFromEnvironment } from '../infra/config.js';
import { createPool } from '../infra/db/pool.js';
import { IdentityRepo } from '../infra/db/identityRepo.js';
import { SecretHasher } from '../domain/auth/secretHasher.js';
import { BootstrapAdminUseCase } from '../application/auth/bootstrap.js';

export const DEFAULT_ADMIN_EMAIL = 'admin@localhost';

/**
 * Provision the first identity and print its API key. The key is written to
 * stdout once and is not recoverable afterwards.
 */
export async function bootstrap(email: string): Promise<void> {
  const config = loadConfigFromEnvironment();
  const pool = createPool({ databaseUrl: config.databaseUrl, max: 1 });
  const hasher = new SecretHasher({
    lookupSecret: config.apiKeyLookupSecret,
    memoryCost: config.argon2.memoryCost,
    timeCost: config.argon2.timeCost,
  });

  try {
    const result = await new BootstrapAdminUseCase(new IdentityRepo(pool), hasher).execute({
      email,
      password: process.env.BOOTSTRAP_ADMIN_PASSWORD,
    });

    if (!result) {
      console.log('[auth] Identities already exist; nothing to bootstrap.');
      return;
    }

    console.log(`[auth] Created admin identity ${result.identity.id} (${result.identity.email}).`);
    console.log('[auth] API key (shown once, store it now):');
    process.stdout.write(`${result.apiKey.secret}\n`);
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('bootstrap.ts')) {
  bootstrap(process.argv[2] ?? process.env.BOOTSTRAP_ADMIN_EMAIL ?? DEFAULT_ADMIN_EMAIL)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('[auth] Bootstrap failed:', error);
      process.exit(1);
    });
}
