import dotenv from 'dotenv';
import { z } from 'zod';

const optionalInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  APP_ENV: z.string().min(1).default('local'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  // Keys are found by their digest under this secret; changing it orphans every issued key
  API_KEY_LOOKUP_SECRET: z
    .string()
    .min(16, 'API_KEY_LOOKUP_SECRET must be at least 16 characters'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  ARGON2_MEMORY_COST: optionalInt,
  ARGON2_TIME_COST: optionalInt,
});

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl: string;
  apiKeyLookupSecret: string;
  rateLimitPerMinute: number;
  argon2: {
    memoryCost?: number;
    timeCost?: number;
  };
}

/**
 * Read and validate configuration. Empty variables count as unset so a
 * blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.parse(present);

  return {
    env: parsed.APP_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    apiKeyLookupSecret: parsed.API_KEY_LOOKUP_SECRET,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    argon2: {
      memoryCost: parsed.ARGON2_MEMORY_COST,
      timeCost: parsed.ARGON2_TIME_COST,
    },
  };
}

/** Load .env into process.env, then validate. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
