import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../logger.js';

const configSchema = z.object({
  DATABASE_URL: z.string().min(1).default(':memory:'),
  MODELSQL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  MODELSQL_MIGRATIONS_DIR: z.string().min(1).default('./migrations'),
  MODELSQL_MIGRATIONS_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier')
    .default('migrations'),
});

export interface ModelsqlConfig {
  databaseUrl: string;
  logLevel: LogLevel;
  migrationsPath: string;
  migrationsTable: string;
}

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Reads configuration from environment variables. Unset or empty variables
 * fall back to their defaults.
 */
export function loadConfig(env: ConfigEnv = process.env): ModelsqlConfig {
  const input: ConfigEnv = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    logLevel: parsed.data.MODELSQL_LOG_LEVEL,
    migrationsPath: parsed.data.MODELSQL_MIGRATIONS_DIR,
    migrationsTable: parsed.data.MODELSQL_MIGRATIONS_TABLE,
  };
}
