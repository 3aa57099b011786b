import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';
import { ConfigurationError } from './utils/errors.js';

/**
 * Zod schema for a PostgreSQL connection string
 */
const postgresUrlSchema = z
  .string()
  .regex(/^postgres(ql)?:\/\//, 'Must be a postgres:// connection string');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  database: z.object({
    url: postgresUrlSchema.optional(),
    sourceUrl: postgresUrlSchema.optional(),
    poolMax: z.coerce.number().int().min(1).max(50).default(5),
    statementTimeoutMs: z.coerce.number().int().min(0).default(30000),
  }),
  cache: z.object({
    path: z.string().min(1).default('./data/cache.db'),
  }),
  retry: z.object({
    maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
    initialDelayMs: z.coerce.number().int().min(0).default(1000),
    maxDelayMs: z.coerce.number().int().min(0).default(30000),
  }),
  backfill: z.object({
    batchSize: z.coerce.number().int().min(1).max(2000).default(500),
    throttleMs: z.coerce.number().int().min(0).default(100),
  }),
  processSync: z.object({
    limit: z.coerce.number().int().min(1).default(50),
  }),
  gapFill: z.object({
    limit: z.coerce.number().int().min(1).default(500),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

/**
 * Typed configuration object
 */
export type Config = z.infer<typeof configSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Parse and validate configuration from an environment map
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = emptyToUndefined(env.DATABASE_URL);

  const rawConfig = {
    database: {
      url: databaseUrl,
      sourceUrl: emptyToUndefined(env.SOURCE_DATABASE_URL) ?? databaseUrl,
      poolMax: env.DB_POOL_MAX ?? '5',
      statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS ?? '30000',
    },
    cache: {
      path: env.CACHE_DB_PATH ?? './data/cache.db',
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS ?? '3',
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS ?? '1000',
      maxDelayMs: env.RETRY_MAX_DELAY_MS ?? '30000',
    },
    backfill: {
      batchSize: env.BACKFILL_BATCH_SIZE ?? '500',
      throttleMs: env.BACKFILL_THROTTLE_MS ?? '100',
    },
    processSync: {
      limit: env.PROCESS_SYNC_LIMIT ?? '50',
    },
    gapFill: {
      limit: env.GAP_FILL_LIMIT ?? '500',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Load `.env.local` then `.env` and parse the process environment
 */
export function loadConfig(): Config {
  // Load environment variables from .env.local for development
  dotenvConfig({ path: '.env.local' });
  dotenvConfig(); // Fallback to .env
  return parseConfig(process.env);
}

/**
 * Connection string of the canonical store, or a configuration error
 */
export function requireDatabaseUrl(config: Config): string {
  if (!config.database.url) {
    throw new ConfigurationError('DATABASE_URL is required for this command');
  }
  return config.database.url;
}
