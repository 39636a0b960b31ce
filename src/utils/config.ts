import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { basename, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../core/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/utils -> root, or dist/src/utils -> root once compiled
const SRC_PARENT = resolve(__dirname, '../..');
export const PROJECT_ROOT = basename(SRC_PARENT) === 'dist' ? resolve(SRC_PARENT, '..') : SRC_PARENT;

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required — set in .env'),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(30),
  ADMIN_USER_ID: z.coerce.number().int().positive('ADMIN_USER_ID must be a positive Telegram user id'),

  // Storage
  DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/nudge.db'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_HOST: z.string().optional(),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: z.string().optional(),
  POSTGRES_USER: z.string().optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_SSL: booleanFromEnv.default('false'),
  POSTGRES_SSL_REJECT_UNAUTHORIZED: booleanFromEnv.default('true'),

  // Scheduling and correlation
  SCHEDULER_TICK_SECONDS: z.coerce.number().int().min(5).default(60),
  NOTIFICATION_TTL_DAYS: z.coerce.number().int().min(1).default(90),
  SEND_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  DISABLE_UNREACHABLE_USERS: booleanFromEnv.default('true'),

  // Cache
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).default(10_000),

  // Broadcast
  BROADCAST_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
  BROADCAST_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  BROADCAST_BATCH_DELAY_MS: z.coerce.number().int().min(0).default(500),
  BROADCAST_PAGE_SIZE: z.coerce.number().int().min(1).default(500),

  // Infrastructure
  HEALTH_PORT: z.coerce.number().int().min(0).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
}).superRefine((env, ctx) => {
  if (env.DB_DIALECT !== 'postgres' || env.DATABASE_URL) return;
  if (!env.POSTGRES_HOST || !env.POSTGRES_DB || !env.POSTGRES_USER || !env.POSTGRES_PASSWORD) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'Postgres needs DATABASE_URL or POSTGRES_HOST/POSTGRES_DB/POSTGRES_USER/POSTGRES_PASSWORD',
    });
  }
});

export type Config = z.infer<typeof envSchema>;

/**
 * Validate an environment map. Throws ConfigError listing every issue.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Load .env from the project root and validate process.env.
 * Exits the process on invalid configuration.
 */
export function loadConfig(): Config {
  loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

  try {
    return parseConfig(process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error('❌ Invalid environment variables:');
    for (const issue of err.issues) {
      console.error(`   ${issue}`);
    }
    process.exit(1);
  }
}

export type PostgresConnectionConfig = Pick<
  Config,
  'DATABASE_URL' | 'POSTGRES_HOST' | 'POSTGRES_PORT' | 'POSTGRES_DB' | 'POSTGRES_USER' | 'POSTGRES_PASSWORD'
>;

export function resolvePostgresConnectionString(config: PostgresConnectionConfig): string {
  if (config.DATABASE_URL) return config.DATABASE_URL;

  if (!config.POSTGRES_HOST || !config.POSTGRES_DB || !config.POSTGRES_USER || !config.POSTGRES_PASSWORD) {
    throw new ConfigError(['Missing postgres connection settings. Set DATABASE_URL or POSTGRES_HOST/POSTGRES_DB/POSTGRES_USER/POSTGRES_PASSWORD.']);
  }

  const encodedUser = encodeURIComponent(config.POSTGRES_USER);
  const encodedPass = encodeURIComponent(config.POSTGRES_PASSWORD);
  return `postgres://${encodedUser}:${encodedPass}@${config.POSTGRES_HOST}:${config.POSTGRES_PORT}/${config.POSTGRES_DB}`;
}
