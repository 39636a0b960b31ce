/**
 * Persistent storage entry point. Picks the backend named by DB_DIALECT.
 *
 * Callers depend on the DbBackend interface only; nothing outside the
 * db-* modules touches a driver handle.
 */

import { isAbsolute, resolve } from 'path';
import { logger } from '../middleware/logger.js';
import { PROJECT_ROOT, resolvePostgresConnectionString, type Config } from './config.js';
import { createPostgresBackend } from './db-postgres.js';
import { IN_MEMORY } from './db-schema.js';
import { createSqliteBackend } from './db-sqlite.js';
import type { DbBackend } from './db-backend.js';

export type { DbBackend } from './db-backend.js';
export type * from './db-types.js';

type StorageConfig = Pick<
  Config,
  | 'DB_DIALECT'
  | 'SQLITE_PATH'
  | 'DATABASE_URL'
  | 'POSTGRES_HOST'
  | 'POSTGRES_PORT'
  | 'POSTGRES_DB'
  | 'POSTGRES_USER'
  | 'POSTGRES_PASSWORD'
  | 'POSTGRES_SSL'
  | 'POSTGRES_SSL_REJECT_UNAUTHORIZED'
>;

export function resolveSqlitePath(path: string): string {
  if (path === IN_MEMORY || isAbsolute(path)) return path;
  return resolve(PROJECT_ROOT, path);
}

export async function openDb(config: StorageConfig): Promise<DbBackend> {
  if (config.DB_DIALECT === 'postgres') {
    logger.info('Opening postgres backend');
    return createPostgresBackend({
      connectionString: resolvePostgresConnectionString(config),
      ssl: config.POSTGRES_SSL,
      sslRejectUnauthorized: config.POSTGRES_SSL_REJECT_UNAUTHORIZED,
    });
  }

  return createSqliteBackend(resolveSqlitePath(config.SQLITE_PATH));
}
