/**
 * SQLite database initialization and schema.
 *
 * Owns the CREATE TABLE statements for the sqlite backend. The postgres
 * equivalent lives in postgres-schema.sql and must stay in step with it.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type SqliteDatabase = InstanceType<typeof Database>;

export const IN_MEMORY = ':memory:';

export function openSqliteDatabase(path: string): SqliteDatabase {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteDatabase = new Database(path, { timeout: 5000 });

  // Performance pragmas
  // NOTE: busy_timeout should be set before attempting journal_mode switches.
  db.pragma('busy_timeout = 5000');
  if (path !== IN_MEMORY) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  applySqliteSchema(db);
  logger.info({ path }, 'SQLite database opened');
  return db;
}

export function applySqliteSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      tg_id INTEGER PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      enabled INTEGER NOT NULL DEFAULT 1,
      window_start TEXT NOT NULL DEFAULT '09:00',
      window_end TEXT NOT NULL DEFAULT '22:00',
      interval_min INTEGER NOT NULL DEFAULT 120 CHECK (interval_min >= 30),
      last_notification_sent INTEGER,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_users_enabled
      ON users (enabled, tg_id);

    CREATE TABLE IF NOT EXISTS user_questions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users (tg_id) ON DELETE CASCADE,
      question_name TEXT NOT NULL,
      question_text TEXT NOT NULL,
      window_start TEXT NOT NULL,
      window_end TEXT NOT NULL,
      interval_minutes INTEGER NOT NULL CHECK (interval_minutes >= 30),
      is_default INTEGER NOT NULL DEFAULT 0,
      active INTEGER NOT NULL DEFAULT 1,
      parent_question_id INTEGER REFERENCES user_questions (id),
      last_notification_sent INTEGER,
      created_at INTEGER NOT NULL,
      CHECK (window_start <> window_end)
    );

    CREATE UNIQUE INDEX IF NOT EXISTS uq_user_questions_active_default
      ON user_questions (user_id) WHERE is_default = 1 AND active = 1;

    CREATE UNIQUE INDEX IF NOT EXISTS uq_user_questions_active_name
      ON user_questions (user_id, question_name) WHERE active = 1;

    CREATE INDEX IF NOT EXISTS idx_user_questions_user_active
      ON user_questions (user_id, active);

    CREATE TABLE IF NOT EXISTS question_notifications (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      question_id INTEGER NOT NULL REFERENCES user_questions (id),
      outbound_message_id TEXT NOT NULL,
      sent_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL,
      CHECK (expires_at > sent_at)
    );

    CREATE INDEX IF NOT EXISTS idx_question_notifications_lookup
      ON question_notifications (user_id, outbound_message_id, sent_at DESC);

    CREATE INDEX IF NOT EXISTS idx_question_notifications_expires
      ON question_notifications (expires_at);

    CREATE TABLE IF NOT EXISTS tg_jobs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      tg_id INTEGER NOT NULL,
      job_text TEXT NOT NULL,
      jobs_timestamp INTEGER NOT NULL,
      question_id INTEGER REFERENCES user_questions (id)
    );

    CREATE INDEX IF NOT EXISTS idx_tg_jobs_user_ts
      ON tg_jobs (tg_id, jobs_timestamp DESC);
  `);
}
