import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { Pool, type PoolClient, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';

import { NotFoundError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import { PROJECT_ROOT } from './config.js';
import { DEFAULT_USER_SETTINGS, type DbBackend } from './db-backend.js';
import {
  mapActivity,
  mapNotification,
  mapQuestion,
  mapUser,
  questionUpdateColumns,
  storeCall,
  toNumber,
  userUpdateColumns,
  type ActivityRow,
  type ColumnAssignment,
  type CountRow,
  type NotificationRow,
  type QuestionRow,
  type UserRow,
} from './db-rows.js';
import type { NewQuestion, QuestionRecord } from './db-types.js';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const REQUIRED_CORE_TABLES = [
  'users',
  'user_questions',
  'question_notifications',
  'tg_jobs',
] as const;

export interface PostgresBackendOptions {
  connectionString: string;
  ssl?: boolean;
  sslRejectUnauthorized?: boolean;
}

type RunQuery = <R extends QueryResultRow>(text: string, values?: unknown[]) => Promise<QueryResult<R>>;

function queryOn(db: Pool | PoolClient): RunQuery {
  return <R extends QueryResultRow>(text: string, values?: unknown[]) =>
    db instanceof Pool ? db.query<R>(text, values) : db.query<R>(text, values);
}

function resolveSchemaPath(): string | undefined {
  const candidates = [
    resolve(PROJECT_ROOT, 'src', 'utils', 'postgres-schema.sql'),
    resolve(PROJECT_ROOT, 'dist', 'src', 'utils', 'postgres-schema.sql'),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return undefined;
}

async function validateCoreTables(pool: Pool): Promise<void> {
  const res = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = current_schema() AND table_name = ANY($1::text[])`,
    [Array.from(REQUIRED_CORE_TABLES)],
  );

  const available = new Set(res.rows.map((row) => row.table_name));
  const missing = REQUIRED_CORE_TABLES.filter((table) => !available.has(table));
  if (missing.length > 0) {
    throw new Error(
      `Postgres schema is incomplete; missing tables: ${missing.join(', ')}. `
      + 'Apply src/utils/postgres-schema.sql to the target database.',
    );
  }
}

/** `a = $1, b = $2` plus the values, numbering from `firstIndex`. */
function buildAssignments(columns: ColumnAssignment[], firstIndex: number): { sql: string; values: Array<string | number | boolean> } {
  return {
    sql: columns.map(([column], i) => `${column} = $${firstIndex + i}`).join(', '),
    values: columns.map(([, value]) => value),
  };
}

export async function createPostgresBackend(options: PostgresBackendOptions): Promise<DbBackend> {
  const poolConfig: PoolConfig = { connectionString: options.connectionString };
  if (options.ssl) {
    poolConfig.ssl = {
      rejectUnauthorized: options.sslRejectUnauthorized ?? true,
    };
  }

  const pool = new Pool(poolConfig);
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle postgres client error');
  });

  const schemaPath = resolveSchemaPath();
  if (schemaPath) {
    const schemaSql = readFileSync(schemaPath, 'utf-8');
    await pool.query(schemaSql);
  } else {
    logger.warn('postgres-schema.sql not found in runtime filesystem; relying on existing DB tables');
  }

  await validateCoreTables(pool);
  logger.info('Postgres backend ready');

  const poolQuery = queryOn(pool);

  const selectUser = async (tgId: number): Promise<UserRow | undefined> => {
    const res = await poolQuery<UserRow>('SELECT * FROM users WHERE tg_id = $1', [tgId]);
    return res.rows[0];
  };

  const selectQuestion = async (id: number): Promise<QuestionRow | undefined> => {
    const res = await poolQuery<QuestionRow>('SELECT * FROM user_questions WHERE id = $1', [id]);
    return res.rows[0];
  };

  const insertQuestion = async (
    query: RunQuery,
    question: NewQuestion,
    lastSent: number | null,
    now: number,
  ): Promise<QuestionRecord> => {
    const res = await query<QuestionRow>(
      `INSERT INTO user_questions
       (user_id, question_name, question_text, window_start, window_end, interval_minutes,
        is_default, parent_question_id, last_notification_sent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        question.userId,
        question.name,
        question.text,
        question.windowStart,
        question.windowEnd,
        question.intervalMinutes,
        question.isDefault,
        question.parentQuestionId ?? null,
        lastSent,
        now,
      ],
    );
    const row = res.rows[0];
    if (!row) throw new NotFoundError('Inserted question not returned');
    return mapQuestion(row);
  };

  const count = async (sql: string, values: unknown[] = []): Promise<number> => {
    const res = await pool.query<CountRow>(sql, values);
    return toNumber(res.rows[0]?.count);
  };

  return {
    dialect: 'postgres',

    upsertUser: (user, now) => storeCall('upsertUser', async () => {
      const res = await pool.query<UserRow>(
        `INSERT INTO users (tg_id, username, first_name, enabled, window_start, window_end, interval_min, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (tg_id) DO UPDATE SET
           username = COALESCE(EXCLUDED.username, users.username),
           first_name = COALESCE(EXCLUDED.first_name, users.first_name)
         RETURNING *`,
        [
          user.tgId,
          user.username ?? null,
          user.firstName ?? null,
          DEFAULT_USER_SETTINGS.enabled,
          DEFAULT_USER_SETTINGS.windowStart,
          DEFAULT_USER_SETTINGS.windowEnd,
          DEFAULT_USER_SETTINGS.intervalMinutes,
          now,
        ],
      );
      const row = res.rows[0];
      if (!row) throw new NotFoundError(`User ${user.tgId} not returned`);
      return mapUser(row);
    }),

    getUser: (tgId) => storeCall('getUser', async () => {
      const row = await selectUser(tgId);
      return row ? mapUser(row) : undefined;
    }),

    updateUserSettings: (tgId, update) => storeCall('updateUserSettings', async () => {
      const columns = userUpdateColumns(update);
      if (columns.length === 0) {
        const row = await selectUser(tgId);
        return row ? mapUser(row) : undefined;
      }
      const { sql, values } = buildAssignments(columns, 1);
      const res = await pool.query<UserRow>(
        `UPDATE users SET ${sql} WHERE tg_id = $${values.length + 1} RETURNING *`,
        [...values, tgId],
      );
      const row = res.rows[0];
      return row ? mapUser(row) : undefined;
    }),

    setUserLastNotification: (tgId, sentAt) => storeCall('setUserLastNotification', async () => {
      await pool.query('UPDATE users SET last_notification_sent = $1 WHERE tg_id = $2', [sentAt, tgId]);
    }),

    listEnabledUsers: (afterTgId, limit) => storeCall('listEnabledUsers', async () => {
      const res = await pool.query<UserRow>(
        `SELECT * FROM users
         WHERE enabled AND ($1::bigint IS NULL OR tg_id > $1::bigint)
         ORDER BY tg_id ASC
         LIMIT $2`,
        [afterTgId, limit],
      );
      return res.rows.map(mapUser);
    }),

    countEnabledUsers: () => storeCall('countEnabledUsers', () =>
      count('SELECT COUNT(*) AS count FROM users WHERE enabled')),

    getUserStats: (now) => storeCall('getUserStats', async () => ({
      total: await count('SELECT COUNT(*) AS count FROM users'),
      enabled: await count('SELECT COUNT(*) AS count FROM users WHERE enabled'),
      newThisWeek: await count('SELECT COUNT(*) AS count FROM users WHERE created_at >= $1', [now - WEEK_MS]),
      activities: await count('SELECT COUNT(*) AS count FROM tg_jobs'),
    })),

    getActiveQuestions: (userId) => storeCall('getActiveQuestions', async () => {
      const res = await pool.query<QuestionRow>(
        `SELECT * FROM user_questions
         WHERE user_id = $1 AND active
         ORDER BY is_default DESC, created_at ASC, id ASC`,
        [userId],
      );
      return res.rows.map(mapQuestion);
    }),

    getQuestion: (id) => storeCall('getQuestion', async () => {
      const row = await selectQuestion(id);
      return row ? mapQuestion(row) : undefined;
    }),

    getActiveDefaultQuestion: (userId) => storeCall('getActiveDefaultQuestion', async () => {
      const res = await pool.query<QuestionRow>(
        'SELECT * FROM user_questions WHERE user_id = $1 AND is_default AND active',
        [userId],
      );
      const row = res.rows[0];
      return row ? mapQuestion(row) : undefined;
    }),

    createQuestion: (question, now) => storeCall('createQuestion', () => insertQuestion(poolQuery, question, null, now)),

    hasSuccessor: (id) => storeCall('hasSuccessor', async () =>
      (await count('SELECT COUNT(*) AS count FROM user_questions WHERE parent_question_id = $1', [id])) > 0),

    updateQuestion: (id, update) => storeCall('updateQuestion', async () => {
      const columns = questionUpdateColumns(update);
      if (columns.length === 0) {
        const row = await selectQuestion(id);
        return row ? mapQuestion(row) : undefined;
      }
      const { sql, values } = buildAssignments(columns, 1);
      const res = await pool.query<QuestionRow>(
        `UPDATE user_questions SET ${sql} WHERE id = $${values.length + 1} RETURNING *`,
        [...values, id],
      );
      const row = res.rows[0];
      return row ? mapQuestion(row) : undefined;
    }),

    createQuestionVersion: (id, text, now) => storeCall('createQuestionVersion', async () => {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');

        const res = await client.query<QuestionRow>(
          'SELECT * FROM user_questions WHERE id = $1 FOR UPDATE',
          [id],
        );
        const row = res.rows[0];
        if (!row) throw new NotFoundError(`Question ${id} not found`);
        const current = mapQuestion(row);
        if (!current.active) throw new NotFoundError(`Question ${id} is not active`);

        await client.query('UPDATE user_questions SET active = FALSE WHERE id = $1', [id]);
        const next = await insertQuestion(
          queryOn(client),
          {
            userId: current.userId,
            name: current.name,
            text,
            windowStart: current.windowStart,
            windowEnd: current.windowEnd,
            intervalMinutes: current.intervalMinutes,
            isDefault: current.isDefault,
            parentQuestionId: current.id,
          },
          current.lastNotificationSent,
          now,
        );

        await client.query('COMMIT');
        return next;
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          logger.warn({ err: rollbackErr, questionId: id }, 'Rollback after failed question version failed');
        });
        throw err;
      } finally {
        client.release();
      }
    }),

    markQuestionSent: (id, sentAt, expectedPrevious) => storeCall('markQuestionSent', async () => {
      const res = await pool.query(
        `UPDATE user_questions SET last_notification_sent = $1
         WHERE id = $2 AND active AND last_notification_sent IS NOT DISTINCT FROM $3::bigint`,
        [sentAt, id, expectedPrevious],
      );
      return res.rowCount === 1;
    }),

    insertNotification: (notification) => storeCall('insertNotification', async () => {
      const res = await pool.query<NotificationRow>(
        `INSERT INTO question_notifications (user_id, question_id, outbound_message_id, sent_at, expires_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [
          notification.userId,
          notification.questionId,
          notification.outboundMessageId,
          notification.sentAt,
          notification.expiresAt,
        ],
      );
      const row = res.rows[0];
      if (!row) throw new NotFoundError('Inserted notification record not returned');
      return mapNotification(row);
    }),

    findActiveNotification: (userId, outboundMessageId, now) => storeCall('findActiveNotification', async () => {
      const res = await pool.query<NotificationRow>(
        `SELECT * FROM question_notifications
         WHERE user_id = $1 AND outbound_message_id = $2 AND expires_at > $3
         ORDER BY sent_at DESC, id DESC
         LIMIT 1`,
        [userId, outboundMessageId, now],
      );
      const row = res.rows[0];
      return row ? mapNotification(row) : undefined;
    }),

    deleteExpiredNotifications: (now) => storeCall('deleteExpiredNotifications', async () => {
      const res = await pool.query('DELETE FROM question_notifications WHERE expires_at < $1', [now]);
      return res.rowCount ?? 0;
    }),

    logActivity: (activity) => storeCall('logActivity', async () => {
      const res = await pool.query<ActivityRow>(
        `INSERT INTO tg_jobs (tg_id, job_text, jobs_timestamp, question_id)
         VALUES ($1, $2, $3, $4)
         RETURNING *`,
        [activity.userId, activity.text, activity.timestamp, activity.questionId],
      );
      const row = res.rows[0];
      if (!row) throw new NotFoundError('Inserted activity not returned');
      return mapActivity(row);
    }),

    getRecentActivities: (userId, limit) => storeCall('getRecentActivities', async () => {
      const res = await pool.query<ActivityRow>(
        'SELECT * FROM tg_jobs WHERE tg_id = $1 ORDER BY jobs_timestamp DESC, id DESC LIMIT $2',
        [userId, limit],
      );
      return res.rows.map(mapActivity);
    }),

    countActivities: (userId) => storeCall('countActivities', () =>
      count('SELECT COUNT(*) AS count FROM tg_jobs WHERE tg_id = $1', [userId])),

    close: async () => {
      await pool.end();
      logger.info('Postgres pool closed');
    },
  };
}
