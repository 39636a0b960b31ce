/**
 * SQLite backend: better-sqlite3 behind the async DbBackend contract.
 *
 * better-sqlite3 is synchronous, so each method is a single critical section
 * on the event loop; multi-statement writes use db.transaction().
 */

import { NotFoundError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import { openSqliteDatabase, type SqliteDatabase } from './db-schema.js';
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
import type { NewQuestion, QuestionRecord, UserRecord } from './db-types.js';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

type SqliteValue = string | number | null;

function toSqliteValue(value: ColumnAssignment[1]): SqliteValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

export function createSqliteBackend(path: string): DbBackend {
  return createSqliteBackendFromHandle(openSqliteDatabase(path));
}

export function createSqliteBackendFromHandle(db: SqliteDatabase): DbBackend {
  // ── Prepared statements ─────────────────────────────────────────────

  const upsertUserStmt = db.prepare<[number, string | null, string | null, number, string, string, number, number]>(
    `INSERT INTO users (tg_id, username, first_name, enabled, window_start, window_end, interval_min, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (tg_id) DO UPDATE SET
       username = COALESCE(excluded.username, users.username),
       first_name = COALESCE(excluded.first_name, users.first_name)`,
  );
  const selectUser = db.prepare<[number], UserRow>(`SELECT * FROM users WHERE tg_id = ?`);
  const updateUserLastSent = db.prepare<[number, number]>(
    `UPDATE users SET last_notification_sent = ? WHERE tg_id = ?`,
  );
  const selectEnabledUsersPage = db.prepare<[number, number], UserRow>(
    `SELECT * FROM users WHERE enabled = 1 AND tg_id > ? ORDER BY tg_id ASC LIMIT ?`,
  );
  const countEnabledUsersStmt = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM users WHERE enabled = 1`);
  const countUsers = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM users`);
  const countUsersSince = db.prepare<[number], CountRow>(`SELECT COUNT(*) AS count FROM users WHERE created_at >= ?`);
  const countAllActivities = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM tg_jobs`);

  const selectActiveQuestions = db.prepare<[number], QuestionRow>(
    `SELECT * FROM user_questions
     WHERE user_id = ? AND active = 1
     ORDER BY is_default DESC, created_at ASC, id ASC`,
  );
  const selectQuestion = db.prepare<[number], QuestionRow>(`SELECT * FROM user_questions WHERE id = ?`);
  const selectActiveDefault = db.prepare<[number], QuestionRow>(
    `SELECT * FROM user_questions WHERE user_id = ? AND is_default = 1 AND active = 1`,
  );
  const insertQuestionStmt = db.prepare<
    [number, string, string, string, string, number, number, number | null, number | null, number]
  >(
    `INSERT INTO user_questions
     (user_id, question_name, question_text, window_start, window_end, interval_minutes,
      is_default, parent_question_id, last_notification_sent, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const deactivateQuestion = db.prepare<[number]>(`UPDATE user_questions SET active = 0 WHERE id = ?`);
  const markQuestionSentStmt = db.prepare<[number | null, number, number | null]>(
    `UPDATE user_questions SET last_notification_sent = ?
     WHERE id = ? AND active = 1 AND last_notification_sent IS ?`,
  );

  const insertNotificationStmt = db.prepare<[number, number, string, number, number]>(
    `INSERT INTO question_notifications (user_id, question_id, outbound_message_id, sent_at, expires_at)
     VALUES (?, ?, ?, ?, ?)`,
  );
  const selectNotification = db.prepare<[number], NotificationRow>(`SELECT * FROM question_notifications WHERE id = ?`);
  const selectActiveNotification = db.prepare<[number, string, number], NotificationRow>(
    `SELECT * FROM question_notifications
     WHERE user_id = ? AND outbound_message_id = ? AND expires_at > ?
     ORDER BY sent_at DESC, id DESC
     LIMIT 1`,
  );
  const deleteExpiredNotificationsStmt = db.prepare<[number]>(
    `DELETE FROM question_notifications WHERE expires_at < ?`,
  );

  const insertActivity = db.prepare<[number, string, number, number | null]>(
    `INSERT INTO tg_jobs (tg_id, job_text, jobs_timestamp, question_id) VALUES (?, ?, ?, ?)`,
  );
  const selectActivity = db.prepare<[number], ActivityRow>(`SELECT * FROM tg_jobs WHERE id = ?`);
  const selectRecentActivities = db.prepare<[number, number], ActivityRow>(
    `SELECT * FROM tg_jobs WHERE tg_id = ? ORDER BY jobs_timestamp DESC, id DESC LIMIT ?`,
  );
  const countSuccessors = db.prepare<[number], CountRow>(
    `SELECT COUNT(*) AS count FROM user_questions WHERE parent_question_id = ?`,
  );
  const countUserActivities = db.prepare<[number], CountRow>(`SELECT COUNT(*) AS count FROM tg_jobs WHERE tg_id = ?`);

  // ── Helpers ─────────────────────────────────────────────────────────

  const requireUser = (tgId: number): UserRecord => {
    const row = selectUser.get(tgId);
    if (!row) throw new NotFoundError(`User ${tgId} not found`);
    return mapUser(row);
  };

  const requireQuestion = (id: number): QuestionRecord => {
    const row = selectQuestion.get(id);
    if (!row) throw new NotFoundError(`Question ${id} not found`);
    return mapQuestion(row);
  };

  const insertQuestion = (question: NewQuestion, lastSent: number | null, now: number): QuestionRecord => {
    const result = insertQuestionStmt.run(
      question.userId,
      question.name,
      question.text,
      question.windowStart,
      question.windowEnd,
      question.intervalMinutes,
      question.isDefault ? 1 : 0,
      question.parentQuestionId ?? null,
      lastSent,
      now,
    );
    return requireQuestion(Number(result.lastInsertRowid));
  };

  const applyUpdate = (table: string, keyColumn: string, key: number, columns: ColumnAssignment[]): void => {
    if (columns.length === 0) return;
    const assignments = columns.map(([column]) => `${column} = ?`).join(', ');
    const values = columns.map(([, value]) => toSqliteValue(value));
    db.prepare(`UPDATE ${table} SET ${assignments} WHERE ${keyColumn} = ?`).run(...values, key);
  };

  const createVersion = db.transaction((id: number, text: string, now: number): QuestionRecord => {
    const current = requireQuestion(id);
    if (!current.active) throw new NotFoundError(`Question ${id} is not active`);

    deactivateQuestion.run(id);
    return insertQuestion(
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
  });

  // ── Backend ─────────────────────────────────────────────────────────

  return {
    dialect: 'sqlite',

    upsertUser: (user, now) => storeCall('upsertUser', () => {
      upsertUserStmt.run(
        user.tgId,
        user.username ?? null,
        user.firstName ?? null,
        DEFAULT_USER_SETTINGS.enabled ? 1 : 0,
        DEFAULT_USER_SETTINGS.windowStart,
        DEFAULT_USER_SETTINGS.windowEnd,
        DEFAULT_USER_SETTINGS.intervalMinutes,
        now,
      );
      return requireUser(user.tgId);
    }),

    getUser: (tgId) => storeCall('getUser', () => {
      const row = selectUser.get(tgId);
      return row ? mapUser(row) : undefined;
    }),

    updateUserSettings: (tgId, update) => storeCall('updateUserSettings', () => {
      applyUpdate('users', 'tg_id', tgId, userUpdateColumns(update));
      const row = selectUser.get(tgId);
      return row ? mapUser(row) : undefined;
    }),

    setUserLastNotification: (tgId, sentAt) => storeCall('setUserLastNotification', () => {
      updateUserLastSent.run(sentAt, tgId);
    }),

    listEnabledUsers: (afterTgId, limit) => storeCall('listEnabledUsers', () =>
      selectEnabledUsersPage.all(afterTgId ?? Number.MIN_SAFE_INTEGER, limit).map(mapUser)),

    countEnabledUsers: () => storeCall('countEnabledUsers', () => toNumber(countEnabledUsersStmt.get()?.count)),

    getUserStats: (now) => storeCall('getUserStats', () => ({
      total: toNumber(countUsers.get()?.count),
      enabled: toNumber(countEnabledUsersStmt.get()?.count),
      newThisWeek: toNumber(countUsersSince.get(now - WEEK_MS)?.count),
      activities: toNumber(countAllActivities.get()?.count),
    })),

    getActiveQuestions: (userId) => storeCall('getActiveQuestions', () =>
      selectActiveQuestions.all(userId).map(mapQuestion)),

    getQuestion: (id) => storeCall('getQuestion', () => {
      const row = selectQuestion.get(id);
      return row ? mapQuestion(row) : undefined;
    }),

    getActiveDefaultQuestion: (userId) => storeCall('getActiveDefaultQuestion', () => {
      const row = selectActiveDefault.get(userId);
      return row ? mapQuestion(row) : undefined;
    }),

    createQuestion: (question, now) => storeCall('createQuestion', () => insertQuestion(question, null, now)),

    hasSuccessor: (id) => storeCall('hasSuccessor', () => toNumber(countSuccessors.get(id)?.count) > 0),

    updateQuestion: (id, update) => storeCall('updateQuestion', () => {
      applyUpdate('user_questions', 'id', id, questionUpdateColumns(update));
      const row = selectQuestion.get(id);
      return row ? mapQuestion(row) : undefined;
    }),

    createQuestionVersion: (id, text, now) => storeCall('createQuestionVersion', () => createVersion(id, text, now)),

    markQuestionSent: (id, sentAt, expectedPrevious) => storeCall('markQuestionSent', () =>
      markQuestionSentStmt.run(sentAt, id, expectedPrevious).changes === 1),

    insertNotification: (notification) => storeCall('insertNotification', () => {
      const result = insertNotificationStmt.run(
        notification.userId,
        notification.questionId,
        notification.outboundMessageId,
        notification.sentAt,
        notification.expiresAt,
      );
      const row = selectNotification.get(Number(result.lastInsertRowid));
      if (!row) throw new NotFoundError('Inserted notification record not readable');
      return mapNotification(row);
    }),

    findActiveNotification: (userId, outboundMessageId, now) => storeCall('findActiveNotification', () => {
      const row = selectActiveNotification.get(userId, outboundMessageId, now);
      return row ? mapNotification(row) : undefined;
    }),

    deleteExpiredNotifications: (now) => storeCall('deleteExpiredNotifications', () =>
      deleteExpiredNotificationsStmt.run(now).changes),

    logActivity: (activity) => storeCall('logActivity', () => {
      const result = insertActivity.run(activity.userId, activity.text, activity.timestamp, activity.questionId);
      const row = selectActivity.get(Number(result.lastInsertRowid));
      if (!row) throw new NotFoundError('Inserted activity not readable');
      return mapActivity(row);
    }),

    getRecentActivities: (userId, limit) => storeCall('getRecentActivities', () =>
      selectRecentActivities.all(userId, limit).map(mapActivity)),

    countActivities: (userId) => storeCall('countActivities', () => toNumber(countUserActivities.get(userId)?.count)),

    close: async () => {
      db.close();
      logger.info('SQLite database closed');
    },
  };
}
