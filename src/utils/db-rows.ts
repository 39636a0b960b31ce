/**
 * Row shapes and row → record mapping shared by the sqlite and postgres
 * backends. SQLite hands back integers and 0/1 flags; pg returns BIGINT
 * columns as strings and BOOLEAN as booleans.
 */

import { BotError, StoreError, ValidationError } from '../core/errors.js';
import type {
  ActivityEntry,
  NotificationRecord,
  QuestionRecord,
  QuestionSettingsUpdate,
  UserRecord,
  UserSettingsUpdate,
} from './db-types.js';

type BigintLike = string | number;
type FlagLike = boolean | number;

export type UserRow = {
  tg_id: BigintLike;
  username: string | null;
  first_name: string | null;
  enabled: FlagLike;
  window_start: string;
  window_end: string;
  interval_min: BigintLike;
  last_notification_sent: BigintLike | null;
  created_at: BigintLike;
};

export type QuestionRow = {
  id: BigintLike;
  user_id: BigintLike;
  question_name: string;
  question_text: string;
  window_start: string;
  window_end: string;
  interval_minutes: BigintLike;
  is_default: FlagLike;
  active: FlagLike;
  parent_question_id: BigintLike | null;
  last_notification_sent: BigintLike | null;
  created_at: BigintLike;
};

export type NotificationRow = {
  id: BigintLike;
  user_id: BigintLike;
  question_id: BigintLike;
  outbound_message_id: string;
  sent_at: BigintLike;
  expires_at: BigintLike;
};

export type ActivityRow = {
  id: BigintLike;
  tg_id: BigintLike;
  question_id: BigintLike | null;
  job_text: string;
  jobs_timestamp: BigintLike;
};

export type CountRow = {
  count: BigintLike;
};

export function toNumber(value: BigintLike | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toNullableNumber(value: BigintLike | null): number | null {
  return value === null ? null : toNumber(value);
}

function toBool(value: FlagLike): boolean {
  return value === true || value === 1;
}

export function mapUser(row: UserRow): UserRecord {
  return {
    tgId: toNumber(row.tg_id),
    username: row.username,
    firstName: row.first_name,
    enabled: toBool(row.enabled),
    windowStart: row.window_start,
    windowEnd: row.window_end,
    intervalMinutes: toNumber(row.interval_min),
    lastNotificationSent: toNullableNumber(row.last_notification_sent),
    createdAt: toNumber(row.created_at),
  };
}

export function mapQuestion(row: QuestionRow): QuestionRecord {
  return {
    id: toNumber(row.id),
    userId: toNumber(row.user_id),
    name: row.question_name,
    text: row.question_text,
    windowStart: row.window_start,
    windowEnd: row.window_end,
    intervalMinutes: toNumber(row.interval_minutes),
    isDefault: toBool(row.is_default),
    active: toBool(row.active),
    parentQuestionId: toNullableNumber(row.parent_question_id),
    lastNotificationSent: toNullableNumber(row.last_notification_sent),
    createdAt: toNumber(row.created_at),
  };
}

export function mapNotification(row: NotificationRow): NotificationRecord {
  return {
    id: toNumber(row.id),
    userId: toNumber(row.user_id),
    questionId: toNumber(row.question_id),
    outboundMessageId: row.outbound_message_id,
    sentAt: toNumber(row.sent_at),
    expiresAt: toNumber(row.expires_at),
  };
}

export function mapActivity(row: ActivityRow): ActivityEntry {
  return {
    id: toNumber(row.id),
    userId: toNumber(row.tg_id),
    questionId: toNullableNumber(row.question_id),
    text: row.job_text,
    timestamp: toNumber(row.jobs_timestamp),
  };
}

/** [column, value] pairs for the fields present in a partial update. */
export type ColumnAssignment = [column: string, value: string | number | boolean];

export function userUpdateColumns(update: UserSettingsUpdate): ColumnAssignment[] {
  const columns: ColumnAssignment[] = [];
  if (update.enabled !== undefined) columns.push(['enabled', update.enabled]);
  if (update.windowStart !== undefined) columns.push(['window_start', update.windowStart]);
  if (update.windowEnd !== undefined) columns.push(['window_end', update.windowEnd]);
  if (update.intervalMinutes !== undefined) columns.push(['interval_min', update.intervalMinutes]);
  return columns;
}

export function questionUpdateColumns(update: QuestionSettingsUpdate): ColumnAssignment[] {
  const columns: ColumnAssignment[] = [];
  if (update.name !== undefined) columns.push(['question_name', update.name]);
  if (update.windowStart !== undefined) columns.push(['window_start', update.windowStart]);
  if (update.windowEnd !== undefined) columns.push(['window_end', update.windowEnd]);
  if (update.intervalMinutes !== undefined) columns.push(['interval_minutes', update.intervalMinutes]);
  if (update.active !== undefined) columns.push(['active', update.active]);
  return columns;
}

// SQLITE_CONSTRAINT_UNIQUE / _CHECK from better-sqlite3, 23505 / 23514 from pg
const CONSTRAINT_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_CHECK', '23505', '23514']);

function isConstraintViolation(err: unknown): boolean {
  return typeof err === 'object'
    && err !== null
    && 'code' in err
    && typeof err.code === 'string'
    && CONSTRAINT_CODES.has(err.code);
}

/**
 * Run one store operation. Typed bot errors pass through, constraint
 * violations become ValidationError, anything else is wrapped in StoreError.
 */
export async function storeCall<T>(operation: string, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof BotError) throw err;
    if (isConstraintViolation(err)) {
      throw new ValidationError('That conflicts with one of your active questions', operation);
    }
    throw new StoreError(operation, err);
  }
}
