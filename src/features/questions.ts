/**
 * Question management: per-user prompts with their own window and interval.
 *
 * Every user has exactly one active default question (created on demand from
 * their user-level settings) plus up to four custom ones. Editing a
 * question's text never mutates the row: the old version is deactivated and
 * a new row linked through parentQuestionId takes its place.
 */

import { NotFoundError, ValidationError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { QuestionRecord, UserRecord } from '../utils/db-types.js';
import { formatTimeOfDay, minuteOfDay, validateWindow, type TimeWindow } from '../utils/time-window.js';
import type { TtlCache } from '../utils/ttl-cache.js';

export const MAX_ACTIVE_QUESTIONS = 5;
export const MAX_QUESTION_TEXT_LENGTH = 500;
export const MAX_QUESTION_NAME_LENGTH = 100;
export const MIN_INTERVAL_MINUTES = 30;
export const MAX_INTERVAL_MINUTES = 1440;

export const DEFAULT_QUESTION_NAME = 'Main';
export const DEFAULT_QUESTION_TEXT = '⏰ Check-in time! What are you doing right now?';

const NAME_FALLBACK = 'friend';

// ── Validation ──────────────────────────────────────────────────────

export function validateQuestionName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_QUESTION_NAME_LENGTH) {
    throw new ValidationError(`Question name must be 1-${MAX_QUESTION_NAME_LENGTH} characters`, 'name');
  }
  return trimmed;
}

export function validateQuestionText(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_QUESTION_TEXT_LENGTH) {
    throw new ValidationError(`Question text must be 1-${MAX_QUESTION_TEXT_LENGTH} characters`, 'text');
  }
  return trimmed;
}

export function validateInterval(minutes: number): number {
  if (!Number.isInteger(minutes) || minutes < MIN_INTERVAL_MINUTES || minutes > MAX_INTERVAL_MINUTES) {
    throw new ValidationError(
      `Interval must be a whole number of minutes between ${MIN_INTERVAL_MINUTES} and ${MAX_INTERVAL_MINUTES}`,
      'interval',
    );
  }
  return minutes;
}

/** Substitute `{name}` and `{time}` in question text at send time. */
export function formatQuestionText(text: string, context: { firstName: string | null; now: Date }): string {
  const name = context.firstName?.trim() || NAME_FALLBACK;
  const time = formatTimeOfDay(Math.floor(minuteOfDay(context.now)));
  return text.replaceAll('{name}', () => name).replaceAll('{time}', () => time);
}

// ── Service ─────────────────────────────────────────────────────────

export interface NewQuestionInput {
  name: string;
  text: string;
  window: TimeWindow;
  intervalMinutes: number;
}

export interface QuestionSettingsInput {
  name?: string;
  window?: TimeWindow;
  intervalMinutes?: number;
}

export interface QuestionService {
  /** Active questions (default first). Cached; every write below invalidates. */
  listActive(userId: number): Promise<QuestionRecord[]>;
  /** A question owned by `userId`, active or not. */
  get(userId: number, questionId: number): Promise<QuestionRecord>;
  /** Return the active default question, creating it from the user's settings when missing. */
  ensureDefault(user: UserRecord, now: number): Promise<QuestionRecord>;
  create(userId: number, input: NewQuestionInput, now: number): Promise<QuestionRecord>;
  editText(userId: number, questionId: number, text: string, now: number): Promise<QuestionRecord>;
  updateSettings(userId: number, questionId: number, input: QuestionSettingsInput): Promise<QuestionRecord>;
  /** Flip active. Returns the updated question. */
  toggle(userId: number, questionId: number): Promise<QuestionRecord>;
  /** Deactivate; rows are kept for history. */
  remove(userId: number, questionId: number): Promise<QuestionRecord>;
  invalidate(userId: number): void;
}

export function questionCacheKey(userId: number): string {
  return `questions:${userId}`;
}

export function createQuestionService(
  store: DbBackend,
  cache: TtlCache<QuestionRecord[]>,
): QuestionService {
  const invalidate = (userId: number): void => {
    cache.invalidate(questionCacheKey(userId));
  };

  const get = async (userId: number, questionId: number): Promise<QuestionRecord> => {
    const question = await store.getQuestion(questionId);
    if (!question || question.userId !== userId) {
      throw new NotFoundError(`Question ${questionId} not found`);
    }
    return question;
  };

  const getActive = async (userId: number, questionId: number): Promise<QuestionRecord> => {
    const question = await get(userId, questionId);
    if (!question.active) throw new NotFoundError(`Question ${questionId} is not active`);
    return question;
  };

  const assertNameFree = (active: QuestionRecord[], name: string, exceptId: number | null): void => {
    if (active.some((q) => q.name === name && q.id !== exceptId)) {
      throw new ValidationError(`You already have an active question named "${name}"`, 'name');
    }
  };

  const assertBelowLimit = (active: QuestionRecord[]): void => {
    if (active.length >= MAX_ACTIVE_QUESTIONS) {
      throw new ValidationError(`You can have at most ${MAX_ACTIVE_QUESTIONS} active questions`, 'questions');
    }
  };

  const deactivate = async (userId: number, questionId: number): Promise<QuestionRecord> => {
    const question = await getActive(userId, questionId);
    if (question.isDefault) {
      throw new ValidationError('The default question cannot be deactivated', 'question');
    }
    const updated = await store.updateQuestion(questionId, { active: false });
    invalidate(userId);
    if (!updated) throw new NotFoundError(`Question ${questionId} not found`);
    logger.info({ userId, questionId }, 'Question deactivated');
    return updated;
  };

  return {
    listActive: (userId) =>
      cache.getOrLoad(questionCacheKey(userId), () => store.getActiveQuestions(userId)),

    get,

    async ensureDefault(user, now) {
      const existing = await store.getActiveDefaultQuestion(user.tgId);
      if (existing) return existing;

      const created = await store.createQuestion(
        {
          userId: user.tgId,
          name: DEFAULT_QUESTION_NAME,
          text: DEFAULT_QUESTION_TEXT,
          windowStart: user.windowStart,
          windowEnd: user.windowEnd,
          intervalMinutes: user.intervalMinutes,
          isDefault: true,
        },
        now,
      );
      invalidate(user.tgId);
      logger.info({ userId: user.tgId, questionId: created.id }, 'Created default question');
      return created;
    },

    async create(userId, input, now) {
      const name = validateQuestionName(input.name);
      const text = validateQuestionText(input.text);
      const window = validateWindow(input.window);
      const intervalMinutes = validateInterval(input.intervalMinutes);

      const active = await store.getActiveQuestions(userId);
      assertBelowLimit(active);
      assertNameFree(active, name, null);

      const created = await store.createQuestion(
        {
          userId,
          name,
          text,
          windowStart: window.start,
          windowEnd: window.end,
          intervalMinutes,
          isDefault: false,
        },
        now,
      );
      invalidate(userId);
      logger.info({ userId, questionId: created.id }, 'Question created');
      return created;
    },

    async editText(userId, questionId, text, now) {
      const validated = validateQuestionText(text);
      await getActive(userId, questionId);
      const next = await store.createQuestionVersion(questionId, validated, now);
      invalidate(userId);
      logger.info({ userId, previousId: questionId, questionId: next.id }, 'Question text versioned');
      return next;
    },

    async updateSettings(userId, questionId, input) {
      const current = await getActive(userId, questionId);
      const name = input.name === undefined ? undefined : validateQuestionName(input.name);
      const window = input.window === undefined ? undefined : validateWindow(input.window);
      const intervalMinutes = input.intervalMinutes === undefined ? undefined : validateInterval(input.intervalMinutes);

      if (name !== undefined && name !== current.name) {
        assertNameFree(await store.getActiveQuestions(userId), name, questionId);
      }

      const updated = await store.updateQuestion(questionId, {
        name,
        windowStart: window?.start,
        windowEnd: window?.end,
        intervalMinutes,
      });
      invalidate(userId);
      if (!updated) throw new NotFoundError(`Question ${questionId} not found`);
      return updated;
    },

    async toggle(userId, questionId) {
      const question = await get(userId, questionId);
      if (question.active) return deactivate(userId, questionId);
      if (await store.hasSuccessor(questionId)) {
        throw new ValidationError(`Question ${questionId} was replaced by a newer version`, 'question');
      }

      const active = await store.getActiveQuestions(userId);
      assertBelowLimit(active);
      assertNameFree(active, question.name, questionId);
      if (question.isDefault && active.some((q) => q.isDefault)) {
        throw new ValidationError('You already have an active default question', 'question');
      }

      const updated = await store.updateQuestion(questionId, { active: true });
      invalidate(userId);
      if (!updated) throw new NotFoundError(`Question ${questionId} not found`);
      logger.info({ userId, questionId }, 'Question reactivated');
      return updated;
    },

    remove: deactivate,

    invalidate,
  };
}
