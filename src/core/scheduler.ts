/**
 * Prompt scheduler: evaluates every (enabled user, active question) pair on
 * a fixed tick and hands due pairs to the dispatcher.
 *
 * Scheduled via setTimeout (no cron dependency). The next tick is armed only
 * after the current one finishes, so ticks never overlap; a slow tick
 * defers the next one instead of running beside it.
 *
 * Each due pair runs under a per-question lock: re-read the question, claim
 * it with a compare-and-set on lastNotificationSent, send, and release the
 * claim again if the send fails. Two evaluators that raced past the first
 * due-check can therefore never both send for the same interval.
 */

import { formatQuestionText, type QuestionService } from '../features/questions.js';
import { logger } from '../middleware/logger.js';
import { recordPromptFailed, recordPromptSent, recordTick, type TickSummary } from '../middleware/stats.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { isWithinWindow } from '../utils/time-window.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { QuestionRecord, UserRecord } from '../utils/db-types.js';
import type { Dispatcher } from './dispatcher.js';

const MINUTE_MS = 60_000;
const DEFAULT_USER_PAGE_SIZE = 500;

export type DueCheckFields = Pick<QuestionRecord, 'windowStart' | 'windowEnd' | 'intervalMinutes' | 'lastNotificationSent'>;

/** Inside the local-time window and at least one full interval since the last prompt. */
export function isDue(question: DueCheckFields, now: number): boolean {
  if (!isWithinWindow(new Date(now), { start: question.windowStart, end: question.windowEnd })) {
    return false;
  }
  if (question.lastNotificationSent === null) return true;
  return now - question.lastNotificationSent >= question.intervalMinutes * MINUTE_MS;
}

export type TickResult = TickSummary;

export interface Scheduler {
  start(): void;
  /** Stop arming ticks and wait for an in-flight tick to finish. */
  stop(): Promise<void>;
  runTick(now?: number): Promise<TickResult>;
  readonly running: boolean;
}

export interface SchedulerDeps {
  store: DbBackend;
  questions: Pick<QuestionService, 'ensureDefault'>;
  dispatcher: Dispatcher;
  tickIntervalMs: number;
  userPageSize?: number;
  now?: () => number;
}

type PairOutcome = 'sent' | 'failed' | 'skipped';

export function createScheduler(deps: SchedulerDeps): Scheduler {
  const now = deps.now ?? Date.now;
  const pageSize = deps.userPageSize ?? DEFAULT_USER_PAGE_SIZE;
  const locks = new KeyedLock<number>();

  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let tickChain: Promise<unknown> = Promise.resolve();

  const sendIfDue = async (user: UserRecord, questionId: number, at: number): Promise<PairOutcome> => {
    const question = await deps.store.getQuestion(questionId);
    if (!question || !question.active || !isDue(question, at)) return 'skipped';

    const previous = question.lastNotificationSent;
    const claimed = await deps.store.markQuestionSent(questionId, at, previous);
    if (!claimed) return 'skipped';

    const text = formatQuestionText(question.text, { firstName: user.firstName, now: new Date(at) });
    const outcome = await deps.dispatcher.send(user.tgId, text, { correlateAsQuestion: questionId, sentAt: at });

    if (!outcome.success) {
      recordPromptFailed(outcome.error.category);
      const released = await deps.store.markQuestionSent(questionId, previous, at);
      if (!released) logger.warn({ userId: user.tgId, questionId }, 'Prompt claim changed before release');
      return 'failed';
    }

    recordPromptSent();
    try {
      await deps.store.setUserLastNotification(user.tgId, at);
    } catch (err) {
      logger.warn({ err, userId: user.tgId }, 'Failed to update user last-notification time');
    }
    logger.debug({ userId: user.tgId, questionId, messageId: outcome.outboundMessageId }, 'Prompt sent');
    return 'sent';
  };

  const evaluatePair = async (user: UserRecord, question: QuestionRecord, at: number): Promise<PairOutcome> => {
    if (!isDue(question, at)) return 'skipped';
    try {
      return await locks.runExclusive(question.id, () => sendIfDue(user, question.id, at));
    } catch (err) {
      logger.error({ err, userId: user.tgId, questionId: question.id }, 'Prompt evaluation failed');
      return 'failed';
    }
  };

  const evaluateUser = async (user: UserRecord, at: number): Promise<PairOutcome[]> => {
    let questions: QuestionRecord[];
    try {
      await deps.questions.ensureDefault(user, at);
      questions = await deps.store.getActiveQuestions(user.tgId);
    } catch (err) {
      logger.error({ err, userId: user.tgId }, 'Failed to load questions for user');
      return ['failed'];
    }
    return Promise.all(questions.map((question) => evaluatePair(user, question, at)));
  };

  const tick = async (at: number): Promise<TickResult> => {
    const startedAt = Date.now();
    const result: TickResult = { evaluated: 0, sent: 0, failed: 0, skipped: 0 };

    let after: number | null = null;
    for (;;) {
      let page: UserRecord[];
      try {
        page = await deps.store.listEnabledUsers(after, pageSize);
      } catch (err) {
        logger.error({ err }, 'Failed to list enabled users; abandoning tick');
        break;
      }
      if (page.length === 0) break;

      const outcomes = (await Promise.all(page.map((user) => evaluateUser(user, at)))).flat();
      for (const outcome of outcomes) {
        result.evaluated += 1;
        result[outcome] += 1;
      }

      const last = page[page.length - 1];
      if (!last || page.length < pageSize) break;
      after = last.tgId;
    }

    const durationMs = Date.now() - startedAt;
    recordTick(result, at, durationMs);
    logger.info({ ...result, durationMs }, 'Scheduler tick complete');
    return result;
  };

  const runTick = (at: number = now()): Promise<TickResult> => {
    const next = tickChain.then(() => tick(at));
    tickChain = next.catch(() => undefined);
    return next;
  };

  const arm = (): void => {
    if (!running) return;
    timer = setTimeout(() => {
      timer = null;
      runTick()
        .catch((err: unknown) => {
          logger.error({ err }, 'Scheduler tick crashed');
        })
        .finally(arm);
    }, deps.tickIntervalMs);
  };

  return {
    start() {
      if (running) return;
      running = true;
      logger.info({ tickIntervalMs: deps.tickIntervalMs }, 'Scheduler started');
      arm();
    },

    async stop() {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      await tickChain;
      logger.info('Scheduler stopped');
    },

    runTick,

    get running() {
      return running;
    },
  };
}
