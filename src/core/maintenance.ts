/**
 * Scheduled maintenance.
 *
 * - 03:00 local: make sure every enabled user has an active default question
 * - 04:00 local: delete expired correlation records
 * - every 5 minutes: evict idle rate-limit buckets
 *
 * Scheduled via setTimeout (no cron dependency); daily jobs reschedule
 * themselves after each run.
 */

import type { QuestionService } from '../features/questions.js';
import { logger } from '../middleware/logger.js';
import type { RateLimiter } from '../middleware/rate-limit.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { ReplyCorrelator } from './reply-correlator.js';

export const DEFAULT_REPAIR_HOUR = 3;
export const CORRELATION_SWEEP_HOUR = 4;
export const RATE_LIMIT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

const REPAIR_PAGE_SIZE = 500;

export interface MaintenanceDeps {
  store: Pick<DbBackend, 'listEnabledUsers'>;
  questions: Pick<QuestionService, 'ensureDefault'>;
  correlator: Pick<ReplyCorrelator, 'sweep'>;
  rateLimiter: Pick<RateLimiter, 'sweep'>;
  now?: () => number;
}

export interface Maintenance {
  start(): void;
  stop(): void;
  repairDefaultQuestions(): Promise<{ checked: number; failed: number }>;
  sweepCorrelations(): Promise<number>;
  sweepRateLimits(): number;
}

/** Milliseconds from `now` until the next occurrence of `hour`:00 local time. */
export function msUntilHour(hour: number, now: Date = new Date()): number {
  const target = new Date(now);
  target.setHours(hour, 0, 0, 0);
  if (now >= target) target.setDate(target.getDate() + 1);
  return target.getTime() - now.getTime();
}

export function createMaintenance(deps: MaintenanceDeps): Maintenance {
  const now = deps.now ?? Date.now;
  const timers = new Set<ReturnType<typeof setTimeout>>();
  let interval: ReturnType<typeof setInterval> | null = null;
  let started = false;

  const repairDefaultQuestions = async (): Promise<{ checked: number; failed: number }> => {
    let checked = 0;
    let failed = 0;
    let after: number | null = null;
    for (;;) {
      const page = await deps.store.listEnabledUsers(after, REPAIR_PAGE_SIZE);
      for (const user of page) {
        checked += 1;
        try {
          await deps.questions.ensureDefault(user, now());
        } catch (err) {
          failed += 1;
          logger.error({ err, userId: user.tgId }, 'Default question repair failed');
        }
      }
      const last = page[page.length - 1];
      if (!last || page.length < REPAIR_PAGE_SIZE) break;
      after = last.tgId;
    }
    logger.info({ checked, failed }, 'Default questions checked');
    return { checked, failed };
  };

  const sweepCorrelations = (): Promise<number> => deps.correlator.sweep(now());

  const sweepRateLimits = (): number => {
    const removed = deps.rateLimiter.sweep(now());
    if (removed > 0) logger.debug({ removed }, 'Idle rate-limit buckets evicted');
    return removed;
  };

  const scheduleDaily = (hour: number, label: string, job: () => Promise<unknown>): void => {
    if (!started) return;
    const delay = msUntilHour(hour, new Date(now()));
    const timer = setTimeout(async () => {
      timers.delete(timer);
      try {
        await job();
      } catch (err) {
        logger.error({ err, job: label }, 'Maintenance job failed');
      }
      scheduleDaily(hour, label, job);
    }, delay);
    timers.add(timer);
    logger.info({ job: label, inHours: +(delay / 3_600_000).toFixed(1) }, 'Maintenance job scheduled');
  };

  return {
    repairDefaultQuestions,
    sweepCorrelations,
    sweepRateLimits,

    start() {
      if (started) return;
      started = true;
      scheduleDaily(DEFAULT_REPAIR_HOUR, 'default-question-repair', repairDefaultQuestions);
      scheduleDaily(CORRELATION_SWEEP_HOUR, 'correlation-sweep', sweepCorrelations);
      interval = setInterval(sweepRateLimits, RATE_LIMIT_SWEEP_INTERVAL_MS);
      interval.unref();
    },

    stop() {
      started = false;
      for (const timer of timers) clearTimeout(timer);
      timers.clear();
      if (interval) clearInterval(interval);
      interval = null;
    },
  };
}
