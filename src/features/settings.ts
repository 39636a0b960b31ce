/**
 * User settings: read-through cached, invalidated on every write.
 *
 * The user-level window and interval seed the default question; changing
 * them here also updates the active default question so the scheduler picks
 * the change up on its next due-check.
 */

import { NotFoundError } from '../core/errors.js';
import { logger } from '../middleware/logger.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { NewUser, UserRecord, UserSettingsUpdate } from '../utils/db-types.js';
import { validateWindow, type TimeWindow } from '../utils/time-window.js';
import type { TtlCache } from '../utils/ttl-cache.js';
import { validateInterval, type QuestionService } from './questions.js';

export interface SettingsService {
  /** Register a new user or refresh their profile, ensuring a default question. */
  register(user: NewUser, now: number): Promise<UserRecord>;
  get(userId: number): Promise<UserRecord | undefined>;
  require(userId: number): Promise<UserRecord>;
  setWindow(userId: number, window: TimeWindow): Promise<UserRecord>;
  setInterval(userId: number, minutes: number): Promise<UserRecord>;
  setEnabled(userId: number, enabled: boolean): Promise<UserRecord>;
}

export function settingsCacheKey(userId: number): string {
  return `settings:${userId}`;
}

export function createSettingsService(
  store: DbBackend,
  cache: TtlCache<UserRecord>,
  questions: QuestionService,
  now: () => number = Date.now,
): SettingsService {
  const update = async (userId: number, changes: UserSettingsUpdate): Promise<UserRecord> => {
    const updated = await store.updateUserSettings(userId, changes);
    cache.invalidate(settingsCacheKey(userId));
    if (!updated) throw new NotFoundError(`User ${userId} is not registered`);
    logger.info({ userId, changes }, 'User settings updated');
    return updated;
  };

  const syncDefaultQuestion = async (
    user: UserRecord,
    changes: { window?: TimeWindow; intervalMinutes?: number },
  ): Promise<void> => {
    const defaultQuestion = await questions.ensureDefault(user, now());
    await questions.updateSettings(user.tgId, defaultQuestion.id, changes);
  };

  const get = (userId: number): Promise<UserRecord | undefined> =>
    cache.getOrLoad(settingsCacheKey(userId), async () => {
      const user = await store.getUser(userId);
      if (!user) throw new NotFoundError(`User ${userId} is not registered`);
      return user;
    }).catch((err: unknown) => {
      if (err instanceof NotFoundError) return undefined;
      throw err;
    });

  return {
    async register(user, at) {
      const record = await store.upsertUser(user, at);
      cache.invalidate(settingsCacheKey(user.tgId));
      await questions.ensureDefault(record, at);
      return record;
    },

    get,

    async require(userId) {
      const user = await get(userId);
      if (!user) throw new NotFoundError(`User ${userId} is not registered`);
      return user;
    },

    async setWindow(userId, window) {
      const validated = validateWindow(window);
      const updated = await update(userId, { windowStart: validated.start, windowEnd: validated.end });
      await syncDefaultQuestion(updated, { window: validated });
      return updated;
    },

    async setInterval(userId, minutes) {
      const intervalMinutes = validateInterval(minutes);
      const updated = await update(userId, { intervalMinutes });
      await syncDefaultQuestion(updated, { intervalMinutes });
      return updated;
    },

    setEnabled: (userId, enabled) => update(userId, { enabled }),
  };
}
