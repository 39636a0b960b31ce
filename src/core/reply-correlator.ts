import { logger } from '../middleware/logger.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { NotificationRecord } from '../utils/db-types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_NOTIFICATION_TTL_DAYS = 90;

/**
 * Maps outbound prompt messages back to the question they asked, so a reply
 * quoting that prompt can be attributed. Records live for a fixed TTL; a
 * reply after expiry resolves to null even if the row has not been swept yet.
 */
export interface ReplyCorrelator {
  record(userId: number, questionId: number, outboundMessageId: string, sentAt: number): Promise<NotificationRecord>;
  resolve(userId: number, inReplyToId: string, now: number): Promise<number | null>;
  sweep(now: number): Promise<number>;
  readonly ttlMs: number;
}

export function createReplyCorrelator(
  store: Pick<DbBackend, 'insertNotification' | 'findActiveNotification' | 'deleteExpiredNotifications'>,
  ttlDays: number = DEFAULT_NOTIFICATION_TTL_DAYS,
): ReplyCorrelator {
  if (!(ttlDays > 0)) throw new RangeError(`Notification TTL must be positive (got ${ttlDays})`);
  const ttlMs = ttlDays * DAY_MS;

  return {
    ttlMs,

    record(userId, questionId, outboundMessageId, sentAt) {
      return store.insertNotification({
        userId,
        questionId,
        outboundMessageId,
        sentAt,
        expiresAt: sentAt + ttlMs,
      });
    },

    async resolve(userId, inReplyToId, now) {
      const match = await store.findActiveNotification(userId, inReplyToId, now);
      if (!match) {
        logger.debug({ userId, inReplyToId }, 'Reply did not match an active prompt');
        return null;
      }
      return match.questionId;
    },

    async sweep(now) {
      const removed = await store.deleteExpiredNotifications(now);
      logger.info({ removed }, 'Expired notification records swept');
      return removed;
    },
  };
}
