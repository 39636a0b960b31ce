import { logger } from '../middleware/logger.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import {
  DeliveryError,
  errorMessage,
  isPermanentCategory,
  type DeliveryErrorCategory,
} from './errors.js';
import type { MessagingAdapter } from './messaging-adapter.js';
import type { ReplyCorrelator } from './reply-correlator.js';

export interface SendFailure {
  category: DeliveryErrorCategory;
  message: string;
  permanent: boolean;
  retryAfterSeconds: number | null;
}

export type SendOutcome =
  | { success: true; outboundMessageId: string }
  | { success: false; error: SendFailure };

export interface SendOptions {
  /** Record a correlation entry so replies to this message resolve to the question. */
  correlateAsQuestion?: number;
  /** Timestamp stored with the correlation entry; defaults to the clock. */
  sentAt?: number;
}

export interface Dispatcher {
  /** Never throws: every failure comes back as `{ success: false }`. */
  send(userId: number, text: string, options?: SendOptions): Promise<SendOutcome>;
}

export interface DispatcherDeps {
  adapter: MessagingAdapter;
  correlator: Pick<ReplyCorrelator, 'record'>;
  sendTimeoutMs: number;
  disableUnreachableUsers: boolean;
  /** Called for blocked / chat-not-found users when disabling is on. */
  onUnreachableUser?: (userId: number, category: DeliveryErrorCategory) => Promise<void>;
  now?: () => number;
}

export function classifySendError(err: unknown): SendFailure {
  if (err instanceof DeliveryError) {
    return {
      category: err.category,
      message: err.message,
      permanent: err.permanent,
      retryAfterSeconds: err.retryAfterSeconds,
    };
  }
  if (err instanceof TimeoutError) {
    return { category: 'timeout', message: err.message, permanent: false, retryAfterSeconds: null };
  }
  return {
    category: 'transient_error',
    message: errorMessage(err),
    permanent: false,
    retryAfterSeconds: null,
  };
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const now = deps.now ?? Date.now;

  const handleUnreachable = async (userId: number, category: DeliveryErrorCategory): Promise<void> => {
    if (!deps.disableUnreachableUsers || !isPermanentCategory(category) || !deps.onUnreachableUser) return;
    try {
      await deps.onUnreachableUser(userId, category);
      logger.info({ userId, category }, 'Disabled unreachable user');
    } catch (err) {
      logger.error({ err, userId, category }, 'Failed to disable unreachable user');
    }
  };

  return {
    async send(userId, text, options = {}) {
      let outboundMessageId: string;
      try {
        const sent = await withTimeout(
          (signal) => deps.adapter.sendText(String(userId), text, { signal }),
          deps.sendTimeoutMs,
          'sendText',
        );
        outboundMessageId = sent.messageId;
      } catch (err) {
        const failure = classifySendError(err);
        logger.warn(
          { userId, category: failure.category, permanent: failure.permanent, error: failure.message },
          'Message delivery failed',
        );
        await handleUnreachable(userId, failure.category);
        return { success: false, error: failure };
      }

      if (options.correlateAsQuestion !== undefined) {
        try {
          await deps.correlator.record(userId, options.correlateAsQuestion, outboundMessageId, options.sentAt ?? now());
        } catch (err) {
          logger.error(
            { err, userId, questionId: options.correlateAsQuestion, outboundMessageId },
            'Failed to record prompt correlation',
          );
        }
      }

      return { success: true, outboundMessageId };
    },
  };
}
