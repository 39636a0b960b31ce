import type { CommandContext, CommandDefinition } from '../bot/commands.js';
import { parseCommand } from '../bot/commands.js';
import type { SettingsService } from '../features/settings.js';
import { logger } from '../middleware/logger.js';
import type { RateLimiter } from '../middleware/rate-limit.js';
import { recordRateLimitRejection, recordReply } from '../middleware/stats.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { ActivityEntry } from '../utils/db-types.js';
import {
  AdminRequiredError,
  BroadcastInProgressError,
  NotFoundError,
  RateLimitExceededError,
  ValidationError,
} from './errors.js';
import type { InboundMessage } from './inbound-message.js';
import type { MessagingAdapter } from './messaging-adapter.js';
import type { ReplyCorrelator } from './reply-correlator.js';

export const ACTIVITY_SAVED_REPLY = '📝 Saved.';
export const GENERIC_ERROR_REPLY = '⚠️ Something went wrong. Please try again later.';

export interface InboundDeps {
  adapter: MessagingAdapter;
  rateLimiter: RateLimiter;
  correlator: Pick<ReplyCorrelator, 'resolve'>;
  settings: Pick<SettingsService, 'get' | 'register'>;
  store: Pick<DbBackend, 'logActivity' | 'getActiveDefaultQuestion'>;
  commands: CommandDefinition[];
  adminId: number;
  now?: () => number;
}

export type QuestionAttribution =
  | { kind: 'reply'; questionId: number }
  | { kind: 'unmatched-reply' }
  | { kind: 'default'; questionId: number | null };

/**
 * A reply to a prompt resolves through the correlator; a reply whose
 * reference is unknown or expired stays unattributed; a message that is not
 * a reply belongs to the user's active default question.
 */
export async function attributeMessage(
  inbound: InboundMessage,
  deps: Pick<InboundDeps, 'correlator' | 'store'>,
  now: number,
): Promise<QuestionAttribution> {
  if (inbound.replyToMessageId !== null) {
    const questionId = await deps.correlator.resolve(inbound.senderId, inbound.replyToMessageId, now);
    return questionId === null ? { kind: 'unmatched-reply' } : { kind: 'reply', questionId };
  }
  const fallback = await deps.store.getActiveDefaultQuestion(inbound.senderId);
  return { kind: 'default', questionId: fallback?.id ?? null };
}

function attributedQuestionId(attribution: QuestionAttribution): number | null {
  return attribution.kind === 'unmatched-reply' ? null : attribution.questionId;
}

/** User-facing text for errors a command may raise; null for unexpected faults. */
export function userFacingError(err: unknown): string | null {
  if (err instanceof RateLimitExceededError) {
    return `Too many requests. Try again in ${err.retryAfterSeconds} seconds.`;
  }
  if (err instanceof ValidationError || err instanceof NotFoundError) return `❌ ${err.message}`;
  if (err instanceof AdminRequiredError || err instanceof BroadcastInProgressError) return `⛔ ${err.message}`;
  return null;
}

/**
 * Core inbound message processing.
 *
 * Pipeline steps:
 * - transport guards (bots, empty text)
 * - admission (rate limit per action class)
 * - registration of first-time senders
 * - command dispatch, or activity logging with question attribution
 */
export async function processInboundMessage(inbound: InboundMessage, deps: InboundDeps): Promise<void> {
  if (inbound.fromBot) return;
  const text = inbound.text.trim();
  if (!text) return;

  const now = (deps.now ?? Date.now)();
  const parsed = parseCommand(text);
  const command = parsed ? deps.commands.find((c) => c.name === parsed.name) : undefined;

  const reply = async (body: string): Promise<void> => {
    try {
      await deps.adapter.sendText(inbound.chatId, body, { replyToMessageId: inbound.messageId });
    } catch (err) {
      logger.error({ err, chatId: inbound.chatId }, 'Failed to send reply');
    }
  };

  try {
    const decision = deps.rateLimiter.check(inbound.senderId, command?.action ?? 'general');
    if (!decision.allowed) {
      recordRateLimitRejection();
      throw new RateLimitExceededError(command?.action ?? 'general', decision.retryAfterSeconds ?? 1);
    }

    if (parsed && !command) {
      await reply(`Unknown command /${parsed.name}. Send /help for the list.`);
      return;
    }

    if (command) {
      if (command.adminOnly && inbound.senderId !== deps.adminId) throw new AdminRequiredError();
      if (command.name !== 'start') await ensureRegistered(inbound, deps, now);

      const ctx: CommandContext = { inbound, args: parsed?.args ?? '', now, reply };
      logger.info({ userId: inbound.senderId, command: command.name }, 'Command received');
      const response = await command.run(ctx);
      if (response !== null) await reply(response);
      return;
    }

    await ensureRegistered(inbound, deps, now);
    const entry = await logActivity(inbound, text, deps, now);
    await reply(ACTIVITY_SAVED_REPLY);
    logger.debug({ userId: inbound.senderId, activityId: entry.id, questionId: entry.questionId }, 'Activity saved');
  } catch (err) {
    const message = userFacingError(err);
    if (message !== null) {
      if (!(err instanceof RateLimitExceededError)) {
        logger.info({ userId: inbound.senderId, error: message }, 'Request rejected');
      }
      await reply(message);
      return;
    }
    logger.error({ err, userId: inbound.senderId }, 'Inbound message processing failed');
    await reply(GENERIC_ERROR_REPLY);
  }
}

async function ensureRegistered(inbound: InboundMessage, deps: InboundDeps, now: number): Promise<void> {
  const existing = await deps.settings.get(inbound.senderId);
  if (existing) return;
  await deps.settings.register(
    { tgId: inbound.senderId, username: inbound.username, firstName: inbound.firstName },
    now,
  );
  logger.info({ userId: inbound.senderId }, 'Registered new user');
}

async function logActivity(
  inbound: InboundMessage,
  text: string,
  deps: InboundDeps,
  now: number,
): Promise<ActivityEntry> {
  const attribution = await attributeMessage(inbound, deps, now);
  const questionId = attributedQuestionId(attribution);
  recordReply(questionId !== null);
  if (attribution.kind === 'unmatched-reply') {
    logger.info({ userId: inbound.senderId, replyTo: inbound.replyToMessageId }, 'Reply could not be attributed');
  }

  return deps.store.logActivity({
    userId: inbound.senderId,
    questionId,
    text,
    timestamp: inbound.timestampMs,
  });
}
