import { DeliveryError, type DeliveryErrorCategory } from '../src/core/errors.js';
import type { InboundMessage } from '../src/core/inbound-message.js';
import type { MessagingAdapter, SendTextOptions, SentMessage } from '../src/core/messaging-adapter.js';
import { createQuestionService, type QuestionService } from '../src/features/questions.js';
import { createSettingsService, type SettingsService } from '../src/features/settings.js';
import type { DbBackend } from '../src/utils/db-backend.js';
import { IN_MEMORY } from '../src/utils/db-schema.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';
import type { QuestionRecord, UserRecord } from '../src/utils/db-types.js';
import { TtlCache } from '../src/utils/ttl-cache.js';

/** Local wall-clock time on a fixed test day. */
export function localTime(hours: number, minutes = 0, dayOffset = 0): number {
  return new Date(2026, 2, 10 + dayOffset, hours, minutes, 0, 0).getTime();
}

export interface SentText {
  chatId: string;
  text: string;
  replyToMessageId: string | null;
  messageId: string;
}

/**
 * In-process adapter that records sends. Chats listed in `failures` reject
 * with a DeliveryError of the given category.
 */
export class FakeAdapter implements MessagingAdapter {
  readonly platform = 'telegram' as const;
  readonly sent: SentText[] = [];
  readonly failures = new Map<string, DeliveryErrorCategory>();
  delayMs = 0;
  private nextId = 100;

  async sendText(chatId: string, text: string, options?: SendTextOptions): Promise<SentMessage> {
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    const category = this.failures.get(chatId);
    if (category) throw new DeliveryError(category, `send to ${chatId} failed: ${category}`);
    const messageId = String(this.nextId++);
    this.sent.push({ chatId, text, replyToMessageId: options?.replyToMessageId ?? null, messageId });
    return { messageId };
  }

  textsTo(chatId: string): string[] {
    return this.sent.filter((entry) => entry.chatId === chatId).map((entry) => entry.text);
  }
}

export interface TestServices {
  store: DbBackend;
  questions: QuestionService;
  settings: SettingsService;
  settingsCache: TtlCache<UserRecord>;
  questionCache: TtlCache<QuestionRecord[]>;
}

export function createTestServices(now: () => number = () => localTime(8)): TestServices {
  const store = createSqliteBackend(IN_MEMORY);
  const settingsCache = new TtlCache<UserRecord>({ defaultTtlSeconds: 300, maxSize: 100 });
  const questionCache = new TtlCache<QuestionRecord[]>({ defaultTtlSeconds: 300, maxSize: 100 });
  const questions = createQuestionService(store, questionCache);
  const settings = createSettingsService(store, settingsCache, questions, now);
  return { store, questions, settings, settingsCache, questionCache };
}

export function inboundText(senderId: number, text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    platform: 'telegram',
    chatId: String(senderId),
    senderId,
    messageId: '9001',
    replyToMessageId: null,
    timestampMs: localTime(12),
    text,
    firstName: 'Ada',
    username: 'ada',
    ...overrides,
  };
}
