import { z } from 'zod';
import type { MessagingAdapter, SendTextOptions, SentMessage } from '../../core/messaging-adapter.js';
import type { TelegramApi } from './api.js';

const sentMessageSchema = z.object({ message_id: z.number().int() });

function toReplyParameters(replyToMessageId: string | undefined): Record<string, unknown> {
  if (!replyToMessageId || !/^\d+$/.test(replyToMessageId)) return {};
  return {
    reply_parameters: {
      message_id: Number.parseInt(replyToMessageId, 10),
      allow_sending_without_reply: true,
    },
  };
}

export function createTelegramAdapter(api: TelegramApi): MessagingAdapter {
  return {
    platform: 'telegram',

    async sendText(chatId: string, text: string, options?: SendTextOptions): Promise<SentMessage> {
      const sent = await api.call(
        'sendMessage',
        { chat_id: chatId, text, ...toReplyParameters(options?.replyToMessageId) },
        sentMessageSchema,
        options?.signal,
      );
      return { messageId: String(sent.message_id) };
    },
  };
}
