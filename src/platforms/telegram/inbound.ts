import { z } from 'zod';
import type { InboundMessage } from '../../core/inbound-message.js';

const userSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  username: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  chat: z.object({ id: z.number().int(), type: z.string() }),
  from: userSchema.optional(),
  text: z.string().optional(),
  reply_to_message: z.object({ message_id: z.number().int() }).optional(),
});

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export const updatesSchema = z.array(z.unknown());

/**
 * Normalize a Telegram update into an InboundMessage.
 *
 * Only text messages in private chats are kept; everything else maps to null.
 */
export function toInboundMessage(update: TelegramUpdate): InboundMessage | null {
  const message = update.message;
  if (!message || !message.from || message.text === undefined) return null;
  if (message.chat.type !== 'private') return null;

  return {
    platform: 'telegram',
    chatId: String(message.chat.id),
    senderId: message.from.id,
    messageId: String(message.message_id),
    replyToMessageId: message.reply_to_message ? String(message.reply_to_message.message_id) : null,
    timestampMs: message.date * 1000,
    text: message.text,
    username: message.from.username ?? null,
    firstName: message.from.first_name ?? null,
    fromBot: message.from.is_bot ?? false,
  };
}
