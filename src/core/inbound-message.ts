import type { MessagingPlatform } from '../platforms/types.js';

/**
 * Normalized inbound message.
 *
 * Platform runtimes map their native updates into this shape before handing
 * them to the inbound pipeline.
 */
export interface InboundMessage {
  platform: MessagingPlatform;
  chatId: string;
  senderId: number;

  /** Platform message id. */
  messageId: string;

  /** Id of the message this one replies to, if any. */
  replyToMessageId: string | null;

  /** Milliseconds since epoch. */
  timestampMs: number;

  text: string;

  username?: string | null;
  firstName?: string | null;

  /** True when the sender is a bot account. */
  fromBot?: boolean;
}
