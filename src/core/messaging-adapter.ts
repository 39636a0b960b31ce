import type { MessagingPlatform } from '../platforms/types.js';

export interface SendTextOptions {
  /** Aborted by the dispatcher when the send timeout elapses. */
  signal?: AbortSignal;
  /** Platform message id to thread the text under. */
  replyToMessageId?: string;
}

export interface SentMessage {
  messageId: string;
}

/**
 * Messaging adapter API.
 *
 * This is the minimal surface needed to send text without exposing
 * platform-specific SDK types to core code. Implementations throw
 * DeliveryError with a category when the platform rejects a send.
 */
export interface MessagingAdapter {
  platform: MessagingPlatform;

  sendText(chatId: string, text: string, options?: SendTextOptions): Promise<SentMessage>;
}
