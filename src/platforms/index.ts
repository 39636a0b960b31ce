import type { Config } from '../utils/config.js';
import type { InboundMessage } from '../core/inbound-message.js';
import type { MessagingAdapter } from '../core/messaging-adapter.js';
import { createTelegramApi, type FetchFn } from './telegram/api.js';
import { createTelegramAdapter } from './telegram/adapter.js';
import { createTelegramRuntime } from './telegram/runtime.js';
import type { PlatformRuntime } from './types.js';

export interface PlatformBundle {
  adapter: MessagingAdapter;
  /** Built once the inbound handler exists. */
  createRuntime(onMessage: (message: InboundMessage) => Promise<void>): PlatformRuntime;
}

export function createPlatform(
  config: Pick<Config, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_API_BASE_URL' | 'TELEGRAM_POLL_TIMEOUT_SECONDS'>,
  fetchFn?: FetchFn,
): PlatformBundle {
  const api = createTelegramApi({
    token: config.TELEGRAM_BOT_TOKEN,
    baseUrl: config.TELEGRAM_API_BASE_URL,
    fetch: fetchFn,
  });

  return {
    adapter: createTelegramAdapter(api),
    createRuntime: (onMessage) =>
      createTelegramRuntime({ api, pollTimeoutSeconds: config.TELEGRAM_POLL_TIMEOUT_SECONDS, onMessage }),
  };
}
