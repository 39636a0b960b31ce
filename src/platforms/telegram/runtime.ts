import { DeliveryError, errorMessage } from '../../core/errors.js';
import type { InboundMessage } from '../../core/inbound-message.js';
import { markConnected, markDisconnected, markUpdateReceived } from '../../middleware/health.js';
import { logger } from '../../middleware/logger.js';
import { sleep } from '../../utils/async.js';
import type { PlatformRuntime } from '../types.js';
import type { TelegramApi } from './api.js';
import { toInboundMessage, updateSchema, updatesSchema } from './inbound.js';

const MIN_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 60_000;

export interface TelegramRuntimeOptions {
  api: TelegramApi;
  /** Long-poll timeout passed to getUpdates. */
  pollTimeoutSeconds: number;
  onMessage: (message: InboundMessage) => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TelegramRuntime extends PlatformRuntime {
  /** Fetch and handle one batch of updates. Returns how many were handled. */
  pollOnce(signal?: AbortSignal): Promise<number>;
}

export function backoffDelay(failures: number): number {
  return Math.min(MAX_BACKOFF_MS, MIN_BACKOFF_MS * 2 ** Math.max(0, failures - 1));
}

export function createTelegramRuntime(options: TelegramRuntimeOptions): TelegramRuntime {
  const wait = options.sleep ?? sleep;
  let offset: number | null = null;
  let connected = false;
  let controller: AbortController | null = null;
  let loop: Promise<void> | null = null;

  const pollOnce = async (signal?: AbortSignal): Promise<number> => {
    const raw = await options.api.call(
      'getUpdates',
      {
        timeout: options.pollTimeoutSeconds,
        allowed_updates: ['message'],
        ...(offset !== null ? { offset } : {}),
      },
      updatesSchema,
      signal,
    );

    if (!connected) {
      connected = true;
      markConnected();
      logger.info({ offset }, 'Telegram polling connected');
    }

    let handled = 0;
    for (const item of raw) {
      const update = updateSchema.safeParse(item);
      if (!update.success) {
        logger.warn({ issues: update.error.issues.length }, 'Skipping malformed Telegram update');
        continue;
      }
      offset = update.data.update_id + 1;
      markUpdateReceived();

      const inbound = toInboundMessage(update.data);
      if (!inbound) continue;
      try {
        await options.onMessage(inbound);
        handled += 1;
      } catch (err) {
        logger.error({ err, updateId: update.data.update_id }, 'Inbound handler failed');
      }
    }
    return handled;
  };

  const run = async (signal: AbortSignal): Promise<void> => {
    let failures = 0;
    while (!signal.aborted) {
      try {
        await pollOnce(signal);
        failures = 0;
      } catch (err) {
        if (signal.aborted) break;
        failures += 1;
        if (connected) {
          connected = false;
          markDisconnected();
        }
        const delayMs = err instanceof DeliveryError && err.retryAfterSeconds !== null
          ? err.retryAfterSeconds * 1000
          : backoffDelay(failures);
        logger.warn({ error: errorMessage(err), failures, delayMs }, 'Telegram polling failed, retrying');
        await wait(delayMs, signal);
      }
    }
  };

  return {
    platform: 'telegram',
    pollOnce,

    async start(): Promise<void> {
      if (loop) return;
      controller = new AbortController();
      logger.info({ pollTimeoutSeconds: options.pollTimeoutSeconds }, 'Telegram runtime started');
      loop = run(controller.signal).finally(() => {
        loop = null;
      });
    },

    async stop(): Promise<void> {
      controller?.abort();
      controller = null;
      if (loop) await loop;
      if (connected) {
        connected = false;
        markDisconnected();
      }
      logger.info('Telegram runtime stopped');
    },

    isConnected: () => connected,
  };
}
