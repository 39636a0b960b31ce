import { describe, expect, it, vi } from 'vitest';

import { DeliveryError } from '../src/core/errors.js';
import type { InboundMessage } from '../src/core/inbound-message.js';
import { createTelegramAdapter } from '../src/platforms/telegram/adapter.js';
import { categorizeApiError, createTelegramApi, type FetchFn } from '../src/platforms/telegram/api.js';
import { toInboundMessage, type TelegramUpdate } from '../src/platforms/telegram/inbound.js';
import { backoffDelay, createTelegramRuntime } from '../src/platforms/telegram/runtime.js';

const BASE_URL = 'https://api.telegram.test/';
const TOKEN = 'test-token';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

function stubFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn<FetchFn>(async () => {
    const next = queue.shift();
    if (!next) throw new Error('no stubbed response left');
    return next;
  });
}

async function deliveryError(promise: Promise<unknown>): Promise<DeliveryError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DeliveryError) return err;
    throw err;
  }
  throw new Error('expected a DeliveryError');
}

describe('categorizeApiError', () => {
  it('maps Bot API rejections onto delivery categories', () => {
    expect(categorizeApiError(429, 'Too Many Requests: retry after 7')).toBe('rate_limited');
    expect(categorizeApiError(403, 'Forbidden: bot was blocked by the user')).toBe('blocked');
    expect(categorizeApiError(400, 'Bad Request: chat not found')).toBe('chat_not_found');
    expect(categorizeApiError(400, 'Bad Request: user not found')).toBe('chat_not_found');
    expect(categorizeApiError(400, 'Forbidden: user is deactivated')).toBe('blocked');
    expect(categorizeApiError(400, 'Bad Request: message is too long')).toBe('transient_error');
    expect(categorizeApiError(502, 'Bad Gateway')).toBe('transient_error');
  });
});

describe('Telegram adapter', () => {
  it('posts sendMessage and returns the message id as a string', async () => {
    const fetchFn = stubFetch(jsonResponse({ ok: true, result: { message_id: 812, chat: { id: 5 } } }));
    const adapter = createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }));

    const sent = await adapter.sendText('5', 'hello', { replyToMessageId: '77' });

    expect(sent).toEqual({ messageId: '812' });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.test/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(requestBody(init)).toEqual({
      chat_id: '5',
      text: 'hello',
      reply_parameters: { message_id: 77, allow_sending_without_reply: true },
    });
  });

  it('omits reply parameters when there is nothing to reply to', async () => {
    const fetchFn = stubFetch(
      jsonResponse({ ok: true, result: { message_id: 1 } }),
      jsonResponse({ ok: true, result: { message_id: 2 } }),
    );
    const adapter = createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }));

    await adapter.sendText('5', 'a');
    await adapter.sendText('5', 'b', { replyToMessageId: 'not-a-number' });

    expect(fetchFn.mock.calls.map(([, init]) => requestBody(init))).toEqual([
      { chat_id: '5', text: 'a' },
      { chat_id: '5', text: 'b' },
    ]);
  });

  it('raises categorized delivery errors', async () => {
    const fetchFn = stubFetch(
      jsonResponse({ ok: false, error_code: 429, description: 'Too Many Requests: retry after 7', parameters: { retry_after: 7 } }, 429),
      jsonResponse({ ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' }, 403),
      jsonResponse({ ok: false, error_code: 400, description: 'Bad Request: chat not found' }, 400),
    );
    const adapter = createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }));

    const limited = await deliveryError(adapter.sendText('5', 'x'));
    expect(limited.category).toBe('rate_limited');
    expect(limited.retryAfterSeconds).toBe(7);
    expect(limited.message).toBe('Telegram sendMessage: Too Many Requests: retry after 7');

    expect((await deliveryError(adapter.sendText('6', 'x'))).category).toBe('blocked');
    expect((await deliveryError(adapter.sendText('7', 'x'))).category).toBe('chat_not_found');
  });

  it('maps aborted and failed requests', async () => {
    const aborted = vi.fn<FetchFn>(async () => {
      throw Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
    });
    const refused = vi.fn<FetchFn>(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    const timeout = await deliveryError(createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: aborted })).sendText('5', 'x'));
    const transient = await deliveryError(createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: refused })).sendText('5', 'x'));

    expect(timeout.category).toBe('timeout');
    expect(transient.category).toBe('transient_error');
  });

  it('rejects results of the wrong shape', async () => {
    const fetchFn = stubFetch(jsonResponse({ ok: true, result: { id: 'nope' } }));
    const adapter = createTelegramAdapter(createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }));

    const err = await deliveryError(adapter.sendText('5', 'x'));
    expect(err.category).toBe('transient_error');
    expect(err.message).toBe('Telegram sendMessage result did not match the expected shape');
  });
});

describe('toInboundMessage', () => {
  const update = (message: NonNullable<TelegramUpdate['message']>): TelegramUpdate => ({ update_id: 1, message });

  it('normalizes a private text reply', () => {
    expect(
      toInboundMessage(
        update({
          message_id: 31,
          date: 1_700_000_000,
          chat: { id: 5, type: 'private' },
          from: { id: 5, is_bot: false, first_name: 'Ada', username: 'ada' },
          text: 'Reading',
          reply_to_message: { message_id: 30 },
        }),
      ),
    ).toEqual({
      platform: 'telegram',
      chatId: '5',
      senderId: 5,
      messageId: '31',
      replyToMessageId: '30',
      timestampMs: 1_700_000_000_000,
      text: 'Reading',
      username: 'ada',
      firstName: 'Ada',
      fromBot: false,
    });
  });

  it('drops group chats and non-text messages', () => {
    const from = { id: 5, first_name: 'Ada' };
    expect(toInboundMessage(update({ message_id: 1, date: 1, chat: { id: -100, type: 'group' }, from, text: 'hi' }))).toBeNull();
    expect(toInboundMessage(update({ message_id: 1, date: 1, chat: { id: 5, type: 'private' }, from }))).toBeNull();
    expect(toInboundMessage({ update_id: 2 })).toBeNull();
  });
});

describe('Telegram runtime', () => {
  const textUpdate = (updateId: number, text: string) => ({
    update_id: updateId,
    message: { message_id: updateId * 10, date: 1_700_000_000, chat: { id: 5, type: 'private' }, from: { id: 5 }, text },
  });

  it('backs off exponentially up to a minute', () => {
    expect([1, 2, 3, 7, 12].map(backoffDelay)).toEqual([1_000, 2_000, 4_000, 60_000, 60_000]);
  });

  it('handles a batch and advances the offset past every update', async () => {
    const fetchFn = stubFetch(
      jsonResponse({ ok: true, result: [textUpdate(10, 'first'), { bogus: true }, { update_id: 11 }, textUpdate(12, 'second')] }),
      jsonResponse({ ok: true, result: [] }),
    );
    const received: InboundMessage[] = [];
    const runtime = createTelegramRuntime({
      api: createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }),
      pollTimeoutSeconds: 25,
      onMessage: async (message) => {
        received.push(message);
      },
    });

    expect(await runtime.pollOnce()).toBe(2);
    expect(await runtime.pollOnce()).toBe(0);

    expect(received.map((m) => m.text)).toEqual(['first', 'second']);
    expect(fetchFn.mock.calls.map(([, init]) => requestBody(init))).toEqual([
      { timeout: 25, allowed_updates: ['message'] },
      { timeout: 25, allowed_updates: ['message'], offset: 13 },
    ]);
    expect(runtime.isConnected()).toBe(true);
  });

  it('keeps going when the handler throws', async () => {
    const fetchFn = stubFetch(
      jsonResponse({ ok: true, result: [textUpdate(20, 'boom'), textUpdate(21, 'fine')] }),
      jsonResponse({ ok: true, result: [] }),
    );
    const onMessage = vi.fn(async (message: InboundMessage) => {
      if (message.text === 'boom') throw new Error('handler failed');
    });
    const runtime = createTelegramRuntime({
      api: createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }),
      pollTimeoutSeconds: 25,
      onMessage,
    });

    expect(await runtime.pollOnce()).toBe(1);
    await runtime.pollOnce();

    expect(onMessage).toHaveBeenCalledTimes(2);
    expect(requestBody(fetchFn.mock.calls[1]?.[1])).toMatchObject({ offset: 22 });
  });

  it('stops a running poll loop', async () => {
    const fetchFn = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
          });
        }),
    );
    const runtime = createTelegramRuntime({
      api: createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }),
      pollTimeoutSeconds: 25,
      onMessage: async () => undefined,
    });

    await runtime.start();
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));
    await runtime.stop();

    expect(runtime.isConnected()).toBe(false);
  });

  it('stops during a retry backoff without waiting it out', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const backoffs: number[] = [];
    const runtime = createTelegramRuntime({
      api: createTelegramApi({ token: TOKEN, baseUrl: BASE_URL, fetch: fetchFn }),
      pollTimeoutSeconds: 25,
      onMessage: async () => undefined,
      sleep: (ms, signal) => {
        backoffs.push(ms);
        return new Promise<void>((resolve) => {
          signal?.addEventListener('abort', () => resolve(), { once: true });
        });
      },
    });

    await runtime.start();
    await vi.waitFor(() => expect(backoffs).toEqual([1_000]));
    await runtime.stop();

    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
