import { z } from 'zod';
import { DeliveryError, type DeliveryErrorCategory } from '../../core/errors.js';

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().int().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).partial().optional(),
});

export type FetchFn = typeof fetch;

export interface TelegramApiOptions {
  token: string;
  baseUrl: string;
  fetch?: FetchFn;
}

export interface TelegramApi {
  call<T>(method: string, body: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T>;
}

/** Map a Bot API rejection onto a delivery category. */
export function categorizeApiError(status: number, description: string): DeliveryErrorCategory {
  const text = description.toLowerCase();
  if (status === 429) return 'rate_limited';
  if (status === 403) return 'blocked';
  if (status === 400 && (text.includes('chat not found') || text.includes('user not found'))) {
    return 'chat_not_found';
  }
  if (text.includes('bot was blocked') || text.includes('user is deactivated')) return 'blocked';
  return 'transient_error';
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

export function createTelegramApi(options: TelegramApiOptions): TelegramApi {
  const doFetch = options.fetch ?? fetch;
  const base = options.baseUrl.replace(/\/+$/, '');

  return {
    async call(method, body, schema, signal) {
      let response: Response;
      try {
        response = await doFetch(`${base}/bot${options.token}/${method}`, {
          method: 'POST',
          headers: { 'content-type': 'application/json; charset=utf-8' },
          body: JSON.stringify(body),
          signal,
        });
      } catch (err) {
        if (isAbortError(err)) throw new DeliveryError('timeout', `Telegram ${method} aborted`, { cause: err });
        throw new DeliveryError('transient_error', `Telegram ${method} request failed`, { cause: err });
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (err) {
        throw new DeliveryError('transient_error', `Telegram ${method} returned ${response.status} without JSON`, { cause: err });
      }

      const parsed = apiResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new DeliveryError('transient_error', `Telegram ${method} returned an unexpected payload`);
      }

      const payload = parsed.data;
      if (!response.ok || !payload.ok) {
        const status = payload.error_code ?? response.status;
        const description = payload.description ?? `HTTP ${response.status}`;
        throw new DeliveryError(categorizeApiError(status, description), `Telegram ${method}: ${description}`, {
          retryAfterSeconds: payload.parameters?.retry_after ?? null,
        });
      }

      const result = schema.safeParse(payload.result);
      if (!result.success) {
        throw new DeliveryError('transient_error', `Telegram ${method} result did not match the expected shape`);
      }
      return result.data;
    },
  };
}
