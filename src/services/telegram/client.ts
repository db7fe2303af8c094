import pino from 'pino';
import { z } from 'zod';
import { PlatformError, getErrorMessage } from '../../utils/errors.js';

const logger = pino({ name: 'telegram-client' });

const BASE_URL = 'https://api.telegram.org';
const DEFAULT_RETRY_AFTER_S = 5;

const responseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error_code: z.number().optional(),
    description: z.string().optional(),
    parameters: z.object({ retry_after: z.number().optional() }).optional(),
  }),
]);

/** Error token such as BALANCE_TOO_LOW inside "Bad Request: BALANCE_TOO_LOW". */
export function parseErrorCode(description: string | undefined): string | undefined {
  return description?.match(/\b[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)+\b/)?.[0];
}

/**
 * POST one Bot API method and unwrap `{ ok, result }`.
 *
 * Throws PlatformError on any failure. Transport failures carry code
 * NETWORK_ERROR; API failures carry the token parsed from the description.
 * A 429 is retried once after the advertised delay.
 */
export async function callBotApi<T>(
  token: string,
  method: string,
  params: Record<string, unknown> = {},
  retryOn429 = true,
): Promise<T> {
  let res: Response;
  try {
    res = await fetch(`${BASE_URL}/bot${token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(params),
    });
  } catch (err) {
    throw new PlatformError(method, getErrorMessage(err), { code: 'NETWORK_ERROR', cause: err });
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (err) {
    throw new PlatformError(method, `unreadable response (HTTP ${res.status})`, {
      status: res.status,
      cause: err,
    });
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PlatformError(method, `unexpected response shape (HTTP ${res.status})`, {
      status: res.status,
      cause: parsed.error,
    });
  }

  const body = parsed.data;
  if (body.ok) return body.result as T;

  const retryAfter = body.parameters?.retry_after;
  if (res.status === 429 && retryOn429) {
    const waitMs = (retryAfter ?? DEFAULT_RETRY_AFTER_S) * 1000;
    logger.warn('Got 429 from Telegram on %s, backing off %dms', method, waitMs);
    await new Promise((resolve) => setTimeout(resolve, waitMs));
    return callBotApi<T>(token, method, params, false);
  }

  throw new PlatformError(method, body.description ?? `HTTP ${res.status}`, {
    code: parseErrorCode(body.description),
    status: body.error_code ?? res.status,
    retryAfter,
  });
}
