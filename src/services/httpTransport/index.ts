/**
 * HTTP transport
 *
 * Thin undici wrapper shared by the 3Commas client and the Telegram notifier. The exchange,
 * body included, is bounded by a timeout; statuses are left to the caller.
 */
import { request } from 'undici';
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  RequestTimeoutError,
  UndiciTransportOptions,
} from './types.js';

export const createRequestTimeoutError = (timeoutMs: number): RequestTimeoutError => {
  return Object.assign(new Error(`request timed out after ${timeoutMs}ms`), {
    name: 'RequestTimeoutError' as const,
    timeoutMs,
  });
};

export function isRequestTimeoutError(err: unknown): err is RequestTimeoutError {
  return err instanceof Error && err.name === 'RequestTimeoutError';
}

function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

/**
 * Creates the undici transport.
 */
export function createUndiciTransport({ timeoutMs }: UndiciTransportOptions): HttpTransport {
  async function send({ method, url, headers }: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const { statusCode, headers: responseHeaders, body } = await request(url, {
        method,
        headers,
        signal: controller.signal,
      });
      const text = await body.text();
      return {
        statusCode,
        headers: normalizeHeaders(responseHeaders),
        body: text,
      };
    } catch (err) {
      if (timedOut) {
        throw createRequestTimeoutError(timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    send,
  };
}
