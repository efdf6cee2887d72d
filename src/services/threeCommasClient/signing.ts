import { createHmac } from 'node:crypto';
import type { QueryParams } from './types.js';

/**
 * Builds a query string from defined parameters, keeping their insertion order.
 * Returns '' when nothing is left.
 */
export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  return search.toString();
}

/**
 * Path plus query as it is signed and sent, e.g. `/public/api/ver1/deals?scope=active`.
 */
export function buildSignedPath(path: string, params: QueryParams): string {
  const query = buildQueryString(params);
  return query === '' ? path : `${path}?${query}`;
}

/**
 * HMAC-SHA256 (hex) of the signed path with the API secret.
 */
export function signPayload(secret: string, signedPath: string): string {
  return createHmac('sha256', secret).update(signedPath).digest('hex');
}
