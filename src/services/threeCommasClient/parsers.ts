/**
 * 3Commas payload parsing
 *
 * Turns raw JSON answers into domain values and HTTP failures into the ApiFailure taxonomy.
 *
 * Deal normalization:
 * - DCA deals report `stop_loss_percentage` with a flipped sign (positive = loss); it is negated so
 *   that `currentStopLoss` sits on the PnL axis. A value of 0 means no stop loss.
 * - a deal flagged `finished?` is never active
 * - platform statuses are grouped into completed, cancelled and closing; anything else is active
 */
import {
  CANCELLED_DEAL_STATUSES,
  CLOSING_DEAL_STATUSES,
  COMPLETED_DEAL_STATUSES,
  TIME,
} from '../../constants/index.js';
import type { Account, ApiFailure, ApiResult, Bot, Deal, DealStatus } from '../../types/index.js';
import { parseDecimalNumber } from '../../utils/decimal/index.js';
import { isRecord } from '../../utils/primitives/index.js';
import type { HttpResponse } from '../httpTransport/types.js';

const invalid = (cause: string): { ok: false; failure: ApiFailure } => ({
  ok: false,
  failure: { kind: 'invalidResponse', cause },
});

function readId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const id = Number(value);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
  }
  return null;
}

function readString(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Maps a platform status to the normalized status.
 */
export function normalizeDealStatus(rawStatus: string, finished: boolean): DealStatus {
  if (COMPLETED_DEAL_STATUSES.has(rawStatus)) {
    return 'completed';
  }
  if (CANCELLED_DEAL_STATUSES.has(rawStatus)) {
    return 'cancelled';
  }
  if (CLOSING_DEAL_STATUSES.has(rawStatus)) {
    return 'closing';
  }
  return finished ? 'completed' : 'active';
}

/**
 * Converts the platform stop loss (flipped sign, 0 = unset) to the PnL axis.
 */
export function normalizeStopLoss(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = parseDecimalNumber(value);
  if (parsed === null || parsed === 0) {
    return null;
  }
  return -parsed;
}

/**
 * Converts a PnL-axis stop loss back to the platform convention.
 */
export function toPlatformStopLoss(stopLossPercent: number): number {
  return stopLossPercent === 0 ? 0 : -stopLossPercent;
}

export function parseDeal(raw: unknown): ApiResult<Deal> {
  if (!isRecord(raw)) {
    return invalid('deal is not an object');
  }
  const id = readId(raw['id']);
  if (id === null) {
    return invalid('deal has no valid id');
  }
  const rawStatus = readString(raw['status']);
  if (rawStatus === null) {
    return invalid(`deal ${id} has no status`);
  }
  const pnlPercent = parseDecimalNumber(raw['actual_profit_percentage']);
  if (pnlPercent === null) {
    return invalid(`deal ${id} has no valid actual_profit_percentage`);
  }

  const finished = raw['finished?'] === true;
  return {
    ok: true,
    value: {
      id,
      botId: readId(raw['bot_id']),
      accountId: readId(raw['account_id']),
      botName: readString(raw['bot_name']),
      pair: readString(raw['pair']),
      status: normalizeDealStatus(rawStatus, finished),
      rawStatus,
      pnlPercent,
      currentStopLoss: normalizeStopLoss(raw['stop_loss_percentage']),
      trailingStopEnabled: raw['tsl_enabled'] === true,
    },
  };
}

export function parseBot(raw: unknown): ApiResult<Bot> {
  if (!isRecord(raw)) {
    return invalid('bot is not an object');
  }
  const id = readId(raw['id']);
  if (id === null) {
    return invalid('bot has no valid id');
  }
  return {
    ok: true,
    value: {
      id,
      accountId: readId(raw['account_id']),
      name: readString(raw['name']) ?? `bot ${id}`,
      isEnabled: raw['is_enabled'] === true,
    },
  };
}

export function parseAccount(raw: unknown): ApiResult<Account> {
  if (!isRecord(raw)) {
    return invalid('account is not an object');
  }
  const id = readId(raw['id']);
  if (id === null) {
    return invalid('account has no valid id');
  }
  return {
    ok: true,
    value: {
      id,
      name: readString(raw['name']) ?? `account ${id}`,
    },
  };
}

/**
 * Parses every item of an array payload; the first invalid item fails the whole list.
 */
export function parseList<T>(raw: unknown, parseItem: (item: unknown) => ApiResult<T>): ApiResult<T[]> {
  if (!Array.isArray(raw)) {
    return invalid('expected a JSON array');
  }
  const items: T[] = [];
  for (const item of raw) {
    const parsed = parseItem(item);
    if (!parsed.ok) {
      return parsed;
    }
    items.push(parsed.value);
  }
  return { ok: true, value: items };
}

/**
 * Parses a JSON body. Empty bodies parse to null.
 */
export function parseJsonBody(body: string): ApiResult<unknown> {
  if (body.trim() === '') {
    return { ok: true, value: null };
  }
  try {
    const value: unknown = JSON.parse(body);
    return { ok: true, value };
  } catch {
    return invalid('response body is not valid JSON');
  }
}

/**
 * Reads `Retry-After` as seconds or as an HTTP date.
 * @returns delay in milliseconds, or null when absent or unparsable
 */
export function parseRetryAfter(header: string | undefined, nowMs: number): number | null {
  if (header === undefined) {
    return null;
  }
  const trimmed = header.trim();
  if (trimmed === '') {
    return null;
  }
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * TIME.MILLISECONDS_PER_SECOND);
  }
  const dateMs = Date.parse(trimmed);
  if (Number.isNaN(dateMs)) {
    return null;
  }
  return Math.max(0, dateMs - nowMs);
}

/**
 * Extracts the platform's error text (`error_description` or `error`) from a body.
 */
export function extractErrorMessage(body: string): string | null {
  const parsed = parseJsonBody(body);
  if (!parsed.ok || !isRecord(parsed.value)) {
    return null;
  }
  return readString(parsed.value['error_description']) ?? readString(parsed.value['error']);
}

/**
 * Maps a non-2xx answer to the failure taxonomy.
 * 401 unauthorized, 403 forbidden, 404 notFound, 418/429 rateLimited, 5xx transient,
 * other 4xx transient without retry.
 */
export function mapHttpFailure(response: HttpResponse, nowMs: number): ApiFailure {
  const { statusCode } = response;
  const detail = extractErrorMessage(response.body);
  const message = detail === null ? `HTTP ${statusCode}` : `HTTP ${statusCode}: ${detail}`;

  if (statusCode === 401) {
    return { kind: 'unauthorized', message };
  }
  if (statusCode === 403) {
    return { kind: 'forbidden', message };
  }
  if (statusCode === 404) {
    return { kind: 'notFound', message };
  }
  if (statusCode === 429 || statusCode === 418) {
    return { kind: 'rateLimited', retryAfterMs: parseRetryAfter(response.headers['retry-after'], nowMs) };
  }
  if (statusCode >= 500) {
    return { kind: 'transient', cause: message, retryable: true };
  }
  return { kind: 'transient', cause: message, retryable: false };
}
