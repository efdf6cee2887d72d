/**
 * 3Commas payload parsing tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  mapHttpFailure,
  normalizeDealStatus,
  normalizeStopLoss,
  parseBot,
  parseDeal,
  parseList,
  parseRetryAfter,
  toPlatformStopLoss,
} from '../../../src/services/threeCommasClient/parsers.js';
import { buildSignedPath } from '../../../src/services/threeCommasClient/signing.js';
import { createRawDeal } from '../../../mock/factories/dealFactory.js';

describe('deal parsing', () => {
  it('normalizes a raw deal', () => {
    const parsed = parseDeal(
      createRawDeal({ id: 42, actual_profit_percentage: '4.25', stop_loss_percentage: '-1.0', tsl_enabled: true }),
    );

    assert.deepEqual(parsed, {
      ok: true,
      value: {
        id: 42,
        botId: 10,
        accountId: 100,
        botName: 'test bot',
        pair: 'USDT_BTC',
        status: 'active',
        rawStatus: 'bought',
        pnlPercent: 4.25,
        currentStopLoss: 1,
        trailingStopEnabled: true,
      },
    });
  });

  it('reads a zero stop loss as unset and flips the sign otherwise', () => {
    assert.equal(normalizeStopLoss('0.0'), null);
    assert.equal(normalizeStopLoss(null), null);
    assert.equal(normalizeStopLoss('5'), -5);
    assert.equal(toPlatformStopLoss(1), -1);
    assert.equal(toPlatformStopLoss(-3), 3);
    assert.equal(toPlatformStopLoss(0), 0);
  });

  it('groups platform statuses', () => {
    assert.equal(normalizeDealStatus('bought', false), 'active');
    assert.equal(normalizeDealStatus('bought', true), 'completed');
    assert.equal(normalizeDealStatus('panic_sold', false), 'completed');
    assert.equal(normalizeDealStatus('failed', false), 'cancelled');
    assert.equal(normalizeDealStatus('stop_loss_pending', false), 'closing');
  });

  it('rejects deals without the fields every decision needs', () => {
    assert.deepEqual(parseDeal(createRawDeal({ actual_profit_percentage: null })), {
      ok: false,
      failure: { kind: 'invalidResponse', cause: 'deal 1 has no valid actual_profit_percentage' },
    });
    assert.deepEqual(parseDeal(createRawDeal({ id: 'abc' })), {
      ok: false,
      failure: { kind: 'invalidResponse', cause: 'deal has no valid id' },
    });
  });

  it('fails a whole list on its first invalid item', () => {
    assert.deepEqual(parseList([{ id: 1, name: 'a' }, { name: 'b' }], parseBot), {
      ok: false,
      failure: { kind: 'invalidResponse', cause: 'bot has no valid id' },
    });
    assert.deepEqual(parseList({}, parseBot), {
      ok: false,
      failure: { kind: 'invalidResponse', cause: 'expected a JSON array' },
    });
  });
});

describe('HTTP failure mapping', () => {
  const response = (statusCode: number, body: string = '', headers: Record<string, string> = {}) => ({
    statusCode,
    headers,
    body,
  });

  it('maps credential and missing-entity statuses', () => {
    assert.deepEqual(mapHttpFailure(response(401, '{"error":"signature_invalid","error_description":"Unauthorized"}'), 0), {
      kind: 'unauthorized',
      message: 'HTTP 401: Unauthorized',
    });
    assert.deepEqual(mapHttpFailure(response(403), 0), { kind: 'forbidden', message: 'HTTP 403' });
    assert.deepEqual(mapHttpFailure(response(404, '{"error":"record_not_found"}'), 0), {
      kind: 'notFound',
      message: 'HTTP 404: record_not_found',
    });
  });

  it('maps throttling with its Retry-After delay', () => {
    assert.deepEqual(mapHttpFailure(response(429, '', { 'retry-after': '3' }), 0), {
      kind: 'rateLimited',
      retryAfterMs: 3000,
    });
    assert.deepEqual(mapHttpFailure(response(418), 0), { kind: 'rateLimited', retryAfterMs: null });
  });

  it('retries server errors but not other client errors', () => {
    assert.deepEqual(mapHttpFailure(response(503), 0), { kind: 'transient', cause: 'HTTP 503', retryable: true });
    assert.deepEqual(mapHttpFailure(response(422, '{"error":"invalid"}'), 0), {
      kind: 'transient',
      cause: 'HTTP 422: invalid',
      retryable: false,
    });
  });

  it('reads Retry-After as seconds or as a date', () => {
    const nowMs = Date.parse('2024-01-01T00:00:00Z');
    assert.equal(parseRetryAfter('1.5', nowMs), 1500);
    assert.equal(parseRetryAfter('Mon, 01 Jan 2024 00:00:10 GMT', nowMs), 10_000);
    assert.equal(parseRetryAfter('soon', nowMs), null);
    assert.equal(parseRetryAfter(undefined, nowMs), null);
  });
});

describe('signed path', () => {
  it('keeps parameter order and drops undefined values', () => {
    assert.equal(
      buildSignedPath('/public/api/ver1/deals', { bot_id: 10, scope: 'active', offset: undefined }),
      '/public/api/ver1/deals?bot_id=10&scope=active',
    );
    assert.equal(buildSignedPath('/public/api/ver1/accounts', {}), '/public/api/ver1/accounts');
  });
});
