/**
 * Retry policy business tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  computeBackoffDelay,
  executeWithRetry,
  getRetryDelay,
} from '../../../src/services/threeCommasClient/retryPolicy.js';
import type { ApiFailure, ApiResult, RetryPolicy } from '../../../src/types/index.js';
import { createRecordingLogger } from '../../helpers/testDoubles.js';

const POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 30_000, maxRetryAfterMs: 120_000 };

const BAD_GATEWAY: ApiFailure = { kind: 'transient', cause: 'HTTP 502', retryable: true };

function scripted(results: ReadonlyArray<ApiResult<string>>) {
  let calls = 0;
  const operation = async (): Promise<ApiResult<string>> => {
    const result = results[Math.min(calls, results.length - 1)];
    calls += 1;
    if (!result) {
      throw new Error('empty script');
    }
    return result;
  };
  return { operation, calls: () => calls };
}

describe('backoff', () => {
  it('doubles from the base delay up to the ceiling', () => {
    assert.equal(computeBackoffDelay(POLICY, 1), 500);
    assert.equal(computeBackoffDelay(POLICY, 2), 1000);
    assert.equal(computeBackoffDelay(POLICY, 7), 30_000);
  });

  it('honours Retry-After up to its cap', () => {
    assert.equal(getRetryDelay({ kind: 'rateLimited', retryAfterMs: 2000 }, POLICY, 1), 2000);
    assert.equal(getRetryDelay({ kind: 'rateLimited', retryAfterMs: 200_000 }, POLICY, 1), 120_000);
    assert.equal(getRetryDelay({ kind: 'rateLimited', retryAfterMs: null }, POLICY, 2), 1000);
  });

  it('never retries credential, not-found, parse or non-retryable failures', () => {
    assert.equal(getRetryDelay({ kind: 'unauthorized', message: 'HTTP 401' }, POLICY, 1), null);
    assert.equal(getRetryDelay({ kind: 'forbidden', message: 'HTTP 403' }, POLICY, 1), null);
    assert.equal(getRetryDelay({ kind: 'notFound', message: 'HTTP 404' }, POLICY, 1), null);
    assert.equal(getRetryDelay({ kind: 'invalidResponse', cause: 'bad json' }, POLICY, 1), null);
    assert.equal(getRetryDelay({ kind: 'transient', cause: 'HTTP 400', retryable: false }, POLICY, 1), null);
  });
});

describe('executeWithRetry', () => {
  it('retries transient failures with growing delays until success', async () => {
    const logger = createRecordingLogger();
    const sleeps: number[] = [];
    const { operation, calls } = scripted([
      { ok: false, failure: BAD_GATEWAY },
      { ok: false, failure: BAD_GATEWAY },
      { ok: true, value: 'done' },
    ]);

    const result = await executeWithRetry('GET /deals', operation, {
      policy: POLICY,
      logger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    assert.deepEqual(result, { ok: true, value: 'done' });
    assert.equal(calls(), 3);
    assert.deepEqual(sleeps, [500, 1000]);
    assert.deepEqual(logger.messages('warn'), [
      '[Retry] GET /deals failed (transient), attempt 1/3, retrying in 500ms',
      '[Retry] GET /deals failed (transient), attempt 2/3, retrying in 1000ms',
    ]);
  });

  it('returns the last failure once attempts are spent', async () => {
    const { operation, calls } = scripted([{ ok: false, failure: BAD_GATEWAY }]);

    const result = await executeWithRetry('GET /deals', operation, {
      policy: POLICY,
      logger: createRecordingLogger(),
      sleep: async () => {},
    });

    assert.deepEqual(result, { ok: false, failure: BAD_GATEWAY });
    assert.equal(calls(), 3);
  });

  it('returns a non-retryable failure after one attempt', async () => {
    const failure: ApiFailure = { kind: 'unauthorized', message: 'HTTP 401' };
    const { operation, calls } = scripted([{ ok: false, failure }]);

    const result = await executeWithRetry('GET /accounts', operation, {
      policy: POLICY,
      logger: createRecordingLogger(),
      sleep: async () => {},
    });

    assert.deepEqual(result, { ok: false, failure });
    assert.equal(calls(), 1);
  });
});
