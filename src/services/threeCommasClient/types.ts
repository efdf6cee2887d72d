import type { RetryPolicy, ThreeCommasConfig } from '../../types/index.js';
import type { Logger } from '../../utils/logger/index.js';
import type { HttpTransport } from '../httpTransport/types.js';

/** Query parameter values accepted by the client */
export type QueryParams = Readonly<Record<string, string | number | boolean | undefined>>;

/**
 * Rate limiter configuration.
 * - maxCalls: calls allowed inside one window
 * - windowMs: window length
 * - minIntervalMs: minimum spacing between two calls
 */
export type RateLimiterConfig = {
  readonly maxCalls: number;
  readonly windowMs: number;
  readonly minIntervalMs: number;
};

/**
 * Rate limiter dependencies. `nowMs` and `sleep` are injectable for tests.
 */
export type RateLimiterDeps = {
  readonly config: RateLimiterConfig;
  readonly logger: Logger;
  readonly nowMs?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
};

/**
 * Spaces API calls; concurrent callers queue behind an internal lock.
 */
export interface RateLimiter {
  readonly throttle: () => Promise<void>;
}

/**
 * executeWithRetry dependencies.
 */
export type RetryDeps = {
  readonly policy: RetryPolicy;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
};

/**
 * Client dependencies.
 * `transport`, `rateLimiter`, `sleep` and `nowMs` default to the real implementations.
 */
export type ThreeCommasClientDeps = {
  readonly config: ThreeCommasConfig;
  readonly logger: Logger;
  readonly transport?: HttpTransport;
  readonly rateLimiter?: RateLimiter;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly nowMs?: () => number;
};
