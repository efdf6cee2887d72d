/**
 * 3Commas API rate limiter
 *
 * - spaces calls at least `minIntervalMs` apart
 * - caps calls per sliding window
 * - concurrent callers are serialized by an internal lock
 */
import { API } from '../../constants/index.js';
import { sleep as defaultSleep } from '../../utils/helpers/index.js';
import type { RateLimiter, RateLimiterDeps } from './types.js';

/**
 * Creates a rate limiter.
 * @param deps configuration, logger and optional clock/sleep
 */
export const createRateLimiter = (deps: RateLimiterDeps): RateLimiter => {
  const { maxCalls, windowMs, minIntervalMs } = deps.config;
  const logger = deps.logger;
  const nowMs = deps.nowMs ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;

  let callTimestamps: number[] = [];
  let throttlePromise: Promise<void> | null = null;

  /**
   * Waits until the next call is allowed, then records it.
   */
  const throttle = async (): Promise<void> => {
    while (throttlePromise) {
      await throttlePromise;
    }

    let releaseLock: () => void = () => {};
    throttlePromise = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });

    try {
      let now = nowMs();

      // 1. minimum spacing
      const lastCallTime = callTimestamps.at(-1);
      if (lastCallTime !== undefined) {
        const timeSinceLastCall = now - lastCallTime;
        if (timeSinceLastCall < minIntervalMs) {
          await sleep(minIntervalMs - timeSinceLastCall);
          now = nowMs();
        }
      }

      // 2. drop calls outside the window
      callTimestamps = callTimestamps.filter((timestamp) => now - timestamp < windowMs);

      // 3. window full: wait for the oldest call to expire
      const oldestCall = callTimestamps[0];
      if (callTimestamps.length >= maxCalls && oldestCall !== undefined) {
        const waitTime = windowMs - (now - oldestCall) + API.RATE_LIMIT_BUFFER_MS;
        logger.warn(
          `[RateLimiter] 3Commas call budget reached (${maxCalls} calls/${windowMs}ms), waiting ${waitTime}ms`,
        );
        await sleep(waitTime);

        const nowAfterWait = nowMs();
        callTimestamps = callTimestamps.filter((timestamp) => nowAfterWait - timestamp < windowMs);
      }

      // 4. record this call
      callTimestamps.push(nowMs());
    } finally {
      throttlePromise = null;
      releaseLock();
    }
  };

  return {
    throttle,
  };
};
