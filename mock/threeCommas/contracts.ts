/**
 * @module mock/threeCommas/contracts.ts
 * @description Call log and failure injection contract of the fake 3Commas platform.
 */
import type { ApiFailure } from '../../src/types/index.js';

export type FakeMethodName = 'listAccounts' | 'listBots' | 'listDeals' | 'showDeal' | 'updateDealStopLoss';

export type FakeCallRecord = {
  readonly method: FakeMethodName;
  readonly callIndex: number;
  readonly calledAtMs: number;
  readonly args: ReadonlyArray<unknown>;
};

/**
 * Failure injected into a method.
 * - failAtCalls: 1-based call indexes that fail
 * - maxFailures: stop failing after this many injected failures
 * - predicate: only calls whose arguments match fail
 * Without failAtCalls every matching call fails.
 */
export type FakeFailureRule = {
  readonly failure: ApiFailure;
  readonly failAtCalls?: ReadonlyArray<number>;
  readonly maxFailures?: number;
  readonly predicate?: (args: ReadonlyArray<unknown>) => boolean;
};

export interface FakeInvocationLog {
  getCalls(method?: FakeMethodName): ReadonlyArray<FakeCallRecord>;
  clearCalls(): void;
}

export interface FakeFailureController {
  setFailureRule(method: FakeMethodName, rule: FakeFailureRule | null): void;
  clearFailureRules(): void;
}
