/**
 * @module mock/threeCommas/fakePlatform.ts
 * @description In-process stand-in for the 3Commas client.
 *
 * Deals live in one table; targets list deal ids. A stop loss update writes the new value back
 * into the table so the next listing reflects it, as the real platform does.
 */
import type {
  Account,
  Ack,
  ApiFailure,
  ApiResult,
  Bot,
  BotListingFailure,
  Deal,
  DealId,
  DealListing,
  Target,
  TradingPlatformClient,
} from '../../src/types/index.js';
import type {
  FakeCallRecord,
  FakeFailureController,
  FakeFailureRule,
  FakeInvocationLog,
  FakeMethodName,
} from './contracts.js';

type FakePlatformOptions = {
  readonly now?: () => number;
};

export interface FakeTradingPlatform extends TradingPlatformClient, FakeInvocationLog, FakeFailureController {
  setAccounts(accounts: ReadonlyArray<Account>): void;
  setBots(accountId: number, bots: ReadonlyArray<Bot>): void;
  /** Stores (or replaces) deals in the deal table */
  upsertDeals(deals: ReadonlyArray<Deal>): void;
  /** Makes the target list exactly these deal ids */
  setTargetDeals(target: Target, dealIds: ReadonlyArray<DealId>): void;
  /** Makes listings of this target partial, naming the bots that failed */
  setTargetBotFailures(target: Target, failedBots: ReadonlyArray<BotListingFailure>): void;
  removeDeal(dealId: DealId): void;
  getDeal(dealId: DealId): Deal | undefined;
  /** Listings of this target never settle until released */
  hangTarget(target: Target): void;
  releaseHungTargets(): void;
}

const keyOf = (target: Target): string => `${target.kind}:${target.id}`;

export function createFakeTradingPlatform(options: FakePlatformOptions = {}): FakeTradingPlatform {
  const now = options.now ?? Date.now;
  const deals = new Map<DealId, Deal>();
  const targetDeals = new Map<string, DealId[]>();
  const targetBotFailures = new Map<string, BotListingFailure[]>();
  const botsByAccount = new Map<number, Bot[]>();
  const hung = new Set<string>();
  const releaseHung: Array<() => void> = [];
  let accounts: Account[] = [];

  const calls: FakeCallRecord[] = [];
  const callsByMethod = new Map<FakeMethodName, number>();
  const failedCountByMethod = new Map<FakeMethodName, number>();
  const rules = new Map<FakeMethodName, FakeFailureRule>();

  function record(method: FakeMethodName, args: ReadonlyArray<unknown>): ApiFailure | null {
    const callIndex = (callsByMethod.get(method) ?? 0) + 1;
    callsByMethod.set(method, callIndex);
    calls.push({ method, callIndex, calledAtMs: now(), args });

    const rule = rules.get(method);
    if (!rule) {
      return null;
    }
    const byCall = rule.failAtCalls ? rule.failAtCalls.includes(callIndex) : true;
    const byPredicate = rule.predicate ? rule.predicate(args) : true;
    if (!byCall || !byPredicate) {
      return null;
    }
    const failedCount = failedCountByMethod.get(method) ?? 0;
    if (failedCount >= (rule.maxFailures ?? Number.POSITIVE_INFINITY)) {
      return null;
    }
    failedCountByMethod.set(method, failedCount + 1);
    return rule.failure;
  }

  async function listAccounts(): Promise<ApiResult<ReadonlyArray<Account>>> {
    const failure = record('listAccounts', []);
    return failure ? { ok: false, failure } : { ok: true, value: [...accounts] };
  }

  async function listBots(accountId: number): Promise<ApiResult<ReadonlyArray<Bot>>> {
    const failure = record('listBots', [accountId]);
    return failure ? { ok: false, failure } : { ok: true, value: [...(botsByAccount.get(accountId) ?? [])] };
  }

  async function listDeals(target: Target): Promise<ApiResult<DealListing>> {
    const failure = record('listDeals', [target]);
    if (hung.has(keyOf(target))) {
      await new Promise<void>((resolve) => {
        releaseHung.push(resolve);
      });
    }
    if (failure) {
      return { ok: false, failure };
    }
    const listed: Deal[] = [];
    for (const dealId of targetDeals.get(keyOf(target)) ?? []) {
      const deal = deals.get(dealId);
      if (deal) {
        listed.push(deal);
      }
    }
    return { ok: true, value: { deals: listed, failedBots: [...(targetBotFailures.get(keyOf(target)) ?? [])] } };
  }

  async function showDeal(dealId: DealId): Promise<ApiResult<Deal>> {
    const failure = record('showDeal', [dealId]);
    if (failure) {
      return { ok: false, failure };
    }
    const deal = deals.get(dealId);
    return deal ? { ok: true, value: deal } : { ok: false, failure: { kind: 'notFound', message: 'HTTP 404' } };
  }

  async function updateDealStopLoss(dealId: DealId, stopLossPercent: number): Promise<ApiResult<Ack>> {
    const failure = record('updateDealStopLoss', [dealId, stopLossPercent]);
    if (failure) {
      return { ok: false, failure };
    }
    const deal = deals.get(dealId);
    if (!deal) {
      return { ok: false, failure: { kind: 'notFound', message: 'HTTP 404' } };
    }
    deals.set(dealId, { ...deal, currentStopLoss: stopLossPercent });
    return { ok: true, value: { dealId, stopLossPercent } };
  }

  return {
    listAccounts,
    listBots,
    listDeals,
    showDeal,
    updateDealStopLoss,
    setAccounts(next) {
      accounts = [...next];
    },
    setBots(accountId, bots) {
      botsByAccount.set(accountId, [...bots]);
    },
    upsertDeals(next) {
      for (const deal of next) {
        deals.set(deal.id, deal);
      }
    },
    setTargetDeals(target, dealIds) {
      targetDeals.set(keyOf(target), [...dealIds]);
    },
    setTargetBotFailures(target, failedBots) {
      targetBotFailures.set(keyOf(target), [...failedBots]);
    },
    removeDeal(dealId) {
      deals.delete(dealId);
    },
    getDeal(dealId) {
      return deals.get(dealId);
    },
    hangTarget(target) {
      hung.add(keyOf(target));
    },
    releaseHungTargets() {
      hung.clear();
      for (const release of releaseHung.splice(0)) {
        release();
      }
    },
    getCalls(method) {
      return method ? calls.filter((call) => call.method === method) : [...calls];
    },
    clearCalls() {
      calls.length = 0;
    },
    setFailureRule(method, rule) {
      if (rule) {
        rules.set(method, rule);
      } else {
        rules.delete(method);
      }
      failedCountByMethod.delete(method);
    },
    clearFailureRules() {
      rules.clear();
      failedCountByMethod.clear();
    },
  };
}
