/**
 * 3Commas API client
 *
 * Responsibilities:
 * - sign every request (HMAC-SHA256 of path + query, `APIKEY` / `Signature` headers)
 * - space calls through the rate limiter and bound each one with a timeout
 * - retry through the central policy
 * - page through bots (100 per call) and active deals (1000 per call)
 * - return typed results; failures travel as ApiFailure values and are never thrown
 *
 * Target expansion:
 * - account: every bot of the account, then each bot's active deals. A bot that fails is logged
 *   and listed under `failedBots`; the target fails only when the bot list or every bot fails
 * - bot: the bot's active deals
 * - deal: the single deal; notFound yields an empty list
 *
 * A listing budget is paused while a call waits for the rate limiter. Once it is aborted no
 * further call is made and the listing ends with a non-retryable failure.
 */
import { THREE_COMMAS } from '../../constants/index.js';
import type {
  Account,
  Ack,
  ApiResult,
  Bot,
  BotListingFailure,
  Deal,
  DealId,
  DealListing,
  ListingBudget,
  Target,
  TradingPlatformClient,
} from '../../types/index.js';
import { formatError } from '../../utils/error/index.js';
import { sleep as defaultSleep } from '../../utils/helpers/index.js';
import { createUndiciTransport, isRequestTimeoutError } from '../httpTransport/index.js';
import type { HttpMethod } from '../httpTransport/types.js';
import {
  mapHttpFailure,
  parseAccount,
  parseBot,
  parseDeal,
  parseJsonBody,
  parseList,
  toPlatformStopLoss,
} from './parsers.js';
import { createRateLimiter } from './rateLimiter.js';
import { executeWithRetry } from './retryPolicy.js';
import { buildSignedPath, signPayload } from './signing.js';
import type { QueryParams, ThreeCommasClientDeps } from './types.js';
import { createAbandonedFailure } from './utils.js';

/**
 * Creates the 3Commas client.
 * @param deps configuration, logger and optional transport/rate limiter/clock
 */
export function createThreeCommasClient(deps: ThreeCommasClientDeps): TradingPlatformClient {
  const { config, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const nowMs = deps.nowMs ?? Date.now;
  const transport = deps.transport ?? createUndiciTransport({ timeoutMs: config.timeoutMs });
  const rateLimiter =
    deps.rateLimiter ??
    createRateLimiter({
      config: {
        maxCalls: config.maxCallsPerWindow,
        windowMs: config.rateWindowMs,
        minIntervalMs: config.minIntervalMs,
      },
      logger,
      nowMs,
      sleep,
    });

  /**
   * Waits for the rate limiter with the budget paused.
   * @returns false when the budget ran out before or during the wait
   */
  async function acquireSlot(budget: ListingBudget | undefined): Promise<boolean> {
    if (budget?.signal.aborted) {
      return false;
    }
    budget?.pause();
    try {
      await rateLimiter.throttle();
    } finally {
      budget?.resume();
    }
    return !budget?.signal.aborted;
  }

  /**
   * One signed exchange, no retry.
   */
  async function sendOnce(
    method: HttpMethod,
    endpoint: string,
    params: QueryParams,
    budget: ListingBudget | undefined,
  ): Promise<ApiResult<unknown>> {
    const signedPath = buildSignedPath(`${THREE_COMMAS.API_PREFIX}${endpoint}`, params);
    if (!(await acquireSlot(budget))) {
      return { ok: false, failure: createAbandonedFailure() };
    }

    try {
      const response = await transport.send({
        method,
        url: `${config.baseUrl}${signedPath}`,
        headers: {
          APIKEY: config.apiKey,
          Signature: signPayload(config.apiSecret, signedPath),
          Accept: 'application/json',
        },
      });
      if (response.statusCode < 200 || response.statusCode >= 300) {
        return { ok: false, failure: mapHttpFailure(response, nowMs()) };
      }
      return parseJsonBody(response.body);
    } catch (err) {
      const cause = isRequestTimeoutError(err) ? err.message : `network error: ${formatError(err)}`;
      return { ok: false, failure: { kind: 'transient', cause, retryable: true } };
    }
  }

  /**
   * Signed exchange with retry, then parsing.
   */
  async function call<T>(
    method: HttpMethod,
    endpoint: string,
    params: QueryParams,
    parse: (raw: unknown) => ApiResult<T>,
    budget?: ListingBudget,
  ): Promise<ApiResult<T>> {
    const result = await executeWithRetry(
      `${method} ${endpoint}`,
      () => sendOnce(method, endpoint, params, budget),
      { policy: config.retry, logger, sleep },
    );
    if (!result.ok) {
      logger.debug(`[3Commas] ${method} ${endpoint} failed`, result.failure);
      return result;
    }
    return parse(result.value);
  }

  /**
   * Pages through a list endpoint with `limit`/`offset` until a short page.
   */
  async function listPaged<T>(
    endpoint: string,
    params: QueryParams,
    batchSize: number,
    parseItem: (raw: unknown) => ApiResult<T>,
    budget: ListingBudget | undefined,
  ): Promise<ApiResult<T[]>> {
    const items: T[] = [];
    let offset = 0;
    for (;;) {
      const page = await call(
        'GET',
        endpoint,
        { ...params, limit: batchSize, offset },
        (raw) => parseList(raw, parseItem),
        budget,
      );
      if (!page.ok) {
        return page;
      }
      items.push(...page.value);
      offset += page.value.length;
      if (page.value.length < batchSize) {
        return { ok: true, value: items };
      }
    }
  }

  async function listAccounts(): Promise<ApiResult<ReadonlyArray<Account>>> {
    return call('GET', '/accounts', {}, (raw) => parseList(raw, parseAccount));
  }

  async function listBotsWithin(accountId: number, budget: ListingBudget | undefined): Promise<ApiResult<Bot[]>> {
    return listPaged('/bots', { account_id: accountId }, THREE_COMMAS.BOTS_BATCH_SIZE, parseBot, budget);
  }

  async function listBots(accountId: number): Promise<ApiResult<ReadonlyArray<Bot>>> {
    return listBotsWithin(accountId, undefined);
  }

  async function listBotDeals(botId: number, budget: ListingBudget | undefined): Promise<ApiResult<Deal[]>> {
    return listPaged(
      '/deals',
      { bot_id: botId, scope: 'active' },
      THREE_COMMAS.DEALS_BATCH_SIZE,
      parseDeal,
      budget,
    );
  }

  async function showDeal(dealId: DealId): Promise<ApiResult<Deal>> {
    return call('GET', `/deals/${dealId}/show`, {}, parseDeal);
  }

  async function listAccountDeals(accountId: number, budget: ListingBudget | undefined): Promise<ApiResult<DealListing>> {
    const bots = await listBotsWithin(accountId, budget);
    if (!bots.ok) {
      return bots;
    }

    const deals: Deal[] = [];
    const failedBots: BotListingFailure[] = [];
    for (const bot of bots.value) {
      if (budget?.signal.aborted) {
        return { ok: false, failure: createAbandonedFailure() };
      }
      const botDeals = await listBotDeals(bot.id, budget);
      if (!botDeals.ok) {
        logger.warn(`[3Commas] giving up on bot ${bot.id} of account ${accountId} this cycle`, botDeals.failure);
        failedBots.push({ botId: bot.id, failure: botDeals.failure });
        continue;
      }
      deals.push(...botDeals.value);
    }

    const firstFailure = failedBots[0];
    if (firstFailure && failedBots.length === bots.value.length) {
      return { ok: false, failure: firstFailure.failure };
    }
    return { ok: true, value: { deals, failedBots } };
  }

  async function listDeals(target: Target, budget?: ListingBudget): Promise<ApiResult<DealListing>> {
    switch (target.kind) {
      case 'deal': {
        const result = await call('GET', `/deals/${target.id}/show`, {}, parseDeal, budget);
        if (result.ok) {
          return { ok: true, value: { deals: [result.value], failedBots: [] } };
        }
        if (result.failure.kind === 'notFound') {
          return { ok: true, value: { deals: [], failedBots: [] } };
        }
        return result;
      }
      case 'bot': {
        const result = await listBotDeals(target.id, budget);
        return result.ok ? { ok: true, value: { deals: result.value, failedBots: [] } } : result;
      }
      case 'account':
        return listAccountDeals(target.id, budget);
    }
  }

  async function updateDealStopLoss(dealId: DealId, stopLossPercent: number): Promise<ApiResult<Ack>> {
    return call(
      'PATCH',
      `/deals/${dealId}/update_deal`,
      {
        deal_id: dealId,
        stop_loss_type: THREE_COMMAS.STOP_LOSS_TYPE,
        stop_loss_percentage: toPlatformStopLoss(stopLossPercent),
      },
      () => ({ ok: true, value: { dealId, stopLossPercent } }),
    );
  }

  return {
    listAccounts,
    listBots,
    listDeals,
    showDeal,
    updateDealStopLoss,
  };
}
