/**
 * Config factories
 *
 * Configuration objects with test-friendly defaults: no request spacing, no retry delay, one bot target.
 */
import type {
  BotNannyConfig,
  MonitorConfig,
  ThreeCommasConfig,
} from '../../src/types/index.js';

export function createMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    targets: [{ kind: 'bot', id: 10 }],
    rules: [{ minPnlPercent: 4, newStopLossPercent: 1 }],
    intervalMs: 600_000,
    targetTimeoutMs: 120_000,
    escalateAfterCycles: 3,
    pnlPrecision: 2,
    ...overrides,
  };
}

export function createThreeCommasConfig(overrides: Partial<ThreeCommasConfig> = {}): ThreeCommasConfig {
  return {
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    baseUrl: 'https://api.example.test',
    timeoutMs: 10_000,
    minIntervalMs: 0,
    maxCallsPerWindow: 1000,
    rateWindowMs: 60_000,
    retry: {
      maxAttempts: 3,
      baseDelayMs: 0,
      maxDelayMs: 0,
      maxRetryAfterMs: 0,
    },
    ...overrides,
  };
}

export function createBotNannyConfig(overrides: Partial<BotNannyConfig> = {}): BotNannyConfig {
  return {
    threeCommas: createThreeCommasConfig(),
    telegram: null,
    monitor: createMonitorConfig(),
    logging: { logDir: 'logs', debug: false },
    ...overrides,
  };
}
