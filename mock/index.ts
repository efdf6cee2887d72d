/**
 * Mock runtime entry
 *
 * Wires the fake platform to a scenario clock so that recorded call times follow the scenario.
 */
import { createFakeTradingPlatform, type FakeTradingPlatform } from './threeCommas/fakePlatform.js';
import { createScenarioClock, type ScenarioClock } from './scenario/clock.js';

export type MockRuntime = {
  readonly platform: FakeTradingPlatform;
  readonly clock: ScenarioClock;
};

export function createMockRuntime(initialMs: number = Date.now()): MockRuntime {
  const clock = createScenarioClock(initialMs);
  const platform = createFakeTradingPlatform({ now: () => clock.now() });
  return {
    platform,
    clock,
  };
}
