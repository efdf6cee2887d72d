/**
 * Configuration validation
 *
 * - rule set consistency (stop loss below its threshold, unique thresholds)
 * - reporting every collected problem at once
 * - the ConfigValidationError thrown to the entry point
 */
import type { Rule } from '../types/index.js';
import { isRecord } from '../utils/primitives/index.js';
import type { Logger } from '../utils/logger/index.js';
import type { ConfigIssues, ConfigValidationError, ValidationResult } from './types.js';

/**
 * Creates a configuration validation error.
 * @param message error message
 * @param missingFields variables that are required but unset
 */
export const createConfigValidationError = (
  message: string,
  missingFields: ReadonlyArray<string> = [],
): ConfigValidationError => {
  return Object.assign(new Error(message), {
    name: 'ConfigValidationError' as const,
    missingFields,
  });
};

export function isConfigValidationError(err: unknown): err is ConfigValidationError {
  return err instanceof Error && err.name === 'ConfigValidationError' && isRecord(err) && Array.isArray(err['missingFields']);
}

/**
 * Checks a rule set: at least one rule, each stop loss strictly below its threshold, thresholds unique.
 */
export function validateRules(rules: ReadonlyArray<Rule>, envKey: string): ValidationResult {
  const errors: string[] = [];
  if (rules.length === 0) {
    errors.push(`${envKey} holds no rule`);
  }

  const seen = new Set<number>();
  for (const rule of rules) {
    if (rule.newStopLossPercent >= rule.minPnlPercent) {
      errors.push(
        `${envKey}: stop loss ${rule.newStopLossPercent} must be below its threshold ${rule.minPnlPercent}`,
      );
    }
    if (seen.has(rule.minPnlPercent)) {
      errors.push(`${envKey}: threshold ${rule.minPnlPercent} appears more than once`);
    }
    seen.add(rule.minPnlPercent);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Logs every collected problem and throws when there is at least one.
 * @throws {ConfigValidationError}
 */
export function assertNoConfigIssues(issues: ConfigIssues, logger: Logger): void {
  if (issues.errors.length === 0) {
    return;
  }

  logger.error('Configuration validation failed');
  logger.error('='.repeat(60));
  issues.errors.forEach((error, index) => {
    logger.error(`${index + 1}. ${error}`);
  });
  logger.error('='.repeat(60));
  logger.error('See .env.example for the list of settings.');

  throw createConfigValidationError(
    `Configuration validation failed: ${issues.errors.length} problem(s)`,
    issues.missingFields,
  );
}
