import type { BoundedNumberConfig, IdListParseResult, RulesParseResult } from './types.js';

/**
 * Reads a string setting. Unset, blank and placeholder values (your_xxx_here) give null.
 * @param env process environment
 * @param envKey variable name
 * @returns trimmed value or null
 */
export function getStringConfig(env: NodeJS.ProcessEnv, envKey: string): string | null {
  const value = env[envKey];
  if (!value || value.trim() === '' || value.trim() === `your_${envKey.toLowerCase()}_here`) {
    return null;
  }
  return value.trim();
}

/**
 * Reads a boolean setting; only 'true' and 'false' are recognised.
 * @param env process environment
 * @param envKey variable name
 * @param defaultValue used when unset or unrecognised, default false
 */
export function getBooleanConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  defaultValue: boolean = false,
): boolean {
  const value = env[envKey];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalizedValue = value.trim().toLowerCase();
  if (normalizedValue === 'true') {
    return true;
  }
  if (normalizedValue === 'false') {
    return false;
  }
  return defaultValue;
}

/**
 * Reads a bounded number. Unset gives the default; anything outside the bounds gives null so the
 * caller can report it.
 */
export function parseBoundedNumberConfig(
  env: NodeJS.ProcessEnv,
  { envKey, defaultValue, min, max, integer = false }: BoundedNumberConfig,
): number | null {
  const raw = env[envKey];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw.trim());
  if (!Number.isFinite(value) || value < min || value > max) {
    return null;
  }
  if (integer && !Number.isInteger(value)) {
    return null;
  }
  return value;
}

/**
 * Parses a comma-separated list of positive integer ids ("12, 34,56").
 * Duplicates are dropped, first occurrence wins.
 * @returns parsed ids in input order plus the tokens that could not be parsed
 */
export function parseIdListConfig(env: NodeJS.ProcessEnv, envKey: string): IdListParseResult {
  const value = getStringConfig(env, envKey);
  if (!value) {
    return { ids: [], invalid: [] };
  }

  const ids: number[] = [];
  const invalid: string[] = [];
  for (const token of value.split(',')) {
    const trimmed = token.trim();
    if (trimmed === '') {
      continue;
    }
    const id = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (!Number.isSafeInteger(id) || id <= 0) {
      invalid.push(trimmed);
      continue;
    }
    if (!ids.includes(id)) {
      ids.push(id);
    }
  }
  return { ids, invalid };
}

/**
 * Parses a rule set written as `min:sl,min:sl` (e.g. "4:1,8:3").
 * @returns null when the variable is unset, otherwise the rules in input order plus unparsable entries
 */
export function parseRulesConfig(env: NodeJS.ProcessEnv, envKey: string): RulesParseResult | null {
  const value = getStringConfig(env, envKey);
  if (!value) {
    return null;
  }

  const rules: Array<{ minPnlPercent: number; newStopLossPercent: number }> = [];
  const invalid: string[] = [];
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (trimmed === '') {
      continue;
    }
    const parts = trimmed.split(':').map((part) => part.trim());
    const [minPart, slPart] = parts;
    if (parts.length !== 2 || !minPart || !slPart) {
      invalid.push(trimmed);
      continue;
    }
    const minPnlPercent = Number(minPart);
    const newStopLossPercent = Number(slPart);
    if (!Number.isFinite(minPnlPercent) || !Number.isFinite(newStopLossPercent)) {
      invalid.push(trimmed);
      continue;
    }
    rules.push({ minPnlPercent, newStopLossPercent });
  }
  return { rules, invalid };
}
