/**
 * Decimal helpers
 *
 * PnL and stop loss values arrive from the platform as strings with a fixed number of decimals.
 * Comparing them as floats lets drift such as 4.999999999 vs 5 flip a decision, so the observed
 * value is rounded to the platform precision before it is compared with a configured threshold.
 */
import { Decimal } from 'decimal.js';

/**
 * Strict conversion of an unknown value to Decimal; invalid input returns null.
 * Accepts finite numbers and non-empty parsable strings.
 *
 * @param value unknown input
 * @returns Decimal or null
 */
export function toDecimalStrict(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return new Decimal(value.toString());
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text.length === 0) {
      return null;
    }
    try {
      const parsed = new Decimal(text);
      return parsed.isFinite() ? parsed : null;
    } catch {
      return null;
    }
  }

  return null;
}

/**
 * Parses a platform numeric field (string or number) into a finite number.
 * Returns null for anything that is not a finite decimal.
 */
export function parseDecimalNumber(value: unknown): number | null {
  const decimal = toDecimalStrict(value);
  return decimal === null ? null : decimal.toNumber();
}

/**
 * Compares an observed value with a configured threshold.
 * Only the observed value is rounded (half-up), to `precision` places or to the threshold's own
 * places when it has more; the threshold is taken as written.
 *
 * @returns -1, 0 or 1
 */
export function compareToThreshold(observed: number, threshold: number, precision: number): -1 | 0 | 1 {
  const limit = new Decimal(threshold.toString());
  const places = Math.max(precision, limit.decimalPlaces());
  const value = new Decimal(observed.toString()).toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
  const result = value.comparedTo(limit);
  if (result > 0) return 1;
  if (result < 0) return -1;
  return 0;
}

/**
 * `observed >= threshold` at the given precision.
 */
export function isAtLeast(observed: number, threshold: number, precision: number): boolean {
  return compareToThreshold(observed, threshold, precision) >= 0;
}
