/**
 * Decimal helper tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  compareToThreshold,
  isAtLeast,
  parseDecimalNumber,
  toDecimalStrict,
} from '../../src/utils/decimal/index.js';

describe('toDecimalStrict / parseDecimalNumber', () => {
  it('accepts finite numbers and numeric strings', () => {
    assert.equal(toDecimalStrict('1.50')?.toString(), '1.5');
    assert.equal(toDecimalStrict(3)?.toString(), '3');
    assert.equal(parseDecimalNumber(' -2.5 '), -2.5);
  });

  it('rejects empty, non-numeric and non-finite input', () => {
    assert.equal(toDecimalStrict(''), null);
    assert.equal(toDecimalStrict('abc'), null);
    assert.equal(toDecimalStrict('Infinity'), null);
    assert.equal(toDecimalStrict(Number.NaN), null);
    assert.equal(parseDecimalNumber(null), null);
    assert.equal(parseDecimalNumber({}), null);
  });
});

describe('precision comparisons', () => {
  it('rounds the observed value half-up before comparing', () => {
    assert.equal(compareToThreshold(4.999, 5, 2), 0);
    assert.equal(compareToThreshold(4.994, 5, 2), -1);
    assert.equal(compareToThreshold(5.01, 5, 2), 1);
  });

  it('never rounds the threshold itself', () => {
    assert.equal(isAtLeast(4, 4.4, 0), false);
    assert.equal(isAtLeast(4.4, 4.4, 0), true);
    assert.equal(isAtLeast(4.36, 4.4, 0), true);
    assert.equal(compareToThreshold(5, 4.4, 0), 1);
  });

  it('treats float drift at the threshold as reaching it', () => {
    assert.equal(isAtLeast(3.995, 4, 2), true);
    assert.equal(isAtLeast(0.1 + 0.2, 0.3, 2), true);
    assert.equal(isAtLeast(3.99, 4, 2), false);
  });
});
