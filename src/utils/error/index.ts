import { inspect } from 'node:util';
import { isRecord } from '../primitives/index.js';

/**
 * Type guard: value is an Error instance (internal).
 */
function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Type guard: object carrying one of the usual error fields (internal).
 *
 * @param value candidate value
 * @returns true when message/error/msg/code is a string
 */
function isErrorLike(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value['message'] === 'string' ||
    typeof value['error'] === 'string' ||
    typeof value['msg'] === 'string' ||
    typeof value['code'] === 'string'
  );
}

/**
 * Renders any thrown value as a readable string.
 * null/undefined give "unknown error"; Error gives its message; error-like objects give the first
 * non-empty message/error/msg/code; anything else is JSON or inspect output.
 *
 * @param err any error or unknown value
 * @returns readable message
 */
export function formatError(err: unknown): string {
  if (err === null || err === undefined) {
    return 'unknown error';
  }
  if (typeof err === 'string') {
    return err;
  }
  if (isError(err)) {
    return err.message || err.name || 'Error';
  }
  if (typeof err !== 'object') {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
  if (isErrorLike(err)) {
    const errorKeys = ['message', 'error', 'msg', 'code'] as const;
    for (const key of errorKeys) {
      const value = err[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  try {
    return JSON.stringify(err);
  } catch {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
}
