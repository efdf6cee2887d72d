import { inspect } from 'node:util';
import { isRecord, toUtcTimeLog } from '../primitives/index.js';
import type { LogObject } from './types.js';

/** ANSI colour codes for the console stream */
export const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
  green: '\x1b[32m',
  cyan: '\x1b[96m',
} as const;

const LEVEL_NAMES: Readonly<Record<number, string>> = {
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
};

const LEVEL_COLORS: Readonly<Record<number, string>> = {
  20: colors.gray,
  30: '',
  40: colors.yellow,
  50: colors.red,
};

/**
 * ESC (ASCII 27), built with fromCodePoint to keep control characters out of the regex literal.
 */
const ANSI_ESC = String.fromCodePoint(27);

const ANSI_CODE_REGEX = new RegExp(ANSI_ESC + String.raw`\[[0-9;]*m`, 'g');

/**
 * Removes ANSI colour codes.
 */
export function stripAnsiCodes(str: string): string {
  return str.replaceAll(ANSI_CODE_REGEX, '');
}

function formatExtra(extra: unknown): string {
  if (typeof extra === 'object') {
    try {
      return JSON.stringify(extra);
    } catch {
      return inspect(extra, { depth: 5, maxArrayLength: 100 });
    }
  }
  return inspect(extra, { depth: 5, maxArrayLength: 100 });
}

/**
 * Plain-text line for the log files: `[LEVEL] timestamp message {extra}`.
 */
export function formatForFile(obj: LogObject): string {
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;
  let line = `${levelStr} ${toUtcTimeLog(new Date(obj.time))} ${stripAnsiCodes(String(obj.msg))}`;

  if (obj.extra !== undefined && obj.extra !== null) {
    line += ` ${stripAnsiCodes(formatExtra(obj.extra))}`;
  }

  return line + '\n';
}

/**
 * Coloured line for the console.
 */
export function formatForConsole(obj: LogObject): string {
  const color = LEVEL_COLORS[obj.level] ?? '';
  const reset = color ? colors.reset : '';
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;

  let line = `${color}${levelStr} ${toUtcTimeLog(new Date(obj.time))} ${obj.msg}${reset}`;

  if (obj.extra !== undefined && obj.extra !== null) {
    line += ` ${formatExtra(obj.extra)}`;
  }

  return line + '\n';
}

function isLogLevel(value: unknown): value is LogObject['level'] {
  return value === 20 || value === 30 || value === 40 || value === 50;
}

/**
 * Parses one pino JSON line into a LogObject; returns null when the line is not a record.
 */
export function parseLogLine(chunk: string): LogObject | null {
  const parsed: unknown = JSON.parse(chunk);
  if (!isRecord(parsed)) {
    return null;
  }
  const { level, time, msg, extra } = parsed;
  if (!isLogLevel(level) || typeof time !== 'number') {
    return null;
  }
  return {
    level,
    time,
    msg: typeof msg === 'string' ? msg : String(msg),
    extra,
  };
}

/**
 * Drain handler with a timeout so that a stuck stream never blocks logging.
 *
 * @param stream stream to watch
 * @param timeout timeout in ms
 * @param callback called once, on drain or on timeout
 * @param onTimeout extra handling on timeout
 */
export function createDrainHandler(
  stream: NodeJS.WritableStream,
  timeout: number,
  callback: () => void,
  onTimeout?: () => void,
): { onDrain: () => void; timeoutId: NodeJS.Timeout } {
  let resolved = false;

  const onDrain = (): void => {
    if (resolved) return;
    resolved = true;
    clearTimeout(timeoutId);
    callback();
  };

  const timeoutId = setTimeout(() => {
    if (resolved) return;
    resolved = true;
    stream.removeListener('drain', onDrain);
    onTimeout?.();
    callback();
  }, timeout);

  return { onDrain, timeoutId };
}

/**
 * Writes to a stream, waiting for drain (bounded by `timeout`) when its buffer is full.
 */
export function writeWithDrainTimeout(
  stream: NodeJS.WritableStream,
  data: string,
  timeout: number,
  callback: () => void,
): void {
  const canContinue = stream.write(data);
  if (canContinue) {
    callback();
  } else {
    const { onDrain } = createDrainHandler(stream, timeout, callback);
    stream.once('drain', onDrain);
  }
}
