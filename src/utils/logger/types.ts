import type { LOG_LEVELS } from '../../constants/index.js';

/**
 * One structured log record as pino writes it.
 * Used by the console and file formatters only.
 */
export type LogObject = {
  readonly level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];
  readonly time: number;
  readonly msg: string;
  readonly extra?: unknown;
};

/**
 * Logger contract injected into every module.
 */
export interface Logger {
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}

/**
 * Logger owned by the entry point; adds shutdown hooks.
 */
export interface AppLogger extends Logger {
  /** Flushes pino and closes the file streams synchronously */
  readonly closeSync: () => void;
}

/**
 * createLogger options.
 */
export type LoggerOptions = {
  /** Directory holding `system/` and `debug/` sub-directories */
  readonly logDir: string;
  /** Enables the debug level and the debug file */
  readonly debug: boolean;
};
