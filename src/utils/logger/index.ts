/**
 * Logging
 *
 * - pino with a multistream: coloured console output and plain-text files
 * - files rotate by UTC date: `<logDir>/system/YYYY-MM-DD.log`
 * - with debug enabled, debug records also go to `<logDir>/debug/`
 * - warn and error go to stderr, the rest to stdout
 *
 * The logger is created once by the entry point and injected everywhere as `Logger`.
 */
import fs from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import pino from 'pino';
import { LOG_LEVELS, LOGGING } from '../../constants/index.js';
import { toUtcTimeLog } from '../primitives/index.js';
import type { AppLogger, LogObject, Logger, LoggerOptions } from './types.js';
import {
  createDrainHandler,
  formatForConsole,
  formatForFile,
  parseLogLine,
  writeWithDrainTimeout,
} from './utils.js';

/**
 * File stream that switches to a new file when the UTC date changes.
 */
class DateRotatingStream extends Writable {
  private readonly _logDir: string;
  private _currentDate: string | null = null;
  private _fileStream: fs.WriteStream | null = null;
  // serializes rotations
  private _rotatePromise: Promise<void> | null = null;

  constructor(logDir: string) {
    super();
    this._logDir = logDir;
    if (!fs.existsSync(this._logDir)) {
      fs.mkdirSync(this._logDir, { recursive: true });
    }
  }

  private _getCurrentDate(): string {
    return toUtcTimeLog(new Date()).slice(0, 10);
  }

  private async _checkRotate(): Promise<void> {
    const today = this._getCurrentDate();
    if (this._currentDate === today) {
      return;
    }

    if (this._rotatePromise) {
      await this._rotatePromise;
      if (this._currentDate === today) {
        return;
      }
    }

    this._rotatePromise = this._doRotate(today);
    try {
      await this._rotatePromise;
    } finally {
      this._rotatePromise = null;
    }
  }

  private async _doRotate(newDate: string): Promise<void> {
    if (this._fileStream) {
      const oldStream = this._fileStream;
      this._fileStream = null;
      await new Promise<void>((resolve) => {
        oldStream.once('finish', () => resolve());
        oldStream.once('error', (err) => {
          process.stderr.write(`[DateRotatingStream] failed to close old stream: ${err.message}\n`);
          resolve();
        });
        oldStream.end();
      });
    }

    this._currentDate = newDate;
    const logFile = path.join(this._logDir, `${newDate}.log`);
    this._fileStream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf8' });
    this._fileStream.on('error', (err) => {
      process.stderr.write(`[DateRotatingStream] file stream error (${this._logDir}): ${err.message}\n`);
    });
  }

  override _write(
    chunk: Buffer,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    void (async () => {
      try {
        await this._checkRotate();
        const currentStream = this._fileStream;
        if (!currentStream?.writable) {
          callback();
          return;
        }
        if (currentStream.write(chunk, encoding)) {
          callback();
          return;
        }
        const { onDrain } = createDrainHandler(currentStream, LOGGING.DRAIN_TIMEOUT_MS, callback);
        currentStream.once('drain', onDrain);
      } catch (err) {
        process.stderr.write(`[DateRotatingStream] write failed (${this._logDir}): ${String(err)}\n`);
        callback();
      }
    })();
  }

  closeSync(): void {
    if (this._fileStream) {
      this._fileStream.end();
      this._fileStream = null;
    }
  }
}

const consoleStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    try {
      const obj = parseLogLine(chunk.toString());
      if (!obj) {
        callback();
        return;
      }
      const target = obj.level >= LOG_LEVELS.WARN ? process.stderr : process.stdout;
      writeWithDrainTimeout(target, formatForConsole(obj), LOGGING.CONSOLE_DRAIN_TIMEOUT_MS, callback);
    } catch (err) {
      process.stderr.write(`[Logger Error] ${String(err)}\n`);
      callback();
    }
  },
});

/**
 * Creates the application logger.
 *
 * @param options log directory and debug switch
 */
export function createLogger({ logDir, debug }: LoggerOptions): AppLogger {
  const systemFileStream = new DateRotatingStream(path.resolve(logDir, 'system'));
  const debugFileStream = debug ? new DateRotatingStream(path.resolve(logDir, 'debug')) : null;

  const fileStream = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
      let obj: LogObject | null;
      try {
        obj = parseLogLine(chunk.toString());
      } catch (err) {
        process.stderr.write(`[FileStream] invalid log line: ${String(err)}\n`);
        callback();
        return;
      }
      if (!obj) {
        callback();
        return;
      }

      const formatted = formatForFile(obj);
      const writes: Promise<void>[] = [
        new Promise<void>((resolve) => {
          systemFileStream.write(formatted, () => resolve());
        }),
      ];
      if (obj.level === LOG_LEVELS.DEBUG && debugFileStream) {
        writes.push(
          new Promise<void>((resolve) => {
            debugFileStream.write(formatted, () => resolve());
          }),
        );
      }
      void Promise.all(writes).then(() => callback());
    },
  });

  const level = debug ? 'debug' : 'info';
  const pinoLogger = pino(
    {
      level,
      customLevels: {
        debug: LOG_LEVELS.DEBUG,
        info: LOG_LEVELS.INFO,
        warn: LOG_LEVELS.WARN,
        error: LOG_LEVELS.ERROR,
      },
      useOnlyCustomLevels: true,
    },
    pino.multistream([
      { level, stream: consoleStream },
      { level, stream: fileStream },
    ]),
  );

  const write = (method: 'debug' | 'info' | 'warn' | 'error', msg: string, extra?: unknown): void => {
    if (extra == null) {
      pinoLogger[method](msg);
    } else {
      pinoLogger[method]({ extra }, msg);
    }
  };

  let closed = false;

  return {
    debug(msg: string, extra?: unknown): void {
      if (debug) {
        write('debug', msg, extra);
      }
    },
    info(msg: string, extra?: unknown): void {
      write('info', msg, extra);
    },
    warn(msg: string, extra?: unknown): void {
      write('warn', msg, extra);
    },
    error(msg: string, extra?: unknown): void {
      write('error', msg, extra);
    },
    closeSync(): void {
      if (closed) {
        return;
      }
      closed = true;
      pinoLogger.flush();
      systemFileStream.closeSync();
      debugFileStream?.closeSync();
    },
  };
}

export type { AppLogger, Logger };
