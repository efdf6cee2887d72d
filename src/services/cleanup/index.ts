/**
 * Process exit handling
 *
 * - SIGINT / SIGTERM: first signal asks the loop to stop after the current cycle; a second one
 *   forces exit 1
 * - uncaughtException: logs, flushes the logger and exits 1
 * - unhandledRejection: logged
 * - execute(): waits for pending notifications and closes the log files
 */
import { formatError } from '../../utils/error/index.js';
import type { Cleanup, CleanupContext } from './types.js';

export function createCleanup(context: CleanupContext): Cleanup {
  const { logger, requestStop, flush } = context;
  const exit = context.exit ?? ((code: number): void => process.exit(code));
  const events = context.events ?? process;
  let stopRequested = false;

  async function execute(): Promise<void> {
    logger.info('Program exiting, cleaning up resources...');
    try {
      await flush();
    } catch (err) {
      logger.error(`[Cleanup] waiting for notifications failed: ${formatError(err)}`);
    }
    logger.closeSync();
  }

  function registerExitHandlers(): void {
    const onSignal = (signal: string): void => {
      if (stopRequested) {
        logger.error(`[Cleanup] ${signal} received again, forcing exit`);
        logger.closeSync();
        exit(1);
        return;
      }
      stopRequested = true;
      logger.warn(`[Cleanup] ${signal} received, stopping after the current cycle`);
      requestStop();
    };

    events.on('SIGINT', () => onSignal('SIGINT'));
    events.on('SIGTERM', () => onSignal('SIGTERM'));
    events.on('uncaughtException', (err: unknown) => {
      logger.error(`[Cleanup] uncaught exception: ${formatError(err)}`);
      logger.closeSync();
      exit(1);
    });
    events.on('unhandledRejection', (reason: unknown) => {
      logger.error(`[Cleanup] unhandled rejection: ${formatError(reason)}`);
    });
  }

  return {
    execute,
    registerExitHandlers,
  };
}

export type { Cleanup, CleanupContext } from './types.js';
