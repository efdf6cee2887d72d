import type { AppLogger } from '../../utils/logger/index.js';

/**
 * Emitter of process signals and error events. `process` in production, an EventEmitter in tests.
 */
export type ProcessEventSource = Pick<NodeJS.EventEmitter, 'on'>;

/**
 * Cleanup context.
 * Data source: built by the entry point once the loop exists.
 */
export type CleanupContext = {
  readonly logger: AppLogger;
  /** Asks the monitoring loop to stop at the next Idle boundary */
  readonly requestStop: () => void;
  /** Waits for in-flight notifications */
  readonly flush: () => Promise<void>;
  readonly exit?: (code: number) => void;
  readonly events?: ProcessEventSource;
};

/**
 * Cleanup handle.
 */
export interface Cleanup {
  /** Releases resources after the loop has returned */
  execute(): Promise<void>;
  registerExitHandlers(): void;
}
