/**
 * Delay that resolves early when interrupted.
 * Used by the monitoring loop for its idle phase and by cleanup to end it.
 */
export interface InterruptibleDelay {
  readonly wait: (ms: number) => Promise<void>;
  readonly interrupt: () => void;
}
