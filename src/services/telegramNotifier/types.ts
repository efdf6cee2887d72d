import type { TelegramConfig } from '../../types/index.js';
import type { HttpTransport } from '../httpTransport/types.js';

/**
 * Push channel for operator messages.
 * `enabled` is false when no Telegram chat is configured; `notify` then resolves at once.
 */
export interface Notifier {
  readonly enabled: boolean;
  readonly notify: (message: string) => Promise<void>;
}

/**
 * createTelegramNotifier dependencies.
 */
export type TelegramNotifierDeps = {
  readonly config: TelegramConfig | null;
  readonly timeoutMs: number;
  readonly transport?: HttpTransport;
  readonly apiUrl?: string;
};
