/**
 * Telegram notifier
 *
 * Sends plain-text messages through the Bot API `sendMessage` method. Disabled unless both the bot
 * token and the chat id are configured. Failures reject; the caller decides whether to care.
 */
import { TELEGRAM_API_URL } from '../../constants/index.js';
import { createUndiciTransport } from '../httpTransport/index.js';
import type { Notifier, TelegramNotifierDeps } from './types.js';

/**
 * Builds the sendMessage URL.
 */
export function buildSendMessageUrl(apiUrl: string, botToken: string, chatId: string, text: string): string {
  const query = new URLSearchParams({ chat_id: chatId, text }).toString();
  return `${apiUrl}/bot${botToken}/sendMessage?${query}`;
}

export function createTelegramNotifier(deps: TelegramNotifierDeps): Notifier {
  const { config } = deps;
  if (config === null) {
    return {
      enabled: false,
      notify: async () => {},
    };
  }

  const { botToken, chatId } = config;
  const transport = deps.transport ?? createUndiciTransport({ timeoutMs: deps.timeoutMs });
  const apiUrl = deps.apiUrl ?? TELEGRAM_API_URL;

  async function notify(message: string): Promise<void> {
    if (message === '') {
      return;
    }
    const response = await transport.send({
      method: 'GET',
      url: buildSendMessageUrl(apiUrl, botToken, chatId, message),
      headers: {},
    });
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Telegram sendMessage failed with HTTP ${response.statusCode}`);
    }
  }

  return {
    enabled: true,
    notify,
  };
}

export type { Notifier } from './types.js';
