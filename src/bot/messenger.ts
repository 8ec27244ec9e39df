import type { Api } from 'grammy';
import { MESSAGE_CHUNK_LIMIT, splitMessage } from './format/chunks';

export interface SendOptions {
  html?: boolean;
}

/** Outbound side of the chat transport. */
export interface Messenger {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<void>;
}

export function createTelegramMessenger(api: Api): Messenger {
  return {
    async sendMessage(chatId, text, options) {
      await api.sendMessage(chatId, text, options?.html ? { parse_mode: 'HTML' } : {});
    },
  };
}

/** Sends `text` as one or more HTML messages, in order, each within `limit`. */
export async function sendLong(
  messenger: Messenger,
  chatId: number,
  text: string,
  limit: number = MESSAGE_CHUNK_LIMIT,
): Promise<void> {
  for (const chunk of splitMessage(text, limit)) {
    await messenger.sendMessage(chatId, chunk, { html: true });
  }
}
