import { Bot } from 'grammy';
import type { DialogueCollector, ServiceLogger } from '../core';
import { registerCancelCommand } from './commands/cancel';
import { registerStartCommand } from './commands/start';
import { registerTextMessageHandler } from './handlers/text-message';

type BotLogger = Pick<ServiceLogger, 'info'>;

export const TELEGRAM_COMMANDS = [
  { command: 'start', description: 'Начать заново: город, ЖК, описание, год сдачи' },
  { command: 'cancel', description: 'Отменить текущий опрос' },
] as const;

export function createTelegramBot(token: string): Bot {
  return new Bot(token);
}

/** Commands are registered before the text handler so they never reach it. */
export function registerBotHandlers(
  bot: Bot,
  logger: BotLogger,
  collector: DialogueCollector,
): void {
  registerStartCommand(bot, collector);
  registerCancelCommand(bot, collector);
  registerTextMessageHandler(bot, logger, collector);
}
