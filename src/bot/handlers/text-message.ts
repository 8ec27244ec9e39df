import type { Bot } from 'grammy';
import type { DialogueCollector, ServiceLogger } from '../../core';

type BotLogger = Pick<ServiceLogger, 'info'>;

export function registerTextMessageHandler(
  bot: Bot,
  logger: BotLogger,
  collector: DialogueCollector,
): void {
  bot.on('message:text', async (ctx) => {
    const chatId = ctx.chat.id;
    logger.info({ chatId, userId: ctx.from?.id }, 'Telegram message received');
    await collector.process(chatId, { type: 'text', text: ctx.message.text });
  });
}
