import type { Bot } from 'grammy';
import type { DialogueCollector } from '../../core';

export function registerCancelCommand(bot: Bot, collector: DialogueCollector): void {
  bot.command('cancel', async (ctx) => {
    await collector.process(ctx.chat.id, { type: 'cancel' });
  });
}
