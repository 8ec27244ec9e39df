import type { Bot } from 'grammy';
import type { DialogueCollector } from '../../core';

export function registerStartCommand(bot: Bot, collector: DialogueCollector): void {
  bot.command('start', async (ctx) => {
    await collector.process(ctx.chat.id, { type: 'start' });
  });
}
