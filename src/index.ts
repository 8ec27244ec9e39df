/**
 * Audience segmentation bot: collects a residential project brief over Telegram
 * and replies with five JTBD/DTBD audience segments generated by OpenAI.
 */
import OpenAI from 'openai';
import { createTelegramBot, registerBotHandlers } from './bot/register';
import { publishTelegramCommands, registerTelegramWebhook } from './bot/setup';
import { createTelegramMessenger } from './bot/messenger';
import { loadEnv, WEBHOOK_PATH } from './config/env';
import { DialogueCollector, createInMemorySessionStore } from './core';
import { createServer, registerWebhookRoute } from './server/create-server';
import { SegmentationClient, createOpenAiCompletion } from './services/segmentation-client';

async function main() {
  const env = loadEnv();
  const server = createServer({ logLevel: env.logLevel });

  const openai = new OpenAI({
    apiKey: env.openaiApiKey,
    timeout: env.openaiRequestTimeoutMs,
    maxRetries: 0,
  });
  const segmentationClient = new SegmentationClient({
    createCompletion: createOpenAiCompletion(openai),
    model: env.openaiModel,
    logger: server.log,
  });

  const bot = createTelegramBot(env.telegramBotToken);
  const collector = new DialogueCollector({
    generator: segmentationClient,
    sessionStore: createInMemorySessionStore(),
    messenger: createTelegramMessenger(bot.api),
    logger: server.log,
  });
  registerBotHandlers(bot, server.log, collector);

  registerWebhookRoute(server, {
    path: WEBHOOK_PATH,
    secretToken: env.telegramSecretToken,
    processUpdate: (update) => bot.handleUpdate(update),
  });

  await bot.init();
  server.log.info({ username: bot.botInfo.username }, 'Telegram bot initialized');

  await publishTelegramCommands(bot.api, server.log);
  await registerTelegramWebhook(bot.api, server.log, {
    publicUrl: env.publicUrl,
    path: WEBHOOK_PATH,
    secretToken: env.telegramSecretToken,
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    server.log.info({ signal }, 'Shutting down');
    await server.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        server.log.error(error, 'Failed to shut down cleanly');
        process.exit(1);
      });
    });
  }

  try {
    await server.listen({ port: env.port, host: '0.0.0.0' });
    server.log.info({ port: env.port }, 'Segmentation bot server started');
  } catch (error) {
    server.log.error(error, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error starting bot:', error);
  process.exit(1);
});
