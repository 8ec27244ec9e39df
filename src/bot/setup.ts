import type { Api } from 'grammy';
import type { ServiceLogger } from '../core';
import { TELEGRAM_COMMANDS } from './register';

export interface WebhookSetupOptions {
  /** Base URL without a trailing slash. Registration is skipped when unset. */
  publicUrl?: string;
  path: string;
  secretToken?: string;
}

export async function publishTelegramCommands(
  api: Pick<Api, 'setMyCommands'>,
  logger: ServiceLogger,
): Promise<void> {
  try {
    await api.setMyCommands([...TELEGRAM_COMMANDS]);
    logger.info(
      { commands: TELEGRAM_COMMANDS.map((c) => c.command) },
      'Telegram commands configured',
    );
  } catch (error) {
    logger.warn({ error }, 'Failed to configure Telegram commands');
  }
}

/**
 * Points Telegram at `<publicUrl><path>`, dropping updates queued for a previous
 * deployment. Returns the registered URL, or undefined when nothing was registered.
 */
export async function registerTelegramWebhook(
  api: Pick<Api, 'deleteWebhook' | 'setWebhook'>,
  logger: ServiceLogger,
  options: WebhookSetupOptions,
): Promise<string | undefined> {
  if (!options.publicUrl) {
    logger.warn('PUBLIC_URL is not set; webhook is not registered. Set PUBLIC_URL and restart.');
    return undefined;
  }

  const webhookUrl = `${options.publicUrl}${options.path}`;
  await api.deleteWebhook({ drop_pending_updates: true });
  await api.setWebhook(webhookUrl, { secret_token: options.secretToken });
  logger.info({ webhookUrl }, 'Telegram webhook configured');
  return webhookUrl;
}
