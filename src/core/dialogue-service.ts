import { formatAudience } from '../bot/format/audience';
import { sendLong, type Messenger } from '../bot/messenger';
import type { ProjectBrief } from '../segmentation/audience-types';
import type { AudienceGenerator } from '../services/segmentation-client';
import {
  CANCELLED_MESSAGE,
  DONE_MESSAGE,
  GENERATION_FAILED_MESSAGE,
  PROCESSING_MESSAGE,
  STAGE_PROMPTS,
} from './messages';
import { transition } from './dialogue';
import type { SessionStore } from './session-store';
import type { DialogueEvent, ServiceLogger } from './types';

export interface DialogueCollectorConfig {
  generator: AudienceGenerator;
  sessionStore: SessionStore;
  messenger: Messenger;
  logger: ServiceLogger;
  /** Per-message size cap for audience blocks. */
  chunkLimit?: number;
}

/**
 * Runs the four-question dialogue for each chat and, once the last answer
 * arrives, the generate / format / send pipeline. Expects events for one chat
 * to be processed one at a time.
 */
export class DialogueCollector {
  constructor(private readonly config: DialogueCollectorConfig) {}

  async process(chatId: number, event: DialogueEvent): Promise<void> {
    const { sessionStore, messenger, logger } = this.config;
    const current = sessionStore.get(chatId);
    const step = transition(current, event);

    switch (step.effect) {
      case 'ignore':
        return;

      case 'cancel':
        sessionStore.delete(chatId);
        logger.info({ chatId, stage: current?.stage }, 'Dialogue cancelled');
        await messenger.sendMessage(chatId, CANCELLED_MESSAGE);
        return;

      case 'prompt':
        sessionStore.set(chatId, step.session);
        logger.info(
          { chatId, from: current?.stage, stage: step.session.stage },
          'Dialogue advanced',
        );
        await messenger.sendMessage(chatId, STAGE_PROMPTS[step.session.stage], { html: true });
        return;

      case 'generate':
        sessionStore.delete(chatId);
        logger.info({ chatId, from: current?.stage, stage: 'done' }, 'Dialogue advanced');
        await this.generate(chatId, step.brief);
        return;
    }
  }

  private async generate(chatId: number, brief: ProjectBrief): Promise<void> {
    const { generator, messenger } = this.config;
    await messenger.sendMessage(chatId, PROCESSING_MESSAGE);

    const result = await generator.generateAudiences(brief, { chatId });
    if (!result.ok) {
      await messenger.sendMessage(chatId, GENERATION_FAILED_MESSAGE);
      return;
    }

    for (const [index, audience] of result.audiences.entries()) {
      await sendLong(messenger, chatId, formatAudience(index + 1, audience), this.config.chunkLimit);
    }
    await messenger.sendMessage(chatId, DONE_MESSAGE);
  }
}
