import { vi } from 'vitest';
import type { Messenger, SendOptions } from '../src/bot/messenger';
import type { ServiceLogger } from '../src/core';
import type { AudiencePack, AudienceRecord, ProjectBrief } from '../src/segmentation/audience-types';

export function makeAudience(n: number): AudienceRecord {
  return {
    name: `Сегмент ${n}`,
    description: `Описание сегмента ${n}`,
    main_job: `Задача ${n}`,
    trigger: `Триггер ${n}`,
    critical_subtasks: [`подзадача ${n}.1`, `подзадача ${n}.2`, `подзадача ${n}.3`],
    digital_marketing_recos: [`реко ${n}.1`, `реко ${n}.2`, `реко ${n}.3`, `реко ${n}.4`],
  };
}

export function makeAudiencePack(): AudiencePack {
  return [makeAudience(1), makeAudience(2), makeAudience(3), makeAudience(4), makeAudience(5)];
}

export const sampleBrief: ProjectBrief = {
  city: 'Казань',
  complexName: 'ЖК Лесной',
  description: 'Бизнес-класс у парка, подземный паркинг',
  deliveryYear: '2027',
};

export interface SentMessage {
  chatId: number;
  text: string;
  html: boolean;
}

export function createRecordingMessenger(): Messenger & { sent: SentMessage[] } {
  const sent: SentMessage[] = [];
  return {
    sent,
    async sendMessage(chatId: number, text: string, options?: SendOptions) {
      sent.push({ chatId, text, html: options?.html ?? false });
    },
  };
}

export function createSilentLogger(): ServiceLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
