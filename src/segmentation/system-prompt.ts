import type { ProjectBrief } from './audience-types';
import { AUDIENCE_PACK_SCHEMA_NAME } from './schema';

export function buildSegmentationSystemPrompt(): string {
  return [
    'Ты эксперт по сегментации жилой недвижимости.',
    'Используй Jobs To Be Done (какой прогресс/результат хочет клиент) и Dreams To Be Done',
    '(какую мечту и стиль жизни он реализует).',
    'Сгенерируй РОВНО 5 микро-ЦА для конкретного ЖК. Имена — 2–3 слова, по-русски, запоминающиеся.',
    'Для каждой ЦА верни: name, description, main_job, trigger, critical_subtasks[], digital_marketing_recos[].',
    'Учитывай город, описание проекта и год сдачи (сроки, риски/выгоды).',
  ].join(' ');
}

export function buildSegmentationUserPrompt(brief: ProjectBrief): string {
  return [
    `Город: ${brief.city}`,
    `Жилой комплекс: ${brief.complexName}`,
    `Описание проекта: ${brief.description}`,
    `Год сдачи: ${brief.deliveryYear}`,
    '',
    `Верни строго JSON по схеме ${AUDIENCE_PACK_SCHEMA_NAME}.`,
  ].join('\n');
}
