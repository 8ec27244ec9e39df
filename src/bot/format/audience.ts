import type { AudienceRecord } from '../../segmentation/audience-types';

/** Escapes text for Telegram's HTML parse mode. */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function bullets(items: string[]): string {
  return items.map((item) => `• ${escapeHtml(item)}\n`).join('');
}

/**
 * Renders one audience as an HTML block. `index` is 1-based. Field order is
 * fixed: heading, description, main job, trigger, subtasks, recommendations.
 */
export function formatAudience(index: number, audience: AudienceRecord): string {
  return [
    `<b>${index}. ${escapeHtml(audience.name)}</b>\n`,
    `<b>Описание:</b> ${escapeHtml(audience.description)}\n`,
    `<b>Главная задача (JTBD):</b> ${escapeHtml(audience.main_job)}\n`,
    `<b>Триггер:</b> ${escapeHtml(audience.trigger)}\n`,
    `<b>Критические подзадачи:</b>\n${bullets(audience.critical_subtasks)}`,
    `<b>Рекомендации для digital:</b>\n${bullets(audience.digital_marketing_recos)}`,
  ].join('');
}
