import type { DialogueSession } from './types';

/** Question sent on entering each stage. HTML parse mode. */
export const STAGE_PROMPTS: Record<DialogueSession['stage'], string> = {
  awaiting_city: '1/4 Введите <b>город</b>:',
  awaiting_complex: '2/4 Введите <b>название ЖК</b>:',
  awaiting_description: '3/4 Кратко опишите проект (класс, локация, фишки):',
  awaiting_year: '4/4 Укажите <b>год сдачи</b> (например, 2027):',
};

export const PROCESSING_MESSAGE = 'Думаю над сегментами… ⏳';
export const GENERATION_FAILED_MESSAGE =
  'Не удалось получить ответ от модели. Попробуйте /start ещё раз.';
export const DONE_MESSAGE = 'Готово! Чтобы начать заново — /start';
export const CANCELLED_MESSAGE = 'Окей, отменил. Начать заново — /start';
