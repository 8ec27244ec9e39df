import type { ProjectBrief } from '../segmentation/audience-types';

export interface ServiceLogger {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

/**
 * Per-chat progress through the questionnaire. Each stage carries exactly the
 * answers collected before it, so a finished brief cannot be built early.
 */
export type DialogueSession =
  | { stage: 'awaiting_city' }
  | { stage: 'awaiting_complex'; city: string }
  | { stage: 'awaiting_description'; city: string; complexName: string }
  | Omit<ProjectBrief, 'deliveryYear'> & { stage: 'awaiting_year' };

export type DialogueStage = DialogueSession['stage'] | 'done';

export type DialogueEvent =
  | { type: 'start' }
  | { type: 'cancel' }
  | { type: 'text'; text: string };
