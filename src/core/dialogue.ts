import type { ProjectBrief } from '../segmentation/audience-types';
import type { DialogueEvent, DialogueSession } from './types';

export type Transition =
  | { effect: 'ignore' }
  | { effect: 'cancel' }
  /** Store `session` and ask the question for its stage. */
  | { effect: 'prompt'; session: DialogueSession }
  /** All four answers are in; the session ends in `done`. */
  | { effect: 'generate'; brief: ProjectBrief };

function isCommand(text: string): boolean {
  return text.startsWith('/');
}

/**
 * Computes the next dialogue state for a chat. `start` and `cancel` are accepted
 * in any stage; text advances the questionnaire by one step.
 */
export function transition(session: DialogueSession | undefined, event: DialogueEvent): Transition {
  if (event.type === 'start') {
    return { effect: 'prompt', session: { stage: 'awaiting_city' } };
  }
  if (event.type === 'cancel') {
    return { effect: 'cancel' };
  }
  if (!session || isCommand(event.text)) {
    return { effect: 'ignore' };
  }

  const answer = event.text.trim();
  switch (session.stage) {
    case 'awaiting_city':
      return { effect: 'prompt', session: { stage: 'awaiting_complex', city: answer } };
    case 'awaiting_complex':
      return {
        effect: 'prompt',
        session: { stage: 'awaiting_description', city: session.city, complexName: answer },
      };
    case 'awaiting_description':
      return {
        effect: 'prompt',
        session: {
          stage: 'awaiting_year',
          city: session.city,
          complexName: session.complexName,
          description: answer,
        },
      };
    case 'awaiting_year':
      return {
        effect: 'generate',
        brief: {
          city: session.city,
          complexName: session.complexName,
          description: session.description,
          deliveryYear: answer,
        },
      };
  }
}
