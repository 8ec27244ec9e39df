export { DialogueCollector } from './dialogue-service';
export type { DialogueCollectorConfig } from './dialogue-service';
export { transition } from './dialogue';
export type { Transition } from './dialogue';
export { createInMemorySessionStore } from './session-store';
export type { SessionStore } from './session-store';
export type {
  DialogueEvent,
  DialogueSession,
  DialogueStage,
  ServiceLogger,
} from './types';
