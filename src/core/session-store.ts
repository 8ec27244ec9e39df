import type { DialogueSession } from './types';

export interface SessionStore {
  get(chatId: number): DialogueSession | undefined;
  set(chatId: number, session: DialogueSession): void;
  delete(chatId: number): void;
}

export function createInMemorySessionStore(): SessionStore {
  const map = new Map<number, DialogueSession>();
  return {
    get(chatId: number): DialogueSession | undefined {
      return map.get(chatId);
    },
    set(chatId: number, session: DialogueSession): void {
      map.set(chatId, session);
    },
    delete(chatId: number): void {
      map.delete(chatId);
    },
  };
}
