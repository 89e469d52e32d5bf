import type { ChatTurn } from "../types/chatSessionTypes";

/**
 * Anything that can hold a conversation for a session. The HTTP layer only
 * depends on this, so engines can be swapped per request.
 */
export interface ChatEngine {
  answer(sessionId: string, question: string): Promise<string>;
  getHistory(sessionId: string): Promise<ChatTurn[]>;
  clearSession(sessionId: string): Promise<void>;
}
