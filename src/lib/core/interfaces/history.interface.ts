import type { ConversationTurn } from '../types';

export interface ConversationHistoryProvider {
  /** Most recent `limit` turns of a session, oldest first */
  getHistory(sessionId: string, limit: number): Promise<ConversationTurn[]>;
}
