import type { Db } from 'mongodb';
import type { ConversationHistoryProvider } from '@/lib/core/interfaces';
import type { ChatRole, ConversationTurn } from '@/lib/core/types';
import { ExternalServiceError, toErrorMessage } from '@/lib/utils/errors';
import { connectToDatabase } from './client';
import { configService } from '../services/config';

interface MessageDocument {
  session_id: string;
  message_role: string;
  message: string;
  timestamp: Date;
}

const ROLES: readonly ChatRole[] = ['user', 'assistant', 'system'];

function toRole(value: string): ChatRole | null {
  return ROLES.find((r) => r === value) ?? null;
}

/**
 * Read-only view over the messages collection. Writing history is left to the
 * caller that owns sessions.
 */
export class MongoConversationHistory implements ConversationHistoryProvider {
  constructor(
    private readonly getDb: () => Promise<Db> = async () => (await connectToDatabase()).db,
    private readonly collectionName: string = configService.getMongoDBConfig().messagesCollection
  ) {}

  async getHistory(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];

    let docs: MessageDocument[];
    try {
      const db = await this.getDb();
      // newest N, then flipped to chronological order below
      docs = await db
        .collection<MessageDocument>(this.collectionName)
        .find({ session_id: sessionId })
        .sort({ timestamp: -1 })
        .limit(limit)
        .toArray();
    } catch (error) {
      throw new ExternalServiceError('history', toErrorMessage(error));
    }

    const turns: ConversationTurn[] = [];
    for (const doc of docs.reverse()) {
      const role = toRole(doc.message_role);
      if (role && typeof doc.message === 'string') {
        turns.push({ role, content: doc.message });
      }
    }
    return turns;
  }
}
