import type { Db } from 'mongodb';
import type { UsageSink } from '@/lib/core/interfaces';
import type { GenerationAttempt } from '@/lib/core/types';
import { ExternalServiceError, toErrorMessage } from '@/lib/utils/errors';
import { connectToDatabase } from './client';
import { configService } from '../services/config';

/**
 * One document per model call in the usage collection. Each record is a
 * single insertOne, so concurrent writers never interleave partial records.
 */
export class MongoUsageSink implements UsageSink {
  constructor(
    private readonly getDb: () => Promise<Db> = async () => (await connectToDatabase()).db,
    private readonly collectionName: string = configService.getMongoDBConfig().usageCollection
  ) {}

  async append(record: GenerationAttempt): Promise<void> {
    try {
      const db = await this.getDb();
      await db.collection(this.collectionName).insertOne({
        ...record,
        createdAt: new Date(record.timestamp),
      });
    } catch (error) {
      throw new ExternalServiceError('usage', toErrorMessage(error));
    }
  }
}
