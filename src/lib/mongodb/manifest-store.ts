import type { Db } from 'mongodb';
import type { ManifestLookup } from '@/lib/core/interfaces';
import type { ManifestEntry } from '@/lib/core/types';
import { ExternalServiceError, toErrorMessage } from '@/lib/utils/errors';
import { connectToDatabase } from './client';
import { configService } from '../services/config';

interface ManifestDocument {
  source_id: string;
  title?: string;
  filename?: string;
  source_uri?: string;
  mimetype?: string;
}

function toEntry(doc: ManifestDocument): ManifestEntry {
  return {
    sourceId: doc.source_id,
    title: doc.title || undefined,
    filename: doc.filename || undefined,
    sourceUri: doc.source_uri || undefined,
    mimeType: doc.mimetype || undefined,
  };
}

/**
 * Reads document manifest entries from MongoDB, one document per source.
 */
export class MongoManifestLookup implements ManifestLookup {
  constructor(
    private readonly getDb: () => Promise<Db> = async () => (await connectToDatabase()).db,
    private readonly collectionName: string = configService.getMongoDBConfig().manifestCollection
  ) {}

  async getSource(sourceId: string): Promise<ManifestEntry | null> {
    try {
      const db = await this.getDb();
      const doc = await db.collection<ManifestDocument>(this.collectionName).findOne(
        { source_id: sourceId },
        { projection: { _id: 0 } }
      );
      return doc ? toEntry(doc) : null;
    } catch (error) {
      throw new ExternalServiceError('manifest', toErrorMessage(error));
    }
  }
}

/**
 * Request-scoped memo over a ManifestLookup. Each source id is fetched at most
 * once; concurrent callers share the in-flight lookup. Failed lookups resolve
 * to null and are logged.
 */
export class ManifestCache implements ManifestLookup {
  private readonly entries = new Map<string, Promise<ManifestEntry | null>>();

  constructor(private readonly lookup: ManifestLookup) {}

  getSource(sourceId: string): Promise<ManifestEntry | null> {
    const cached = this.entries.get(sourceId);
    if (cached) return cached;

    const pending = this.lookup.getSource(sourceId).catch((error: unknown) => {
      console.warn(`[Manifest] Lookup failed for ${sourceId}: ${toErrorMessage(error)}`);
      return null;
    });
    this.entries.set(sourceId, pending);
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}
