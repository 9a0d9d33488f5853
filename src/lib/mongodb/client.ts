import { MongoClient, Db } from 'mongodb';
import { configService } from '../services/config';
import { ConfigurationError } from '@/lib/utils/errors';

let cachedClient: MongoClient | null = null;
let cachedDb: Db | null = null;
let connecting: Promise<{ client: MongoClient; db: Db }> | null = null;

/**
 * Shared connection for manifest lookups, usage records and conversation history.
 * Concurrent first calls wait on the same connect.
 */
export async function connectToDatabase(): Promise<{ client: MongoClient; db: Db }> {
  if (cachedClient && cachedDb) {
    return { client: cachedClient, db: cachedDb };
  }
  if (connecting) return connecting;

  const mongoConfig = configService.getMongoDBConfig();

  if (!mongoConfig.uri) {
    throw new ConfigurationError('MongoDB URI not configured. Set MONGODB_URI in your .env');
  }

  const client = new MongoClient(mongoConfig.uri);

  connecting = client
    .connect()
    .then(() => {
      const db = client.db(mongoConfig.dbName);
      console.log(`[Mongo] Using dbName="${mongoConfig.dbName}"`);
      cachedClient = client;
      cachedDb = db;
      return { client, db };
    })
    .finally(() => {
      connecting = null;
    });

  return connecting;
}

/** Close the shared connection. Safe to call when nothing is open. */
export async function closeDatabase(): Promise<void> {
  const client = cachedClient;
  cachedClient = null;
  cachedDb = null;
  if (client) {
    await client.close();
  }
}
