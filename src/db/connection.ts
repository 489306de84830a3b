import { MongoClient, type Db } from 'mongodb';
import type { MigratorSettings } from '../env/types.js';
import type { Logger } from '../utils/logger.js';

export interface DatabaseConnection {
  client: MongoClient;
  db: Db;
  close(): Promise<void>;
}

/**
 * Open the single connection used for a whole migration run
 */
export async function connectDatabase(
  settings: Pick<MigratorSettings, 'mongodbUri' | 'databaseName'>,
  logger?: Logger
): Promise<DatabaseConnection> {
  const client = new MongoClient(settings.mongodbUri);
  await client.connect();
  logger?.debug(`[Database] Connected, using database ${settings.databaseName}`);

  return {
    client,
    db: client.db(settings.databaseName),
    async close() {
      await client.close();
      logger?.debug('[Database] Connection closed');
    }
  };
}
