import { config } from '../../config.js';
import type { Db } from '../../db/client.js';
import { FilePersistentStore } from './file.js';
import { PostgresPersistentStore } from './postgres.js';
import type { PersistentStore } from './types.js';

export function createPersistentStore(db: Db | null): PersistentStore {
  if (config.persistenceBackend === 'postgres') {
    if (!db) {
      throw new Error('PERSISTENCE_BACKEND=postgres needs a database connection');
    }
    return new PostgresPersistentStore(db);
  }
  return new FilePersistentStore(config.dataDir);
}
