import type { CacheTables, TableName } from '../../types/relay.js';

export interface PersistentStore {
  readonly name: string;
  /** Never rejects on missing or corrupt state; such tables load empty. */
  load(): Promise<CacheTables>;
  /** Overwrites the durable copy of one table. Rejects with PersistenceFailure. */
  save<K extends TableName>(table: K, rows: CacheTables[K]): Promise<void>;
}
