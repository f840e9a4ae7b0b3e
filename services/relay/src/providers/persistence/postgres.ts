import { CorruptState, PersistenceFailure, errorMessage } from '../../core/errors.js';
import type { Queryable } from '../../db/client.js';
import { CACHE_TABLES_RELATION } from '../../db/schema.js';
import type { CacheTables, TableName } from '../../types/relay.js';
import { parseTableDocument, toTableDocument } from './records.js';
import type { PersistentStore } from './types.js';

interface CacheTableRow {
  name: string;
  payload: unknown;
}

export class PostgresPersistentStore implements PersistentStore {
  readonly name = 'postgres';

  constructor(private readonly db: Queryable) {}

  async load(): Promise<CacheTables> {
    let rows: CacheTableRow[] = [];
    try {
      rows = await this.db.query<CacheTableRow>(
        `
          select name, payload
          from ${CACHE_TABLES_RELATION}
          where name = any($1)
        `,
        [['delivery', 'local']],
      );
    } catch (error) {
      console.warn(`[relay] could not read cache tables from postgres, starting empty: ${errorMessage(error)}`);
    }

    const payloadFor = (table: TableName): unknown =>
      rows.find((row) => row.name === table)?.payload ?? toTableDocument({});

    return {
      delivery: this.parse('delivery', payloadFor('delivery')),
      local: this.parse('local', payloadFor('local')),
    };
  }

  async save<K extends TableName>(table: K, rows: CacheTables[K]): Promise<void> {
    const now = new Date().toISOString();
    try {
      await this.db.query(
        `
          insert into ${CACHE_TABLES_RELATION} (name, payload, updated_at)
          values ($1, $2::jsonb, $3)
          on conflict (name) do update
          set
            payload = excluded.payload,
            updated_at = excluded.updated_at
        `,
        [table, JSON.stringify(toTableDocument<CacheTables[TableName][string]>(rows)), now],
      );
    } catch (error) {
      throw new PersistenceFailure(`Failed to write ${table} cache to postgres: ${errorMessage(error)}`, error);
    }
  }

  private parse<K extends TableName>(table: K, payload: unknown): CacheTables[K] {
    try {
      return parseTableDocument(table, payload);
    } catch (error) {
      const corrupt = error instanceof CorruptState ? error : new CorruptState(errorMessage(error), error);
      console.warn(`[relay] ${corrupt.message} (postgres), starting empty`);
      return parseTableDocument(table, toTableDocument({}));
    }
  }
}
