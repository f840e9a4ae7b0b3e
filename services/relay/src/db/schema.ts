import type { Queryable } from './client.js';

export const CACHE_TABLES_RELATION = 'relay_cache_tables';

/**
 * Creates the cache document table if it does not already exist.
 *
 * Each cache table is stored as one jsonb document so a save can overwrite it
 * in a single statement.
 */
export async function initializeSchema(db: Queryable): Promise<{ initialized: boolean }> {
  await db.query(`
    create table if not exists ${CACHE_TABLES_RELATION} (
      name text primary key,
      payload jsonb not null,
      updated_at timestamptz not null
    );
  `);

  return { initialized: true };
}
