import type { QueryResultRow } from 'pg';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceFailure } from '../../core/errors.js';
import type { Queryable } from '../../db/client.js';
import { PostgresPersistentStore } from './postgres.js';

/** Keeps one jsonb payload per table name, answering the two statements the store issues. */
class FakeCacheTablesDb implements Queryable {
  readonly payloads = new Map<string, unknown>();
  readonly statements: string[] = [];
  failWith: Error | null = null;

  async query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
    this.statements.push(text.trim().split(/\s+/)[0] ?? '');
    if (this.failWith) throw this.failWith;

    if (text.includes('insert into')) {
      const [name, payload] = params;
      if (typeof name !== 'string' || typeof payload !== 'string') {
        throw new Error('unexpected insert params');
      }
      this.payloads.set(name, JSON.parse(payload));
      return [];
    }

    const rows: QueryResultRow[] = [...this.payloads.entries()].map(([name, payload]) => ({ name, payload }));
    return rows as T[];
  }
}

describe('PostgresPersistentStore', () => {
  let db: FakeCacheTablesDb;

  beforeEach(() => {
    db = new FakeCacheTablesDb();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads empty tables when no rows exist', async () => {
    const store = new PostgresPersistentStore(db);

    await expect(store.load()).resolves.toEqual({ delivery: {}, local: {} });
  });

  it('upserts whole documents and reads them back', async () => {
    const store = new PostgresPersistentStore(db);
    await store.save('delivery', {
      abc12345678: {
        contentKey: 'abc12345678',
        blobHandle: 'blob-1',
        origin: { chatId: '-100200', messageId: 3 },
        title: 'Song',
      },
    });

    const loaded = await store.load();

    expect(db.statements).toEqual(['insert', 'select']);
    expect(loaded.delivery.abc12345678?.origin.chatId).toBe('-100200');
    expect(loaded.local).toEqual({});
  });

  it('treats a corrupt payload as an empty table', async () => {
    db.payloads.set('delivery', { entries: [] });
    const store = new PostgresPersistentStore(db);

    const loaded = await store.load();

    expect(loaded.delivery).toEqual({});
    expect(console.warn).toHaveBeenCalledWith(
      '[relay] delivery cache document has unsupported version undefined (postgres), starting empty',
    );
  });

  it('starts empty when the database cannot be read', async () => {
    db.failWith = new Error('connection refused');
    const store = new PostgresPersistentStore(db);

    await expect(store.load()).resolves.toEqual({ delivery: {}, local: {} });
    expect(console.warn).toHaveBeenCalledWith(
      '[relay] could not read cache tables from postgres, starting empty: connection refused',
    );
  });

  it('wraps write errors in PersistenceFailure', async () => {
    db.failWith = new Error('disk full');
    const store = new PostgresPersistentStore(db);

    await expect(store.save('local', {})).rejects.toBeInstanceOf(PersistenceFailure);
  });
});
