import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { CorruptState, PersistenceFailure, errorMessage } from '../../core/errors.js';
import type { CacheTables, TableName } from '../../types/relay.js';
import { parseTableDocument, toTableDocument } from './records.js';
import type { PersistentStore } from './types.js';

const FILE_NAMES: Record<TableName, string> = {
  delivery: 'delivery-cache.json',
  local: 'local-cache.json',
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FilePersistentStore implements PersistentStore {
  readonly name = 'file';

  constructor(private readonly directory: string) {}

  pathFor(table: TableName): string {
    return join(this.directory, FILE_NAMES[table]);
  }

  async load(): Promise<CacheTables> {
    return {
      delivery: await this.loadTable('delivery'),
      local: await this.loadTable('local'),
    };
  }

  async save<K extends TableName>(table: K, rows: CacheTables[K]): Promise<void> {
    const path = this.pathFor(table);
    const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(toTableDocument<CacheTables[TableName][string]>(rows), null, 2));
      await rename(tmpPath, path);
    } catch (error) {
      throw new PersistenceFailure(`Failed to write ${table} cache to ${path}: ${errorMessage(error)}`, error);
    }
  }

  private async loadTable<K extends TableName>(table: K): Promise<CacheTables[K]> {
    const path = this.pathFor(table);
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        console.warn(`[relay] could not read ${table} cache at ${path}, starting empty: ${errorMessage(error)}`);
      }
      return parseTableDocument(table, toTableDocument({}));
    }

    try {
      return parseTableDocument(table, JSON.parse(raw));
    } catch (error) {
      const corrupt = error instanceof CorruptState ? error : new CorruptState(errorMessage(error), error);
      console.warn(`[relay] ${corrupt.message} (${path}), starting empty`);
      return parseTableDocument(table, toTableDocument({}));
    }
  }
}
