import type { ContentKey, TableName } from '../types/relay.js';
import { errorMessage } from './errors.js';
import { Mutex } from './limiter.js';

/** Copies `rows` into an object without a prototype, so keys like `__proto__` stay plain entries. */
export function tableRows<T>(rows: Record<ContentKey, T> = {}): Record<ContentKey, T> {
  const copy: Record<ContentKey, T> = Object.create(null);
  for (const [key, entry] of Object.entries(rows)) {
    copy[key] = entry;
  }
  return copy;
}

/**
 * In-memory copy of one durable table. Reads and in-memory writes are
 * synchronous; every durable write runs under the table's mutex and its
 * failure is logged rather than raised.
 */
export abstract class CacheTable<T> {
  protected rows: Record<ContentKey, T>;
  protected readonly mutex = new Mutex();

  protected constructor(
    protected readonly table: TableName,
    rows: Record<ContentKey, T> = {},
  ) {
    this.rows = tableRows(rows);
  }

  get size(): number {
    return Object.keys(this.rows).length;
  }

  has(key: ContentKey): boolean {
    return Object.prototype.hasOwnProperty.call(this.rows, key);
  }

  keys(): ContentKey[] {
    return Object.keys(this.rows);
  }

  snapshot(): Record<ContentKey, T> {
    return tableRows(this.rows);
  }

  /** Swaps in a freshly loaded copy of the durable table. */
  async replaceAll(rows: Record<ContentKey, T>): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.rows = tableRows(rows);
    });
  }

  async put(key: ContentKey, entry: T): Promise<void> {
    this.rows[key] = entry;
    await this.mutex.runExclusive(() => this.persist());
  }

  protected abstract save(rows: Record<ContentKey, T>): Promise<void>;

  protected current(key: ContentKey): T | null {
    return this.has(key) ? this.rows[key] : null;
  }

  /** Removes `key` only while it still maps to `entry`, so a newer put survives. */
  protected removeRow(key: ContentKey, entry: T): boolean {
    if (this.current(key) !== entry) return false;
    delete this.rows[key];
    return true;
  }

  protected async persist(): Promise<void> {
    try {
      await this.save(this.snapshot());
    } catch (error) {
      console.error(`[relay] failed to persist ${this.table} cache: ${errorMessage(error)}`);
    }
  }
}
