import { tableRows } from '../../core/cacheTable.js';
import { CorruptState } from '../../core/errors.js';
import type {
  CacheTables,
  DeliveryCacheEntry,
  LocalArtifactEntry,
  TableName,
} from '../../types/relay.js';

export const TABLE_DOCUMENT_VERSION = 1;

export interface TableDocument<T> {
  version: typeof TABLE_DOCUMENT_VERSION;
  entries: Record<string, T>;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChatId(value: unknown): value is number | string {
  return (typeof value === 'number' && Number.isFinite(value)) || (typeof value === 'string' && value.length > 0);
}

function parseDeliveryEntry(key: string, value: unknown): DeliveryCacheEntry | null {
  if (!isObject(value)) return null;
  const origin = value.origin;
  if (!isObject(origin)) return null;
  if (typeof value.blobHandle !== 'string' || value.blobHandle.length === 0) return null;
  if (!isChatId(origin.chatId) || typeof origin.messageId !== 'number') return null;

  return {
    contentKey: key,
    blobHandle: value.blobHandle,
    origin: { chatId: origin.chatId, messageId: origin.messageId },
    title: typeof value.title === 'string' ? value.title : key,
  };
}

function parseLocalEntry(key: string, value: unknown): LocalArtifactEntry | null {
  if (!isObject(value)) return null;
  if (typeof value.filePath !== 'string' || value.filePath.length === 0) return null;
  if (typeof value.createdAtMs !== 'number' || !Number.isFinite(value.createdAtMs)) return null;

  return {
    contentKey: key,
    filePath: value.filePath,
    createdAtMs: value.createdAtMs,
    title: typeof value.title === 'string' ? value.title : key,
    durationSeconds:
      typeof value.durationSeconds === 'number' && Number.isFinite(value.durationSeconds)
        ? value.durationSeconds
        : 0,
  };
}

function readEntries(table: TableName, input: unknown): Record<string, unknown> {
  if (!isObject(input)) {
    throw new CorruptState(`${table} cache document is not an object`);
  }
  if (input.version !== TABLE_DOCUMENT_VERSION) {
    throw new CorruptState(`${table} cache document has unsupported version ${String(input.version)}`);
  }
  if (!isObject(input.entries)) {
    throw new CorruptState(`${table} cache document has no entries map`);
  }
  return input.entries;
}

function parseWith<T>(
  table: TableName,
  input: unknown,
  parseEntry: (key: string, value: unknown) => T | null,
): Record<string, T> {
  const rows = tableRows<T>();
  let dropped = 0;
  for (const [key, value] of Object.entries(readEntries(table, input))) {
    const entry = parseEntry(key, value);
    if (entry) {
      rows[key] = entry;
    } else {
      dropped += 1;
    }
  }
  if (dropped > 0) {
    console.warn(`[relay] dropped ${dropped} malformed ${table} cache entries`);
  }
  return rows;
}

export function parseTableDocument<K extends TableName>(table: K, input: unknown): CacheTables[K];
export function parseTableDocument(table: TableName, input: unknown): CacheTables[TableName] {
  return table === 'delivery'
    ? parseWith(table, input, parseDeliveryEntry)
    : parseWith(table, input, parseLocalEntry);
}

export function toTableDocument<T>(rows: Record<string, T>): TableDocument<T> {
  return { version: TABLE_DOCUMENT_VERSION, entries: rows };
}
