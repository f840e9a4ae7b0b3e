import type { PersistentStore } from '../providers/persistence/types.js';
import type {
  ChatId,
  ContentKey,
  DeliveryReceipt,
  LocalArtifactEntry,
  LocalTable,
  Messenger,
} from '../types/relay.js';
import { artifactExists, removeArtifact } from './artifacts.js';
import { CacheTable } from './cacheTable.js';
import { errorMessage } from './errors.js';

export interface LocalArtifactCacheOptions {
  ttlMs: number;
  rows?: LocalTable;
}

export function isExpired(entry: LocalArtifactEntry, now: number, ttlMs: number): boolean {
  return now - entry.createdAtMs >= ttlMs;
}

/**
 * Content key -> materialized artifact on local disk. An entry counts only
 * while its file exists and it is younger than the TTL; anything else is
 * evicted on the read path.
 */
export class LocalArtifactCache extends CacheTable<LocalArtifactEntry> {
  readonly ttlMs: number;

  constructor(private readonly store: PersistentStore, options: LocalArtifactCacheOptions) {
    super('local', options.rows);
    this.ttlMs = options.ttlMs;
  }

  async lookup(key: ContentKey, now = Date.now()): Promise<LocalArtifactEntry | null> {
    const entry = this.current(key);
    if (!entry) return null;

    if (!artifactExists(entry.filePath)) {
      console.warn(`[relay] local artifact missing key=${key} path=${entry.filePath}`);
      await this.drop([[key, entry]]);
      return null;
    }
    if (isExpired(entry, now, this.ttlMs)) {
      await this.drop([[key, entry]]);
      return null;
    }
    return entry;
  }

  async evict(key: ContentKey): Promise<boolean> {
    const entry = this.current(key);
    if (!entry) return false;
    return (await this.drop([[key, entry]])) > 0;
  }

  async tryDeliver(
    key: ContentKey,
    entry: LocalArtifactEntry,
    messenger: Messenger,
    destination: ChatId,
    options: { attribution?: string } = {},
  ): Promise<DeliveryReceipt | null> {
    try {
      const receipt = await messenger.sendAudio(
        destination,
        { kind: 'file', path: entry.filePath },
        {
          title: entry.title,
          durationSeconds: entry.durationSeconds,
          attribution: options.attribution,
        },
      );
      console.log(`[relay] delivered key=${key} via=local-file`);
      return receipt;
    } catch (error) {
      console.warn(`[relay] local artifact send failed key=${key} error=${errorMessage(error)}`);
      await this.drop([[key, entry]]);
      return null;
    }
  }

  /** Full scan; one durable write at the end when anything was removed. */
  async evictExpired(now: number, ttlMs = this.ttlMs): Promise<number> {
    const expired = Object.entries(this.rows).filter(([, entry]) => isExpired(entry, now, ttlMs));
    if (expired.length === 0) return 0;
    return this.drop(expired);
  }

  protected save(rows: LocalTable): Promise<void> {
    return this.store.save('local', rows);
  }

  private async drop(entries: Array<[ContentKey, LocalArtifactEntry]>): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let removed = 0;
      for (const [key, entry] of entries) {
        if (!this.removeRow(key, entry)) continue;
        removed += 1;
        try {
          await removeArtifact(entry.filePath);
        } catch (error) {
          console.warn(`[relay] could not delete artifact key=${key} error=${errorMessage(error)}`);
        }
      }
      if (removed > 0) {
        await this.persist();
      }
      return removed;
    });
  }
}
