import type { PersistentStore } from '../providers/persistence/types.js';
import type {
  ChatId,
  ContentKey,
  DeliveryCacheEntry,
  DeliveryTable,
  Messenger,
} from '../types/relay.js';
import { CacheTable } from './cacheTable.js';
import { errorMessage } from './errors.js';

export type DeliveryAttempt =
  | { kind: 'delivered' }
  | { kind: 'delivered-via-fallback' }
  | { kind: 'miss' };

/**
 * Content key -> handles the transport can re-deliver from without uploading
 * anything: the original message (forward) and the stored blob (resend).
 */
export class DeliveryCache extends CacheTable<DeliveryCacheEntry> {
  constructor(private readonly store: PersistentStore, rows: DeliveryTable = {}) {
    super('delivery', rows);
  }

  lookup(key: ContentKey): DeliveryCacheEntry | null {
    return this.current(key);
  }

  async evict(key: ContentKey): Promise<boolean> {
    const entry = this.current(key);
    if (!entry) return false;
    return this.drop(key, entry);
  }

  async tryDeliver(
    key: ContentKey,
    entry: DeliveryCacheEntry,
    messenger: Messenger,
    destination: ChatId,
  ): Promise<DeliveryAttempt> {
    try {
      await messenger.forward(destination, entry.origin);
      console.log(`[relay] delivered key=${key} via=forward`);
      return { kind: 'delivered' };
    } catch (forwardError) {
      console.warn(`[relay] forward failed key=${key} error=${errorMessage(forwardError)}`);
    }

    try {
      await messenger.sendAudio(
        destination,
        { kind: 'blob', blobHandle: entry.blobHandle },
        { title: entry.title },
      );
      console.log(`[relay] delivered key=${key} via=blob`);
      return { kind: 'delivered-via-fallback' };
    } catch (sendError) {
      console.warn(`[relay] blob resend failed key=${key} error=${errorMessage(sendError)}`);
    }

    await this.drop(key, entry);
    return { kind: 'miss' };
  }

  protected save(rows: DeliveryTable): Promise<void> {
    return this.store.save('delivery', rows);
  }

  private async drop(key: ContentKey, entry: DeliveryCacheEntry): Promise<boolean> {
    const removed = this.removeRow(key, entry);
    if (removed) {
      await this.mutex.runExclusive(() => this.persist());
    }
    return removed;
  }
}
