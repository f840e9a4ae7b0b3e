import type {
  ChatId,
  CollectionItem,
  ContentKey,
  LocalRetentionPolicy,
  MediaFile,
  MediaSource,
  Messenger,
  ResolveOutcome,
} from '../types/relay.js';
import { artifactPathForKey, ensureArtifactsDir, removeArtifact, removeArtifactsForKey } from './artifacts.js';
import type { DeliveryCache } from './deliveryCache.js';
import { RelayError, TransientFetchFailure, errorMessage } from './errors.js';
import type { Limiter } from './limiter.js';
import type { LocalArtifactCache } from './localArtifactCache.js';

export interface OrchestratorDeps {
  deliveryCache: DeliveryCache;
  localCache: LocalArtifactCache;
  mediaSource: MediaSource;
  fetchPool: Limiter;
  artifactsDir: string;
  retention?: LocalRetentionPolicy;
  attribution?: string;
  now?: () => number;
}

/**
 * Resolves one content key: delivery cache, then local artifact cache, then a
 * fetch through the media source. Stages run strictly in that order and the
 * first success wins.
 */
export class FetchAndDeliverOrchestrator {
  private readonly inflight = new Map<ContentKey, Promise<ResolveOutcome>>();
  private readonly retention: LocalRetentionPolicy;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.retention = deps.retention ?? 'ttl';
    this.now = deps.now ?? Date.now;
  }

  isCached(key: ContentKey): boolean {
    return this.deps.deliveryCache.has(key) || this.deps.localCache.has(key);
  }

  /** Both reuse paths only; `null` means neither could deliver. */
  async resolveCached(
    key: ContentKey,
    messenger: Messenger,
    destination: ChatId,
  ): Promise<ResolveOutcome | null> {
    const { deliveryCache, localCache } = this.deps;

    const deliveryEntry = deliveryCache.lookup(key);
    if (deliveryEntry) {
      const attempt = await deliveryCache.tryDeliver(key, deliveryEntry, messenger, destination);
      if (attempt.kind === 'delivered') return { kind: 'delivery-cache', via: 'forward' };
      if (attempt.kind === 'delivered-via-fallback') return { kind: 'delivery-cache', via: 'blob' };
    }

    const localEntry = await localCache.lookup(key, this.now());
    if (localEntry) {
      const receipt = await localCache.tryDeliver(key, localEntry, messenger, destination, {
        attribution: this.deps.attribution,
      });
      if (receipt) {
        await deliveryCache.put(key, {
          contentKey: key,
          blobHandle: receipt.blobHandle,
          origin: receipt.origin,
          title: localEntry.title,
        });
        if (this.retention === 'deliver-once') {
          await localCache.evict(key);
        }
        return { kind: 'local-cache' };
      }
    }

    return null;
  }

  async resolve(key: ContentKey, messenger: Messenger, destination: ChatId): Promise<ResolveOutcome> {
    const cached = await this.resolveCached(key, messenger, destination);
    if (cached) return cached;

    // A fetch for the same key is already running: wait for it and reuse its result.
    const pending = this.inflight.get(key);
    if (pending) {
      await pending;
      const reused = await this.resolveCached(key, messenger, destination);
      if (reused) return reused;
    }

    const run: Promise<ResolveOutcome> = this.fetchAndDeliver(key, messenger, destination).finally(() => {
      if (this.inflight.get(key) === run) this.inflight.delete(key);
    });
    this.inflight.set(key, run);
    return run;
  }

  listCollection(key: ContentKey): Promise<CollectionItem[]> {
    return this.deps.fetchPool.run(() => this.deps.mediaSource.listCollection(key));
  }

  private async fetchAndDeliver(
    key: ContentKey,
    messenger: Messenger,
    destination: ChatId,
  ): Promise<ResolveOutcome> {
    const { deliveryCache, localCache, mediaSource, fetchPool, artifactsDir } = this.deps;
    const outputPath = artifactPathForKey(artifactsDir, key);
    let media: MediaFile | null = null;

    try {
      await ensureArtifactsDir(artifactsDir);
      media = await fetchPool.run(() => mediaSource.fetchMedia(key, { outputPath }));
      const fetched = media;

      const receipt = await messenger.sendAudio(
        destination,
        { kind: 'file', path: fetched.filePath },
        {
          title: fetched.title,
          durationSeconds: fetched.durationSeconds,
          attribution: this.deps.attribution,
        },
      );

      await localCache.put(key, {
        contentKey: key,
        filePath: fetched.filePath,
        createdAtMs: this.now(),
        title: fetched.title,
        durationSeconds: fetched.durationSeconds,
      });
      await deliveryCache.put(key, {
        contentKey: key,
        blobHandle: receipt.blobHandle,
        origin: receipt.origin,
        title: fetched.title,
      });

      console.log(`[relay] fetched and delivered key=${key} title=${JSON.stringify(fetched.title)}`);
      return { kind: 'fetched' };
    } catch (error) {
      const failure = error instanceof RelayError ? error : new TransientFetchFailure(errorMessage(error), error);
      console.error(`[relay] fetch-and-deliver failed key=${key} code=${failure.code} error=${failure.message}`);
      await this.cleanupPartial(key, [outputPath, media?.filePath]);
      return { kind: 'failed', reason: failure.message };
    }
  }

  private async cleanupPartial(key: ContentKey, paths: Array<string | undefined>): Promise<void> {
    for (const path of new Set(paths)) {
      if (!path) continue;
      try {
        await removeArtifact(path);
      } catch (error) {
        console.warn(`[relay] could not remove partial artifact key=${key} error=${errorMessage(error)}`);
      }
    }
    try {
      await removeArtifactsForKey(this.deps.artifactsDir, key);
    } catch (error) {
      console.warn(`[relay] could not remove partial artifacts key=${key} error=${errorMessage(error)}`);
    }
  }
}
