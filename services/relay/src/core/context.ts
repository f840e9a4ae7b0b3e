import type { PersistentStore } from '../providers/persistence/types.js';
import type { LocalRetentionPolicy, MediaSource } from '../types/relay.js';
import { BatchCoordinator } from './batch.js';
import { DeliveryCache } from './deliveryCache.js';
import { Limiter } from './limiter.js';
import { LocalArtifactCache } from './localArtifactCache.js';
import { FetchAndDeliverOrchestrator } from './orchestrator.js';

export interface RelayContextOptions {
  store: PersistentStore;
  mediaSource: MediaSource;
  artifactsDir: string;
  localTtlMs: number;
  retention?: LocalRetentionPolicy;
  fetchPoolSize?: number;
  batchMaxConcurrent?: number;
  batchProgressEvery?: number;
  attribution?: string;
  now?: () => number;
}

export interface RelayContext {
  store: PersistentStore;
  deliveryCache: DeliveryCache;
  localCache: LocalArtifactCache;
  fetchPool: Limiter;
  orchestrator: FetchAndDeliverOrchestrator;
  batch: BatchCoordinator;
  /** Replaces both in-memory tables with the durable copies. */
  reload(): Promise<void>;
}

export const DEFAULT_FETCH_POOL_SIZE = 4;

export async function createRelayContext(options: RelayContextOptions): Promise<RelayContext> {
  const { store } = options;
  const tables = await store.load();

  const deliveryCache = new DeliveryCache(store, tables.delivery);
  const localCache = new LocalArtifactCache(store, { ttlMs: options.localTtlMs, rows: tables.local });
  const fetchPool = new Limiter(options.fetchPoolSize ?? DEFAULT_FETCH_POOL_SIZE);
  const orchestrator = new FetchAndDeliverOrchestrator({
    deliveryCache,
    localCache,
    mediaSource: options.mediaSource,
    fetchPool,
    artifactsDir: options.artifactsDir,
    retention: options.retention,
    attribution: options.attribution,
    now: options.now,
  });
  const batch = new BatchCoordinator(orchestrator, {
    maxConcurrent: options.batchMaxConcurrent,
    progressEvery: options.batchProgressEvery,
  });

  return {
    store,
    deliveryCache,
    localCache,
    fetchPool,
    orchestrator,
    batch,
    async reload() {
      const fresh = await store.load();
      await deliveryCache.replaceAll(fresh.delivery);
      await localCache.replaceAll(fresh.local);
    },
  };
}
