import { Worker } from 'bullmq';
import { config, dbSettings } from './config.js';
import { createRelayContext } from './core/context.js';
import { processDeliveryJob } from './core/deliveryProcessor.js';
import { errorMessage } from './core/errors.js';
import { startExpirySweepLoop } from './core/sweeper.js';
import { createDb, type Db } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createMediaSource } from './providers/media/index.js';
import { createMessenger } from './providers/messenger/index.js';
import { createPersistentStore } from './providers/persistence/index.js';
import { createRedisConnectionOptions } from './queue/connection.js';
import { DELIVERY_QUEUE_NAME, type DeliveryQueuePayload } from './queue/constants.js';

async function main() {
  let db: Db | null = null;
  if (config.persistenceBackend === 'postgres') {
    db = createDb(dbSettings());
    await initializeSchema(db);
  }

  const messenger = createMessenger();
  const mediaSource = createMediaSource();
  const relay = await createRelayContext({
    store: createPersistentStore(db),
    mediaSource,
    artifactsDir: config.artifactsDir,
    localTtlMs: config.localCacheTtlMs,
    retention: config.localRetention,
    fetchPoolSize: config.fetchPoolSize,
    batchMaxConcurrent: config.batchMaxConcurrent,
    batchProgressEvery: config.batchProgressEvery,
    attribution: config.audioAttribution || undefined,
  });
  const sweeper = startExpirySweepLoop({
    cache: relay.localCache,
    intervalMs: config.sweepIntervalMs,
  });

  const worker = new Worker<DeliveryQueuePayload>(
    DELIVERY_QUEUE_NAME,
    async (job) => {
      const result = await processDeliveryJob(job.data, {
        orchestrator: relay.orchestrator,
        batch: relay.batch,
        messenger,
      });
      console.log(
        `[relay-worker] done job_id=${job.id ?? 'unknown'} delivered=${result.delivered.length} failed=${result.failed.length}`,
      );
    },
    {
      connection: createRedisConnectionOptions('worker'),
      concurrency: config.maxConcurrentJobs,
    },
  );

  worker.on('ready', () => {
    console.log(
      `[relay-worker] ready queue=${DELIVERY_QUEUE_NAME} media_source=${mediaSource.name} messenger=${messenger.name} concurrency=${config.maxConcurrentJobs}`,
    );
    console.log(
      `[relay-worker] persistence=${relay.store.name} delivery_entries=${relay.deliveryCache.size} local_entries=${relay.localCache.size}`,
    );
  });
  worker.on('failed', (job, error) => {
    console.error(`[relay-worker] failed job_id=${job?.id ?? 'unknown'} error=${errorMessage(error)}`);
  });

  const shutdown = async () => {
    sweeper.stop();
    await worker.close();
    await db?.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

main().catch((error) => {
  console.error('[relay-worker] fatal startup error', error);
  process.exit(1);
});
