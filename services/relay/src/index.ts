import express from 'express';
import { config, dbSettings } from './config.js';
import { createDb, type Db } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createMasterApiKeyMiddleware } from './middleware/masterApiKey.js';
import { createPersistentStore } from './providers/persistence/index.js';
import { DeliveryQueue } from './queue/deliveryQueue.js';
import { createDeliveriesRouter } from './routes/deliveries.js';
import { createHealthRouter } from './routes/health.js';
import { createStatsRouter } from './routes/stats.js';
import type { AppContext } from './types/appContext.js';

async function main() {
  let db: Db | null = null;
  if (config.persistenceBackend === 'postgres') {
    db = createDb(dbSettings());
    await initializeSchema(db);
  }

  const queue = new DeliveryQueue();
  const appCtx: AppContext = {
    jobQueue: queue,
    store: createPersistentStore(db),
    artifactsDir: config.artifactsDir,
  };

  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.use(createHealthRouter(appCtx));
  app.use(createMasterApiKeyMiddleware(config.masterApiKey), createStatsRouter(appCtx));
  app.use(createMasterApiKeyMiddleware(config.masterApiKey), createDeliveriesRouter(appCtx));

  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.path} not found`,
      },
    });
  });

  const server = app.listen(config.port, () => {
    console.log(`[relay] listening on ${config.publicBaseUrl}`);
    console.log(`[relay] persistence=${appCtx.store.name} queue=redis worker_mode=external`);
    console.log(`[relay] artifacts_dir=${config.artifactsDir}`);
  });

  const shutdown = () => {
    server.close(async () => {
      await queue.close();
      await db?.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[relay] fatal startup error', error);
  process.exit(1);
});
