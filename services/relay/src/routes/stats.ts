import { Router } from 'express';
import { errorMessage } from '../core/errors.js';
import type { AppContext } from '../types/appContext.js';

export function createStatsRouter(ctx: AppContext): Router {
  const router = Router();

  // The worker owns the live tables; this reads the durable copies.
  router.get('/stats', async (_req, res) => {
    try {
      const tables = await ctx.store.load();
      res.json({
        persistence: ctx.store.name,
        delivery_cache: { entries: Object.keys(tables.delivery).length },
        local_cache: {
          entries: Object.keys(tables.local).length,
          artifacts_dir: ctx.artifactsDir,
        },
      });
    } catch (error) {
      res.status(500).json({
        error: {
          code: 'STATS_FAILED',
          message: errorMessage(error, 'Failed to read cache stats'),
        },
      });
    }
  });

  return router;
}
