import { Router } from 'express';
import { errorMessage } from '../core/errors.js';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const redisPing = await ctx.jobQueue.ping();

      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        persistence: ctx.store.name,
        queue: {
          backend: 'redis',
          redis_ping: redisPing,
        },
      });
    } catch (error) {
      res.status(500).json({
        status: 'error',
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message: errorMessage(error, 'Health check failed'),
        },
      });
    }
  });

  return router;
}
