import { errorMessage } from './errors.js';
import type { LocalArtifactCache } from './localArtifactCache.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 10 * 60 * 1000;

export interface ExpirySweepLoop {
  stop: () => void;
  sweepNow: () => Promise<number>;
}

export function startExpirySweepLoop(options: {
  cache: LocalArtifactCache;
  ttlMs?: number;
  intervalMs?: number;
  now?: () => number;
}): ExpirySweepLoop {
  const { cache } = options;
  const ttlMs = options.ttlMs ?? cache.ttlMs;
  const now = options.now ?? Date.now;

  const sweepNow = async (): Promise<number> => {
    try {
      const deleted = await cache.evictExpired(now(), ttlMs);
      if (deleted > 0) {
        console.log(`[relay] swept ${deleted} expired artifacts`);
      }
      return deleted;
    } catch (error) {
      console.error(`[relay] artifact sweep failed error=${errorMessage(error)}`);
      return 0;
    }
  };

  const timer = setInterval(() => {
    void sweepNow();
  }, options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
  timer.unref();

  return {
    stop: () => clearInterval(timer),
    sweepNow,
  };
}
