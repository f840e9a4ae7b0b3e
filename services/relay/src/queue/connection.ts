import type { ConnectionOptions } from 'bullmq';
import { config } from '../config.js';

/** The worker blocks on redis, so bullmq needs unlimited retries there. */
export function createRedisConnectionOptions(kind: 'api' | 'worker'): ConnectionOptions {
  return {
    url: config.redisUrl,
    maxRetriesPerRequest: kind === 'worker' ? null : 1,
    enableReadyCheck: true,
  };
}
