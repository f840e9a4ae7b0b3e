import 'dotenv/config';
import { resolve } from 'path';
import type { DbSettings } from './db/client.js';
import type { LocalRetentionPolicy } from './types/relay.js';

const DEFAULT_PORT = 3020;

type MediaSourceName = 'mock' | 'ytdlp';
type PersistenceBackend = 'file' | 'postgres';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = (process.env[name] || '').trim();
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${raw}")`);
  }
  return match;
}

const port = intFromEnv('PORT', DEFAULT_PORT);

export const config = {
  port,
  publicBaseUrl: process.env.PUBLIC_BASE_URL || `http://localhost:${port}`,
  masterApiKey: process.env.MASTER_API_KEY || '',
  botToken: process.env.BOT_TOKEN || '',
  botApiBase: process.env.BOT_API_BASE || 'https://api.telegram.org',
  redisUrl: process.env.REDIS_URL || '',
  databaseUrl: process.env.DATABASE_URL || '',
  dbHost: process.env.PGHOST || '',
  dbPort: intFromEnv('PGPORT', 5432),
  dbUser: process.env.PGUSER || '',
  dbPassword: process.env.PGPASSWORD || '',
  dbName: process.env.PGDATABASE || '',
  dbSsl: boolFromEnv('DB_SSL', true),
  persistenceBackend: oneOf<PersistenceBackend>('PERSISTENCE_BACKEND', ['file', 'postgres'], 'file'),
  dataDir: resolve(process.cwd(), process.env.DATA_DIR || 'data'),
  artifactsDir: resolve(process.cwd(), process.env.ARTIFACTS_DIR || 'data/audio'),
  localCacheTtlMs: intFromEnv('LOCAL_CACHE_TTL_HOURS', 1) * 60 * 60 * 1000,
  localRetention: oneOf<LocalRetentionPolicy>('LOCAL_RETENTION', ['ttl', 'deliver-once'], 'ttl'),
  sweepIntervalMs: intFromEnv('SWEEP_INTERVAL_MS', 10 * 60 * 1000),
  maxConcurrentJobs: intFromEnv('MAX_CONCURRENT_JOBS', 2),
  fetchPoolSize: intFromEnv('FETCH_POOL_SIZE', 4),
  batchMaxConcurrent: intFromEnv('BATCH_MAX_CONCURRENT', 5),
  batchProgressEvery: intFromEnv('BATCH_PROGRESS_EVERY', 3),
  mediaSource: oneOf<MediaSourceName>('MEDIA_SOURCE', ['mock', 'ytdlp'], 'mock'),
  ytDlpPath: process.env.YT_DLP_PATH || 'yt-dlp',
  audioPerformer: process.env.AUDIO_PERFORMER || '',
  audioAttribution: process.env.AUDIO_ATTRIBUTION || '',
} as const;

export function dbSettings(): DbSettings {
  return {
    databaseUrl: config.databaseUrl,
    host: config.dbHost,
    port: config.dbPort,
    user: config.dbUser,
    password: config.dbPassword,
    database: config.dbName,
    ssl: config.dbSsl,
  };
}

if (!config.redisUrl) {
  throw new Error('REDIS_URL is required');
}

if (config.persistenceBackend === 'postgres' && !config.databaseUrl && !(config.dbHost && config.dbUser && config.dbName)) {
  throw new Error('DATABASE_URL or PGHOST/PGUSER/PGDATABASE is required when PERSISTENCE_BACKEND=postgres');
}
