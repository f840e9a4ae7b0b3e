import { createHash } from 'crypto';
import { existsSync } from 'fs';
import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import type { ContentKey } from '../types/relay.js';

export const ARTIFACT_EXTENSION = 'mp3';
const MAX_TITLE_LENGTH = 100;
const MAX_PLAIN_STEM_LENGTH = 100;
const SAFE_KEY = /^[A-Za-z0-9_-]+$/;

/**
 * File stem for `key`. Keys made only of `[A-Za-z0-9_-]` are used as they are;
 * any other key gets a sanitized prefix plus `~` and a digest of the raw key.
 * `~` never appears in a plain stem, so distinct keys never share a stem.
 */
export function safeKey(key: ContentKey): string {
  if (SAFE_KEY.test(key) && key.length <= MAX_PLAIN_STEM_LENGTH) return key;
  const prefix = key.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, MAX_PLAIN_STEM_LENGTH);
  const digest = createHash('sha256').update(key).digest('hex').slice(0, 16);
  return `${prefix}~${digest}`;
}

/** Deterministic location of the materialized artifact for `key`. */
export function artifactPathForKey(directory: string, key: ContentKey): string {
  return join(directory, `${safeKey(key)}.${ARTIFACT_EXTENSION}`);
}

export async function ensureArtifactsDir(directory: string): Promise<void> {
  await mkdir(directory, { recursive: true });
}

export function artifactExists(filePath: string): boolean {
  return existsSync(filePath);
}

export async function removeArtifact(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/** Removes every file named `<stem>.*` for `key`, including downloader leftovers like `.webm.part`. */
export async function removeArtifactsForKey(directory: string, key: ContentKey): Promise<void> {
  const prefix = `${safeKey(key)}.`;
  const names = await readdir(directory).catch((error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  });
  for (const name of names) {
    if (name.startsWith(prefix)) {
      await rm(join(directory, name), { force: true });
    }
  }
}

export function truncateTitle(title: string, maxLength = MAX_TITLE_LENGTH): string {
  return title.length <= maxLength ? title : `${title.slice(0, maxLength - 3)}...`;
}
