import { spawn } from 'child_process';
import { extname } from 'path';
import { truncateTitle } from '../../core/artifacts.js';
import type {
  CollectionItem,
  ContentKey,
  FetchMediaOptions,
  MediaFile,
  MediaSource,
} from '../../types/relay.js';

const MAX_STDERR_CHARS = 8192;

export function watchUrl(key: ContentKey): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(key)}`;
}

export function playlistUrl(key: ContentKey): string {
  return `https://www.youtube.com/playlist?list=${encodeURIComponent(key)}`;
}

/** yt-dlp picks the final extension itself; hand it a template ending in `%(ext)s`. */
export function outputTemplate(outputPath: string): string {
  const extension = extname(outputPath);
  const stem = extension ? outputPath.slice(0, -extension.length) : outputPath;
  return `${stem}.%(ext)s`;
}

export function buildDownloadArgs(key: ContentKey, outputPath: string): string[] {
  return [
    '-f',
    'bestaudio[ext=m4a]/bestaudio/best',
    '-x',
    '--audio-format',
    'mp3',
    '--audio-quality',
    '128K',
    '--no-playlist',
    '--no-check-certificates',
    '--socket-timeout',
    '30',
    '--print-json',
    '-o',
    outputTemplate(outputPath),
    watchUrl(key),
  ];
}

export function buildCollectionArgs(key: ContentKey): string[] {
  return ['--flat-playlist', '-J', '--no-check-certificates', '--socket-timeout', '30', playlistUrl(key)];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function durationOf(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

function titleOf(value: unknown): string {
  return truncateTitle(typeof value === 'string' && value.trim() ? value.trim() : 'Unknown');
}

/** `--print-json` writes one JSON document per line; the last one describes the download. */
export function parseDownloadInfo(stdout: string, outputPath: string): MediaFile {
  const lines = stdout.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const last = lines[lines.length - 1];
  if (!last) {
    throw new Error('yt-dlp printed no metadata');
  }

  let info: unknown;
  try {
    info = JSON.parse(last);
  } catch {
    throw new Error('yt-dlp printed metadata that is not JSON');
  }
  if (!isObject(info)) {
    throw new Error('yt-dlp printed metadata that is not an object');
  }

  return {
    title: titleOf(info.title),
    filePath: outputPath,
    durationSeconds: durationOf(info.duration),
  };
}

export function parseCollectionInfo(stdout: string): CollectionItem[] {
  let info: unknown;
  try {
    info = JSON.parse(stdout);
  } catch {
    throw new Error('yt-dlp printed collection info that is not JSON');
  }
  if (!isObject(info) || !Array.isArray(info.entries)) {
    return [];
  }

  const items: CollectionItem[] = [];
  for (const entry of info.entries) {
    if (!isObject(entry) || typeof entry.id !== 'string' || !entry.id) continue;
    items.push({
      key: entry.id,
      title: titleOf(entry.title),
      durationSeconds: durationOf(entry.duration),
    });
  }
  return items;
}

async function runProcessCapture({
  command,
  args,
  errorLabel,
}: {
  command: string;
  args: string[];
  errorLabel: string;
}): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    proc.stdout.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (chunk: string) => {
      if (stderr.length < MAX_STDERR_CHARS) {
        stderr += chunk;
      }
    });

    proc.on('error', (error) => {
      reject(error);
    });

    proc.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : '';
      reject(new Error(`${errorLabel} exited with code ${code}${suffix}`));
    });
  });
}

/**
 * Extracts audio with the yt-dlp binary. There is no timeout: a started
 * extraction runs until the process exits.
 */
export class YtDlpMediaSource implements MediaSource {
  readonly name = 'ytdlp';

  constructor(private readonly binaryPath: string) {}

  async fetchMedia(key: ContentKey, options: FetchMediaOptions): Promise<MediaFile> {
    const stdout = await runProcessCapture({
      command: this.binaryPath,
      args: buildDownloadArgs(key, options.outputPath),
      errorLabel: `yt-dlp (${key})`,
    });
    return parseDownloadInfo(stdout, options.outputPath);
  }

  async listCollection(key: ContentKey): Promise<CollectionItem[]> {
    const stdout = await runProcessCapture({
      command: this.binaryPath,
      args: buildCollectionArgs(key),
      errorLabel: `yt-dlp collection (${key})`,
    });
    return parseCollectionInfo(stdout);
  }
}
