import { writeFile } from 'fs/promises';
import type {
  CollectionItem,
  ContentKey,
  FetchMediaOptions,
  MediaFile,
  MediaSource,
} from '../../types/relay.js';

const MOCK_COLLECTION_SIZE = 4;

/** Writes a placeholder file after a short delay; for local runs without yt-dlp. */
export class MockMediaSource implements MediaSource {
  readonly name = 'mock';

  constructor(private readonly latencyMs = 300) {}

  async fetchMedia(key: ContentKey, options: FetchMediaOptions): Promise<MediaFile> {
    await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    await writeFile(options.outputPath, Buffer.from(`MOCK_AUDIO::${key}`, 'utf8'));

    return {
      title: `Mock track ${key}`,
      filePath: options.outputPath,
      durationSeconds: 120,
    };
  }

  async listCollection(key: ContentKey): Promise<CollectionItem[]> {
    return Array.from({ length: MOCK_COLLECTION_SIZE }, (_, index) => ({
      key: `${key}-${index + 1}`,
      title: `Mock track ${key}-${index + 1}`,
      durationSeconds: 120,
    }));
  }
}
