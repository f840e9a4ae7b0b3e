import { config } from '../../config.js';
import type { MediaSource } from '../../types/relay.js';
import { MockMediaSource } from './mock.js';
import { YtDlpMediaSource } from './ytdlp.js';

export function createMediaSource(): MediaSource {
  if (config.mediaSource === 'ytdlp') {
    return new YtDlpMediaSource(config.ytDlpPath);
  }

  return new MockMediaSource();
}
