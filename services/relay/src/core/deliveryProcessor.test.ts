import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeMediaSource, FakeMessenger, MemoryPersistentStore } from '../testing/fakes.js';
import { createRelayContext, type RelayContext } from './context.js';
import { STATUS_TEXT, processDeliveryJob } from './deliveryProcessor.js';

const CHAT = 42;

describe('processDeliveryJob', () => {
  let dir: string;
  let store: MemoryPersistentStore;
  let messenger: FakeMessenger;
  let source: FakeMediaSource;

  async function buildContext(batchProgressEvery?: number): Promise<RelayContext> {
    return createRelayContext({
      store,
      mediaSource: source,
      artifactsDir: dir,
      localTtlMs: 60 * 60 * 1000,
      batchProgressEvery,
    });
  }

  async function run(ctx: RelayContext, payload: Parameters<typeof processDeliveryJob>[0]) {
    return processDeliveryJob(payload, { orchestrator: ctx.orchestrator, batch: ctx.batch, messenger });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-processor-'));
    store = new MemoryPersistentStore();
    messenger = new FakeMessenger();
    source = new FakeMediaSource();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('single key', () => {
    it('delivers a cached key without any status message', async () => {
      store = new MemoryPersistentStore({
        delivery: {
          k1: { contentKey: 'k1', blobHandle: 'blob-9', origin: { chatId: 7, messageId: 9 }, title: 'K1' },
        },
      });
      const ctx = await buildContext();

      await expect(run(ctx, { chatId: CHAT, key: 'k1' })).resolves.toEqual({ delivered: ['k1'], failed: [] });
      expect(messenger.calls).toEqual([
        { method: 'forward', destination: CHAT, origin: { chatId: 7, messageId: 9 } },
      ]);
    });

    it('shows a download status for a miss and removes it afterwards', async () => {
      const ctx = await buildContext();

      await expect(run(ctx, { chatId: CHAT, key: 'k1' })).resolves.toEqual({ delivered: ['k1'], failed: [] });
      expect(messenger.calls.map((call) => call.method)).toEqual(['sendText', 'sendAudio', 'deleteText']);
      expect(messenger.calls[0]).toEqual({ method: 'sendText', destination: CHAT, text: STATUS_TEXT.downloading });
      expect(messenger.calls[2]).toEqual({ method: 'deleteText', handle: { chatId: CHAT, messageId: 101 } });
    });

    it('turns the status into the generic failure notice when the fetch fails', async () => {
      const ctx = await buildContext();
      source.failures.add('k1');

      await expect(run(ctx, { chatId: CHAT, key: 'k1' })).resolves.toEqual({ delivered: [], failed: ['k1'] });
      expect(messenger.calls).toEqual([
        { method: 'sendText', destination: CHAT, text: '⏳ Downloading...' },
        { method: 'editText', handle: { chatId: CHAT, messageId: 101 }, text: '❌ Error occurred. Please try again.' },
      ]);
    });
  });

  describe('collection', () => {
    it('reports counts, delivers every track and names the failures', async () => {
      store = new MemoryPersistentStore({
        delivery: {
          a: { contentKey: 'a', blobHandle: 'blob-1', origin: { chatId: 7, messageId: 1 }, title: 'Song A' },
        },
      });
      const ctx = await buildContext();
      source.collections.set('PL1', [
        { key: 'a', title: 'Song A', durationSeconds: 10 },
        { key: 'b', title: 'Song B', durationSeconds: 20 },
        { key: 'c', title: 'Song C', durationSeconds: 30 },
      ]);
      source.failures.add('c');

      const result = await run(ctx, { chatId: CHAT, collection: 'PL1' });

      expect(result).toEqual({ delivered: ['a', 'b'], failed: ['c'] });
      expect(messenger.texts()).toEqual([
        '⏳ Fetching collection info...',
        '⏳ Found 3 tracks\n⚡ Cached: 1\n⬇️ To download: 2',
        '❌ Could not deliver: Song C',
      ]);
      expect(messenger.calls.at(-1)).toEqual({ method: 'deleteText', handle: { chatId: CHAT, messageId: 101 } });
    });

    it('says so when the collection is empty', async () => {
      const ctx = await buildContext();
      source.collections.set('PL0', []);

      await expect(run(ctx, { chatId: CHAT, collection: 'PL0' })).resolves.toEqual({ delivered: [], failed: [] });
      expect(messenger.texts()).toEqual([STATUS_TEXT.listing, STATUS_TEXT.empty]);
    });

    it('shows the generic failure notice when the listing fails', async () => {
      const ctx = await buildContext();

      await expect(run(ctx, { chatId: CHAT, collection: 'missing' })).resolves.toEqual({ delivered: [], failed: [] });
      expect(messenger.texts()).toEqual([STATUS_TEXT.listing, STATUS_TEXT.genericFailure]);
      expect(console.error).toHaveBeenCalledWith(
        '[relay] collection listing failed collection=missing error=unknown collection missing',
      );
    });
  });

  describe('key list', () => {
    it('edits progress into the summary status', async () => {
      const ctx = await buildContext(1);

      const result = await run(ctx, { chatId: CHAT, keys: ['x', 'y'] });

      expect(result.failed).toEqual([]);
      expect([...result.delivered].sort()).toEqual(['x', 'y']);
      expect(messenger.texts()).toEqual([
        '⏳ Found 2 tracks\n⚡ Cached: 0\n⬇️ To download: 2',
        '⬇️ Downloaded 1/2',
        '⬇️ Downloaded 2/2',
      ]);
      expect(messenger.calls.at(-1)).toEqual({ method: 'deleteText', handle: { chatId: CHAT, messageId: 101 } });
    });

    it('keeps delivering when status edits fail', async () => {
      const ctx = await buildContext(1);
      messenger.editFails = true;

      const result = await run(ctx, { chatId: CHAT, keys: ['x'] });
      await new Promise((resolve) => setImmediate(resolve));

      expect(result).toEqual({ delivered: ['x'], failed: [] });
      expect(console.warn).toHaveBeenCalledWith(
        '[relay] status edit failed message_id=101 error=message is not modified',
      );
    });
  });
});
