import type { DeliveryQueuePayload } from '../queue/constants.js';
import type { ChatId, CollectionItem, ContentKey, MessageHandle, Messenger } from '../types/relay.js';
import type { BatchCoordinator, BatchReport } from './batch.js';
import { errorMessage } from './errors.js';
import type { FetchAndDeliverOrchestrator } from './orchestrator.js';

export const STATUS_TEXT = {
  downloading: '⏳ Downloading...',
  listing: '⏳ Fetching collection info...',
  empty: '❌ No tracks found',
  genericFailure: '❌ Error occurred. Please try again.',
} as const;

export function summaryText(total: number, cached: number, misses: number): string {
  return `⏳ Found ${total} tracks\n⚡ Cached: ${cached}\n⬇️ To download: ${misses}`;
}

export function progressText(completed: number, total: number): string {
  return `⬇️ Downloaded ${completed}/${total}`;
}

export function failureNotice(title: string): string {
  return `❌ Could not deliver: ${title}`;
}

interface DeliveryProcessorDeps {
  orchestrator: FetchAndDeliverOrchestrator;
  batch: BatchCoordinator;
  messenger: Messenger;
}

export interface DeliveryJobResult {
  delivered: ContentKey[];
  failed: ContentKey[];
}

export async function processDeliveryJob(
  payload: DeliveryQueuePayload,
  deps: DeliveryProcessorDeps,
): Promise<DeliveryJobResult> {
  if ('key' in payload) {
    return deliverSingle(payload.chatId, payload.key, deps);
  }
  if ('keys' in payload) {
    return deliverMany(payload.chatId, payload.keys, new Map(), undefined, deps);
  }
  return deliverCollection(payload.chatId, payload.collection, deps);
}

async function deliverSingle(
  chatId: ChatId,
  key: ContentKey,
  deps: DeliveryProcessorDeps,
): Promise<DeliveryJobResult> {
  const { orchestrator, messenger } = deps;

  const cached = await orchestrator.resolveCached(key, messenger, chatId);
  if (cached) {
    return { delivered: [key], failed: [] };
  }

  const status = await sendStatus(messenger, chatId, STATUS_TEXT.downloading);
  const outcome = await orchestrator.resolve(key, messenger, chatId);
  if (outcome.kind === 'failed') {
    await editStatus(messenger, status, STATUS_TEXT.genericFailure);
    return { delivered: [], failed: [key] };
  }

  await deleteStatus(messenger, status);
  return { delivered: [key], failed: [] };
}

async function deliverCollection(
  chatId: ChatId,
  collection: ContentKey,
  deps: DeliveryProcessorDeps,
): Promise<DeliveryJobResult> {
  const status = await sendStatus(deps.messenger, chatId, STATUS_TEXT.listing);

  let items: CollectionItem[];
  try {
    items = await deps.orchestrator.listCollection(collection);
  } catch (error) {
    console.error(`[relay] collection listing failed collection=${collection} error=${errorMessage(error)}`);
    await editStatus(deps.messenger, status, STATUS_TEXT.genericFailure);
    return { delivered: [], failed: [] };
  }

  const titles = new Map(items.map((item) => [item.key, item.title]));
  return deliverMany(
    chatId,
    items.map((item) => item.key),
    titles,
    status,
    deps,
  );
}

async function deliverMany(
  chatId: ChatId,
  keys: ContentKey[],
  titles: Map<ContentKey, string>,
  listingStatus: MessageHandle | null | undefined,
  deps: DeliveryProcessorDeps,
): Promise<DeliveryJobResult> {
  const { batch, messenger } = deps;

  if (keys.length === 0) {
    await showStatus(messenger, chatId, listingStatus, STATUS_TEXT.empty);
    return { delivered: [], failed: [] };
  }

  const { cached, misses } = batch.partition(keys);
  const status = await showStatus(
    messenger,
    chatId,
    listingStatus,
    summaryText(keys.length, cached.length, misses.length),
  );

  const report: BatchReport = await batch.run({
    keys,
    messenger,
    destination: chatId,
    onProgress: ({ completed, total }) => editStatus(messenger, status, progressText(completed, total)),
  });

  for (const { key } of report.failed) {
    try {
      await messenger.sendText(chatId, failureNotice(titles.get(key) ?? key));
    } catch (error) {
      console.warn(`[relay] failure notice not sent key=${key} error=${errorMessage(error)}`);
    }
  }

  await deleteStatus(messenger, status);
  console.log(
    `[relay] batch done chat_id=${chatId} total=${report.total} delivered=${report.delivered.length} failed=${report.failed.length}`,
  );
  return { delivered: report.delivered, failed: report.failed.map(({ key }) => key) };
}

/** Edits the status message when one exists (`undefined` means none was sent yet). */
async function showStatus(
  messenger: Messenger,
  chatId: ChatId,
  status: MessageHandle | null | undefined,
  text: string,
): Promise<MessageHandle | null> {
  if (status === undefined) return sendStatus(messenger, chatId, text);
  await editStatus(messenger, status, text);
  return status;
}

async function sendStatus(messenger: Messenger, chatId: ChatId, text: string): Promise<MessageHandle | null> {
  try {
    return await messenger.sendText(chatId, text);
  } catch (error) {
    console.warn(`[relay] status message not sent chat_id=${chatId} error=${errorMessage(error)}`);
    return null;
  }
}

async function editStatus(messenger: Messenger, status: MessageHandle | null, text: string): Promise<void> {
  if (!status) return;
  try {
    await messenger.editText(status, text);
  } catch (error) {
    console.warn(`[relay] status edit failed message_id=${status.messageId} error=${errorMessage(error)}`);
  }
}

async function deleteStatus(messenger: Messenger, status: MessageHandle | null): Promise<void> {
  if (!status) return;
  try {
    await messenger.deleteText(status);
  } catch (error) {
    console.warn(`[relay] status delete failed message_id=${status.messageId} error=${errorMessage(error)}`);
  }
}
