import type { ChatId, ContentKey } from '../types/relay.js';

export const DELIVERY_QUEUE_NAME = 'relay-deliveries';

export type DeliveryQueuePayload =
  | { chatId: ChatId; key: ContentKey }
  | { chatId: ChatId; keys: ContentKey[] }
  | { chatId: ChatId; collection: ContentKey };
