import type { PersistentStore } from '../providers/persistence/types.js';
import type { DeliveryQueuePayload } from '../queue/constants.js';

export interface DeliveryJobQueue {
  enqueue(payload: DeliveryQueuePayload): Promise<string>;
  ping(): Promise<string>;
}

export interface AppContext {
  jobQueue: DeliveryJobQueue;
  store: PersistentStore;
  artifactsDir: string;
}
