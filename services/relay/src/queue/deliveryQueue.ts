import { Queue } from 'bullmq';
import { randomUUID } from 'crypto';
import { createRedisConnectionOptions } from './connection.js';
import { DELIVERY_QUEUE_NAME, type DeliveryQueuePayload } from './constants.js';

export class DeliveryQueue {
  private readonly queue: Queue<DeliveryQueuePayload, void, string>;

  constructor() {
    this.queue = new Queue<DeliveryQueuePayload, void, string>(DELIVERY_QUEUE_NAME, {
      connection: createRedisConnectionOptions('api'),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 3600, count: 2000 },
        removeOnFail: { age: 24 * 3600, count: 5000 },
      },
    });
  }

  async enqueue(payload: DeliveryQueuePayload): Promise<string> {
    const jobId = `dlv_${randomUUID()}`;
    await this.queue.add('deliver', payload, { jobId });
    return jobId;
  }

  async ping(): Promise<string> {
    const client = await this.queue.client;
    return client.ping();
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
