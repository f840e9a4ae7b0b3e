import express from 'express';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { DeliveryQueuePayload } from '../queue/constants.js';
import { MemoryPersistentStore } from '../testing/fakes.js';
import type { DeliveryJobQueue } from '../types/appContext.js';
import { createDeliveriesRouter, parseDeliveryBody } from './deliveries.js';

describe('parseDeliveryBody', () => {
  it('accepts a single key', () => {
    expect(parseDeliveryBody({ chat_id: 42, key: ' abc12345678 ' })).toEqual({
      ok: true,
      value: { chatId: 42, key: 'abc12345678' },
    });
  });

  it('accepts a key list and a collection', () => {
    expect(parseDeliveryBody({ chat_id: '@channel', keys: ['a', 'b'] })).toEqual({
      ok: true,
      value: { chatId: '@channel', keys: ['a', 'b'] },
    });
    expect(parseDeliveryBody({ chat_id: -100, collection: 'PL1' })).toEqual({
      ok: true,
      value: { chatId: -100, collection: 'PL1' },
    });
  });

  it('requires a chat id', () => {
    expect(parseDeliveryBody({ key: 'a' })).toEqual({
      ok: false,
      message: 'chat_id is required and must be an integer or a non-empty string',
    });
    expect(parseDeliveryBody({ chat_id: 1.5, key: 'a' })).toMatchObject({ ok: false });
  });

  it('requires exactly one target field', () => {
    const message = 'Exactly one of key, keys or collection is required';
    expect(parseDeliveryBody({ chat_id: 1 })).toEqual({ ok: false, message });
    expect(parseDeliveryBody({ chat_id: 1, key: 'a', collection: 'b' })).toEqual({ ok: false, message });
  });

  it('rejects empty or malformed keys', () => {
    expect(parseDeliveryBody({ chat_id: 1, key: '  ' })).toEqual({
      ok: false,
      message: 'key must be a non-empty string',
    });
    expect(parseDeliveryBody({ chat_id: 1, keys: [] })).toEqual({
      ok: false,
      message: 'keys must be a non-empty array of strings',
    });
    expect(parseDeliveryBody({ chat_id: 1, keys: ['a', 7] })).toEqual({
      ok: false,
      message: 'keys must be a non-empty array of strings',
    });
    expect(parseDeliveryBody({ chat_id: 1, keys: Array.from({ length: 201 }, (_, i) => `k${i}`) })).toEqual({
      ok: false,
      message: 'keys exceeds max length of 200',
    });
  });

  it('rejects bodies that are not objects', () => {
    expect(parseDeliveryBody('key=a')).toEqual({ ok: false, message: 'Request body must be a JSON object' });
  });
});

class FakeQueue implements DeliveryJobQueue {
  readonly payloads: DeliveryQueuePayload[] = [];
  fails = false;

  async enqueue(payload: DeliveryQueuePayload): Promise<string> {
    if (this.fails) throw new Error('redis down');
    this.payloads.push(payload);
    return `dlv_${this.payloads.length}`;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }
}

describe('POST /v1/deliveries', () => {
  let server: Server;
  let baseUrl: string;
  let queue: FakeQueue;

  beforeEach(async () => {
    queue = new FakeQueue();
    const app = express();
    app.use(express.json());
    app.use(createDeliveriesRouter({ jobQueue: queue, store: new MemoryPersistentStore(), artifactsDir: '/tmp' }));
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function post(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/v1/deliveries`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('queues a valid request', async () => {
    const response = await post({ chat_id: 42, key: 'abc12345678' });

    expect(response.status).toBe(202);
    await expect(response.json()).resolves.toEqual({ job_id: 'dlv_1', status: 'queued' });
    expect(queue.payloads).toEqual([{ chatId: 42, key: 'abc12345678' }]);
  });

  it('answers 400 with the validation message', async () => {
    const response = await post({ chat_id: 42 });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Exactly one of key, keys or collection is required' },
    });
  });

  it('answers 500 when the queue is unavailable', async () => {
    queue.fails = true;

    const response = await post({ chat_id: 42, key: 'a' });

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      error: { code: 'DELIVERY_QUEUE_FAILED', message: 'Failed to queue delivery' },
    });
    expect(console.error).toHaveBeenCalledWith('[relay] enqueue failed error=redis down');
  });
});
