import { Router } from 'express';
import { errorMessage } from '../core/errors.js';
import type { DeliveryQueuePayload } from '../queue/constants.js';
import type { AppContext } from '../types/appContext.js';
import type { ChatId } from '../types/relay.js';

const MAX_KEYS = 200;
const MAX_KEY_LENGTH = 256;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseChatId(input: unknown): ChatId | null {
  if (typeof input === 'number' && Number.isSafeInteger(input)) return input;
  if (typeof input === 'string' && input.trim().length > 0) return input.trim();
  return null;
}

function parseKey(input: unknown): string | null {
  if (typeof input !== 'string') return null;
  const key = input.trim();
  return key.length > 0 && key.length <= MAX_KEY_LENGTH ? key : null;
}

export function parseDeliveryBody(
  body: unknown,
): { ok: true; value: DeliveryQueuePayload } | { ok: false; message: string } {
  if (!isObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const chatId = parseChatId(body.chat_id);
  if (chatId === null) {
    return { ok: false, message: 'chat_id is required and must be an integer or a non-empty string' };
  }

  const present = (['key', 'keys', 'collection'] as const).filter((field) => body[field] !== undefined);
  if (present.length !== 1) {
    return { ok: false, message: 'Exactly one of key, keys or collection is required' };
  }

  if (body.key !== undefined) {
    const key = parseKey(body.key);
    if (!key) return { ok: false, message: 'key must be a non-empty string' };
    return { ok: true, value: { chatId, key } };
  }

  if (body.collection !== undefined) {
    const collection = parseKey(body.collection);
    if (!collection) return { ok: false, message: 'collection must be a non-empty string' };
    return { ok: true, value: { chatId, collection } };
  }

  if (!Array.isArray(body.keys) || body.keys.length === 0) {
    return { ok: false, message: 'keys must be a non-empty array of strings' };
  }
  if (body.keys.length > MAX_KEYS) {
    return { ok: false, message: `keys exceeds max length of ${MAX_KEYS}` };
  }
  const keys: string[] = [];
  for (const raw of body.keys) {
    const key = parseKey(raw);
    if (!key) return { ok: false, message: 'keys must be a non-empty array of strings' };
    keys.push(key);
  }
  return { ok: true, value: { chatId, keys } };
}

export function createDeliveriesRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/deliveries', async (req, res) => {
    const parsed = parseDeliveryBody(req.body);
    if (!parsed.ok) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: parsed.message,
        },
      });
      return;
    }

    try {
      const jobId = await ctx.jobQueue.enqueue(parsed.value);
      res.status(202).json({
        job_id: jobId,
        status: 'queued',
      });
    } catch (error) {
      console.error(`[relay] enqueue failed error=${errorMessage(error)}`);
      res.status(500).json({
        error: {
          code: 'DELIVERY_QUEUE_FAILED',
          message: 'Failed to queue delivery',
        },
      });
    }
  });

  return router;
}
