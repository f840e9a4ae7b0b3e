import { BotApi } from '@audio-relay/bot-api';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TransientDeliveryFailure } from '../../core/errors.js';
import { TelegramMessenger } from './telegram.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const audioMessage = {
  message_id: 501,
  date: 1_700_000_000,
  chat: { id: 42, type: 'private' },
  audio: { file_id: 'file-xyz', file_unique_id: 'u-xyz', duration: 200 },
};

function bodyOf(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

describe('TelegramMessenger', () => {
  const messenger = new TelegramMessenger(new BotApi({ token: 'test-token' }), { performer: 'Relay' });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resends a stored blob and returns the new receipt', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ ok: true, result: audioMessage }),
    );

    const receipt = await messenger.sendAudio(42, { kind: 'blob', blobHandle: 'file-old' }, { title: 'Song' });

    expect(receipt).toEqual({ blobHandle: 'file-xyz', origin: { chatId: 42, messageId: 501 } });
    expect(bodyOf(fetchMock.mock.calls[0][1])).toEqual({ chat_id: 42, audio: 'file-old', title: 'Song', performer: 'Relay' });
  });

  it('forwards from the origin chat', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ ok: true, result: { ...audioMessage, message_id: 502 } }),
    );

    await messenger.forward(42, { chatId: -100, messageId: 9 });

    expect(fetchMock.mock.calls[0][0]).toBe('https://api.telegram.org/bottest-token/forwardMessage');
    expect(bodyOf(fetchMock.mock.calls[0][1])).toEqual({ chat_id: 42, from_chat_id: -100, message_id: 9 });
  });

  it('wraps bot api errors as delivery failures', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ ok: false, error_code: 400, description: 'Bad Request: message to forward not found' }, 400),
    );

    const failure = await messenger.forward(42, { chatId: -100, messageId: 9 }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransientDeliveryFailure);
    expect(failure).toMatchObject({
      code: 'DELIVERY_FAILED',
      message: 'forwardMessage failed: BAD_REQUEST (400): Bad Request: message to forward not found',
    });
  });

  it('treats an answer without audio as a failed send', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ ok: true, result: { message_id: 503, date: 1, chat: { id: 42, type: 'private' } } }),
    );

    await expect(
      messenger.sendAudio(42, { kind: 'blob', blobHandle: 'file-old' }, { title: 'Song' }),
    ).rejects.toThrow('sendAudio answered without audio message_id=503');
  });

  it('returns a handle for status texts', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ ok: true, result: { message_id: 504, date: 1, chat: { id: 42, type: 'private' }, text: 'hi' } }),
    );

    await expect(messenger.sendText(42, 'hi')).resolves.toEqual({ chatId: 42, messageId: 504 });
  });
});
