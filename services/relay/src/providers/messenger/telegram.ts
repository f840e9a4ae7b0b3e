import { BotApi, BotApiError, type Message } from '@audio-relay/bot-api';
import { TransientDeliveryFailure } from '../../core/errors.js';
import type {
  AudioMetadata,
  AudioSource,
  ChatId,
  DeliveryReceipt,
  MessageHandle,
  Messenger,
  OriginLocation,
} from '../../types/relay.js';

function describeError(error: unknown): string {
  if (error instanceof BotApiError) {
    return `${error.code} (${error.statusCode}): ${error.message}`;
  }
  return error instanceof Error ? error.message : 'Unknown bot api error';
}

async function call<T>(label: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new TransientDeliveryFailure(`${label} failed: ${describeError(error)}`, error);
  }
}

function receiptFrom(message: Message): DeliveryReceipt {
  if (!message.audio) {
    throw new TransientDeliveryFailure(`sendAudio answered without audio message_id=${message.message_id}`);
  }
  return {
    blobHandle: message.audio.file_id,
    origin: { chatId: message.chat.id, messageId: message.message_id },
  };
}

export interface TelegramMessengerOptions {
  performer?: string;
}

export class TelegramMessenger implements Messenger {
  readonly name = 'telegram';

  constructor(
    private readonly api: BotApi,
    private readonly options: TelegramMessengerOptions = {},
  ) {}

  async forward(destination: ChatId, origin: OriginLocation): Promise<void> {
    await call('forwardMessage', () =>
      this.api.messages.forward({
        chat_id: destination,
        from_chat_id: origin.chatId,
        message_id: origin.messageId,
      }),
    );
  }

  async sendAudio(destination: ChatId, source: AudioSource, metadata: AudioMetadata): Promise<DeliveryReceipt> {
    const message = await call('sendAudio', () =>
      this.api.messages.sendAudio({
        chat_id: destination,
        audio: source.kind === 'blob' ? source.blobHandle : { path: source.path },
        title: metadata.title,
        duration: metadata.durationSeconds,
        caption: metadata.attribution,
        performer: this.options.performer,
      }),
    );
    return receiptFrom(message);
  }

  async sendText(destination: ChatId, text: string): Promise<MessageHandle> {
    const message = await call('sendMessage', () =>
      this.api.messages.send({ chat_id: destination, text }),
    );
    return { chatId: message.chat.id, messageId: message.message_id };
  }

  async editText(handle: MessageHandle, text: string): Promise<void> {
    await call('editMessageText', () =>
      this.api.messages.editText({ chat_id: handle.chatId, message_id: handle.messageId, text }),
    );
  }

  async deleteText(handle: MessageHandle): Promise<void> {
    await call('deleteMessage', () =>
      this.api.messages.delete({ chat_id: handle.chatId, message_id: handle.messageId }),
    );
  }
}
