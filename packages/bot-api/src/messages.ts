import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { BotApiHttpClient } from './client.js';
import type {
  DeleteMessageRequest,
  EditMessageTextRequest,
  ForwardMessageRequest,
  Message,
  RequestOptions,
  SendAudioRequest,
  SendMessageRequest,
} from './types.js';

async function buildAudioForm(
  body: SendAudioRequest,
  file: { path: string; fileName?: string },
): Promise<FormData> {
  const form = new FormData();
  const contents = await readFile(file.path);
  form.append('audio', new Blob([new Uint8Array(contents)]), file.fileName ?? basename(file.path));

  form.append('chat_id', String(body.chat_id));
  if (body.caption !== undefined) form.append('caption', body.caption);
  if (body.duration !== undefined) form.append('duration', String(Math.round(body.duration)));
  if (body.performer !== undefined) form.append('performer', body.performer);
  if (body.title !== undefined) form.append('title', body.title);
  if (body.reply_to_message_id !== undefined) {
    form.append('reply_to_message_id', String(body.reply_to_message_id));
  }
  return form;
}

export class MessagesResource {
  constructor(private readonly client: BotApiHttpClient) {}

  forward(body: ForwardMessageRequest, options?: RequestOptions): Promise<Message> {
    return this.client.request<Message>({
      method: 'forwardMessage',
      params: body,
      options,
    });
  }

  async sendAudio(body: SendAudioRequest, options?: RequestOptions): Promise<Message> {
    if (typeof body.audio === 'string') {
      return this.client.request<Message>({
        method: 'sendAudio',
        params: body,
        options,
      });
    }

    const form = await buildAudioForm(body, body.audio);
    return this.client.request<Message>({
      method: 'sendAudio',
      form,
      options,
    });
  }

  send(body: SendMessageRequest, options?: RequestOptions): Promise<Message> {
    return this.client.request<Message>({
      method: 'sendMessage',
      params: body,
      options,
    });
  }

  editText(body: EditMessageTextRequest, options?: RequestOptions): Promise<Message | true> {
    return this.client.request<Message | true>({
      method: 'editMessageText',
      params: body,
      options,
    });
  }

  delete(body: DeleteMessageRequest, options?: RequestOptions): Promise<true> {
    return this.client.request<true>({
      method: 'deleteMessage',
      params: body,
      options,
    });
  }
}
