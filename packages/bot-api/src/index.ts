import { BotApiHttpClient } from './client.js';
import { MessagesResource } from './messages.js';
import type { BotApiConfig } from './types.js';

export class BotApi {
  public readonly messages: MessagesResource;
  private readonly client: BotApiHttpClient;

  constructor(config: BotApiConfig = {}) {
    this.client = new BotApiHttpClient(config);
    this.messages = new MessagesResource(this.client);
  }

  setToken(token: string): void {
    this.client.setToken(token);
  }
}

export * from './types.js';
export * from './errors.js';
