import { BotApi } from '@audio-relay/bot-api';
import { config } from '../../config.js';
import type { Messenger } from '../../types/relay.js';
import { TelegramMessenger } from './telegram.js';

export function createMessenger(): Messenger {
  if (!config.botToken) {
    throw new Error('BOT_TOKEN is required to deliver audio');
  }

  const api = new BotApi({
    baseUrl: config.botApiBase,
    token: config.botToken,
  });

  return new TelegramMessenger(api, {
    performer: config.audioPerformer || undefined,
  });
}
