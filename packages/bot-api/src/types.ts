export type ChatId = number | string;

export interface BotApiConfig {
  baseUrl?: string;
  token?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ErrorResponse {
  ok: false;
  error_code: number;
  description: string;
  parameters?: {
    retry_after?: number;
    migrate_to_chat_id?: number;
  };
}

export interface SuccessResponse<T> {
  ok: true;
  result: T;
}

export interface Chat {
  id: number;
  type: 'private' | 'group' | 'supergroup' | 'channel';
  title?: string;
  username?: string;
}

export interface Audio {
  file_id: string;
  file_unique_id: string;
  duration: number;
  performer?: string;
  title?: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
}

export interface Message {
  message_id: number;
  date: number;
  chat: Chat;
  text?: string;
  caption?: string;
  audio?: Audio;
}

export interface ForwardMessageRequest {
  chat_id: ChatId;
  from_chat_id: ChatId;
  message_id: number;
  disable_notification?: boolean;
}

/**
 * `audio` is either a `file_id` already stored by the bot API, or a local file
 * that is uploaded as multipart form data.
 */
export type AudioInput = string | { path: string; fileName?: string };

export interface SendAudioRequest {
  chat_id: ChatId;
  audio: AudioInput;
  caption?: string;
  duration?: number;
  performer?: string;
  title?: string;
  reply_to_message_id?: number;
}

export interface SendMessageRequest {
  chat_id: ChatId;
  text: string;
  parse_mode?: 'Markdown' | 'MarkdownV2' | 'HTML';
  disable_web_page_preview?: boolean;
  reply_to_message_id?: number;
}

export interface EditMessageTextRequest {
  chat_id: ChatId;
  message_id: number;
  text: string;
  parse_mode?: 'Markdown' | 'MarkdownV2' | 'HTML';
}

export interface DeleteMessageRequest {
  chat_id: ChatId;
  message_id: number;
}
