import {
  AuthenticationError,
  BotApiError,
  ForbiddenError,
  InvalidRequestError,
  NotFoundError,
  RateLimitError,
} from './errors.js';
import type { BotApiConfig, ErrorResponse, RequestOptions, SuccessResponse } from './types.js';

const DEFAULT_BASE_URL = 'https://api.telegram.org';
const USER_AGENT = 'audio-relay-bot-api/0.1.0';

interface RequestConfig {
  method: string;
  params?: object;
  form?: FormData;
  options?: RequestOptions;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function parseResponseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return { description: raw };
  }
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null;
}

function isErrorResponse(input: unknown): input is ErrorResponse {
  return isRecord(input) && input.ok === false && typeof input.description === 'string';
}

function hasResult(input: unknown): input is SuccessResponse<unknown> {
  return isRecord(input) && input.ok === true && 'result' in input;
}

export class BotApiHttpClient {
  private readonly baseUrl: string;
  private token?: string;

  constructor(config: BotApiConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.token = config.token;
  }

  setToken(token: string): void {
    this.token = token;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    if (!this.token) {
      throw new AuthenticationError('Missing bot token');
    }

    const url = `${this.baseUrl}/bot${this.token}/${config.method}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };

    let body: string | FormData | undefined;
    if (config.form) {
      body = config.form;
    } else if (config.params !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(config.params);
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body,
      signal: config.options?.signal,
    });

    const rawText = await response.text();
    const parsedBody = parseResponseBody(rawText);

    if (!response.ok || !hasResult(parsedBody)) {
      throw this.toApiError(config.method, response.status, parsedBody, response.headers);
    }

    return parsedBody.result as T;
  }

  private toApiError(method: string, status: number, payload: unknown, headers: Headers): BotApiError {
    let statusCode = status;
    let message = `Bot API call ${method} failed with status ${status}`;
    let retryFromBody: number | undefined;

    if (isErrorResponse(payload)) {
      statusCode = typeof payload.error_code === 'number' ? payload.error_code : status;
      message = payload.description;
      retryFromBody = payload.parameters?.retry_after;
    } else if (isRecord(payload) && typeof payload.description === 'string') {
      message = payload.description;
    }

    if (statusCode === 401) {
      return new AuthenticationError(message, payload);
    }
    if (statusCode === 400) {
      return new InvalidRequestError(message, 'BAD_REQUEST', { method }, payload);
    }
    if (statusCode === 403) {
      return new ForbiddenError(message, payload);
    }
    if (statusCode === 404) {
      return new NotFoundError(message, payload);
    }
    if (statusCode === 429) {
      const retryFromHeader = headers.get('retry-after');
      const retryAfterSeconds =
        retryFromBody
        ?? (retryFromHeader ? Number.parseInt(retryFromHeader, 10) : undefined);
      return new RateLimitError(message, retryAfterSeconds, payload);
    }

    return new BotApiError(message, 'UNKNOWN', statusCode, { method }, payload);
  }
}
