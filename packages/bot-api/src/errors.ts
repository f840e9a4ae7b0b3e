export class BotApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'BotApiError';
    Object.setPrototypeOf(this, BotApiError.prototype);
  }
}

export class AuthenticationError extends BotApiError {
  constructor(message = 'Invalid or missing bot token', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, undefined, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class InvalidRequestError extends BotApiError {
  constructor(message: string, code = 'BAD_REQUEST', details?: Record<string, unknown>, raw?: unknown) {
    super(message, code, 400, details, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class ForbiddenError extends BotApiError {
  constructor(message = 'Bot is not allowed to reach this chat', raw?: unknown) {
    super(message, 'FORBIDDEN', 403, undefined, raw);
    this.name = 'ForbiddenError';
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}

export class NotFoundError extends BotApiError {
  constructor(message = 'Method or resource not found', raw?: unknown) {
    super(message, 'NOT_FOUND', 404, undefined, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class RateLimitError extends BotApiError {
  constructor(message = 'Too many requests', retryAfterSeconds?: number, raw?: unknown) {
    super(
      message,
      'RATE_LIMITED',
      429,
      retryAfterSeconds !== undefined ? { retry_after_seconds: retryAfterSeconds } : undefined,
      raw,
    );
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }

  get retryAfterSeconds(): number | undefined {
    const value = this.details?.retry_after_seconds;
    return typeof value === 'number' ? value : undefined;
  }
}
