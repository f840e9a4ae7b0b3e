export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RelayError';
    Object.setPrototypeOf(this, RelayError.prototype);
  }
}

/** forward/send failed; the caller falls back or evicts. */
export class TransientDeliveryFailure extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DELIVERY_FAILED', cause);
    this.name = 'TransientDeliveryFailure';
    Object.setPrototypeOf(this, TransientDeliveryFailure.prototype);
  }
}

export class TransientFetchFailure extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'FETCH_FAILED', cause);
    this.name = 'TransientFetchFailure';
    Object.setPrototypeOf(this, TransientFetchFailure.prototype);
  }
}

export class PersistenceFailure extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_FAILED', cause);
    this.name = 'PersistenceFailure';
    Object.setPrototypeOf(this, PersistenceFailure.prototype);
  }
}

export class CorruptState extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CORRUPT_STATE', cause);
    this.name = 'CorruptState';
    Object.setPrototypeOf(this, CorruptState.prototype);
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  return error instanceof Error ? error.message : fallback;
}
