export type BookingErrorCode =
  | 'UnknownClient'
  | 'UnknownService'
  | 'InvalidPhone'
  | 'InvalidSlot'
  | 'SlotConflict'
  | 'NotFound'
  | 'AlreadyCancelled'
  | 'HoldExpired'
  | 'StorageTimeout'
  | 'StorageUnavailable';

/**
 * Typed failure raised by the scheduling core. Only `StorageTimeout` is
 * retryable as-is; a `SlotConflict` needs a fresh availability lookup first.
 */
export class BookingError extends Error {
  readonly code: BookingErrorCode;
  readonly retryable: boolean;

  constructor(code: BookingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BookingError';
    this.code = code;
    this.retryable = code === 'StorageTimeout';
  }
}

export type Result<T, E = BookingError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export async function toResult<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (error instanceof BookingError) {
      return err(error);
    }
    throw error;
  }
}
