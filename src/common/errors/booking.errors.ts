/**
 * Domain errors raised by the booking core.
 *
 * Every error carries a stable `code` so the application layer can map it
 * to a transport response without inspecting messages.
 */
export type BookingErrorCode =
  | 'SEAT_UNAVAILABLE'
  | 'BOOKING_NOT_FOUND'
  | 'INVALID_STATE'
  | 'PERSISTENCE_FAILURE'
  | 'INVALID_REQUEST';

export abstract class BookingError extends Error {
  abstract readonly code: BookingErrorCode;

  /** Whether the same request may succeed if simply retried */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One or more requested seats are Reserved or Booked by someone else.
 * `seatIds` lists every blocking seat in ascending order.
 */
export class SeatUnavailableError extends BookingError {
  readonly code = 'SEAT_UNAVAILABLE' as const;

  constructor(readonly seatIds: string[]) {
    super(`Seats not available: ${seatIds.join(', ')}`);
  }
}

export class BookingNotFoundError extends BookingError {
  readonly code = 'BOOKING_NOT_FOUND' as const;

  constructor(readonly bookingId: string) {
    super(`Booking ${bookingId} not found`);
  }
}

/**
 * The booking or one of its seats is not in a state that permits the
 * requested transition.
 */
export class InvalidStateError extends BookingError {
  readonly code = 'INVALID_STATE' as const;

  constructor(
    message: string,
    readonly currentState?: string,
  ) {
    super(message);
  }
}

/**
 * Storage error, lock wait timeout or exhausted write-conflict retries.
 * The caller may retry the whole operation.
 */
export class PersistenceFailureError extends BookingError {
  readonly code = 'PERSISTENCE_FAILURE' as const;
  override readonly retryable = true;
}

export type InvalidRequestReason =
  | 'EMPTY_SEAT_LIST'
  | 'DUPLICATE_SEATS'
  | 'TOO_MANY_SEATS'
  | 'INVALID_ID'
  | 'CUSTOMER_NOT_FOUND'
  | 'EVENT_NOT_FOUND'
  | 'EVENT_NOT_BOOKABLE'
  | 'SEAT_NOT_FOUND'
  | 'TICKET_NOT_FOUND'
  | 'NOT_OWNER'
  | 'RECIPIENT_NOT_FOUND';

/**
 * Input rejected before any lock is taken.
 */
export class InvalidRequestError extends BookingError {
  readonly code = 'INVALID_REQUEST' as const;

  constructor(
    readonly reason: InvalidRequestReason,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

/**
 * Outcome of a booking core operation.
 */
export type BookingResult<T> =
  | { success: true; value: T }
  | { success: false; error: BookingError };

export function ok<T>(value: T): BookingResult<T> {
  return { success: true, value };
}

export function fail<T>(error: BookingError): BookingResult<T> {
  return { success: false, error };
}
