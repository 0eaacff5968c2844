/**
 * Booking status enum
 * - pending: Seats are reserved, waiting for payment
 * - confirmed: Payment accepted, seats booked and tickets issued
 * - failed: Payment failed or the reservation expired
 * - cancelled: Customer cancelled before paying
 */
export enum BookingStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Why a pending booking gave its seats back
 */
export enum ReleaseReason {
  PAYMENT_FAILED = 'payment_failed',
  PAYMENT_TIMEOUT = 'payment_timeout',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

/**
 * Valid booking status transitions. Every status other than pending is
 * terminal.
 */
export const BOOKING_STATUS_TRANSITIONS: Record<
  BookingStatus,
  readonly BookingStatus[]
> = {
  [BookingStatus.PENDING]: [
    BookingStatus.CONFIRMED,
    BookingStatus.FAILED,
    BookingStatus.CANCELLED,
  ],
  [BookingStatus.CONFIRMED]: [],
  [BookingStatus.FAILED]: [],
  [BookingStatus.CANCELLED]: [],
};

export function isValidBookingTransition(
  from: BookingStatus,
  to: BookingStatus,
): boolean {
  return BOOKING_STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: BookingStatus): boolean {
  return BOOKING_STATUS_TRANSITIONS[status].length === 0;
}

/**
 * Status a pending booking ends in when released for `reason`
 */
export function releaseTargetStatus(reason: ReleaseReason): BookingStatus {
  return reason === ReleaseReason.CANCELLED
    ? BookingStatus.CANCELLED
    : BookingStatus.FAILED;
}
