import { ConfigType, registerAs } from '@nestjs/config';

/**
 * Parse a positive integer from the environment, falling back to a default
 * when the variable is missing or malformed.
 */
function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Booking core settings, exposed under the `booking` config namespace.
 *
 * Environment:
 * - RESERVATION_WINDOW_MINUTES: how long a reservation holds its seats (10)
 * - LOCK_TIMEOUT_MS: upper bound on waiting for contended seat rows (3000)
 * - TRANSACTION_MAX_RETRIES: retries of a transaction on write conflict (5)
 * - PERSISTENCE_RETRY_ATTEMPTS: caller-level retries of a PersistenceFailure (3)
 * - MAX_SEATS_PER_BOOKING: seats allowed in one reservation (10)
 * - SWEEP_BATCH_SIZE: expired rows scanned per sweep run (100)
 * - PAYMENT_TIMEOUT_MS: how long checkout waits for payment authorization (15000)
 * - BOOKING_CURRENCY: ISO currency code stored on bookings (AUD)
 */
export const bookingConfig = registerAs('booking', () => ({
  reservationWindowMinutes: positiveInt(
    process.env.RESERVATION_WINDOW_MINUTES,
    10,
  ),
  lockTimeoutMs: positiveInt(process.env.LOCK_TIMEOUT_MS, 3000),
  transactionMaxRetries: positiveInt(process.env.TRANSACTION_MAX_RETRIES, 5),
  persistenceRetryAttempts: positiveInt(
    process.env.PERSISTENCE_RETRY_ATTEMPTS,
    3,
  ),
  maxSeatsPerBooking: positiveInt(process.env.MAX_SEATS_PER_BOOKING, 10),
  sweepBatchSize: positiveInt(process.env.SWEEP_BATCH_SIZE, 100),
  paymentTimeoutMs: positiveInt(process.env.PAYMENT_TIMEOUT_MS, 15000),
  currency: process.env.BOOKING_CURRENCY || 'AUD',
}));

export type BookingConfig = ConfigType<typeof bookingConfig>;
