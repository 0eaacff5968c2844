import { TransactionContext } from '../database/transaction-runner';
import { BookingChanges, BookingRecord, NewBooking } from './booking.types';

/**
 * Persistence of the Booking aggregate. Everything but findById runs inside
 * a transaction.
 */
export abstract class BookingRepository {
  /** Non-locking read */
  abstract findById(bookingId: string): Promise<BookingRecord | null>;

  /**
   * Ids of pending bookings whose hold lapsed before `now`, oldest first.
   * Non-locking.
   */
  abstract findLapsedPending(now: Date, limit: number): Promise<string[]>;

  abstract findByIdempotencyKey(
    ctx: TransactionContext,
    customerId: string,
    idempotencyKey: string,
  ): Promise<BookingRecord | null>;

  /**
   * Lock the booking for the rest of the transaction. Always taken before
   * any of its seat rows.
   */
  abstract lockById(
    ctx: TransactionContext,
    bookingId: string,
  ): Promise<BookingRecord | null>;

  abstract create(
    ctx: TransactionContext,
    booking: NewBooking,
  ): Promise<BookingRecord>;

  abstract update(
    ctx: TransactionContext,
    bookingId: string,
    changes: BookingChanges,
  ): Promise<BookingRecord>;
}
