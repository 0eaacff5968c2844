import { TransactionContext } from '../database/transaction-runner';
import {
  assertSeatTransition,
  effectiveSeatState,
  SeatAvailabilityRecord,
  SeatState,
  sortSeatIds,
} from './seat-state';

/**
 * A guarded state change on a row previously returned by lockForUpdate.
 */
export interface SeatTransition {
  row: SeatAvailabilityRecord;
  to: SeatState;
  holderId: string | null;
  bookingId: string | null;
  expiresAt: Date | null;
}

/**
 * SeatLedger owns per-event seat occupancy.
 *
 * Reads through getAvailability never lock. Rows are only changed by the
 * booking engine, inside a transaction, after lockForUpdate has taken them
 * in ascending seat-id order.
 */
export abstract class SeatLedger {
  /**
   * Non-locking snapshot of seat states. Rows that do not exist yet read as
   * free, and so do lapsed reservations.
   */
  async getAvailability(
    eventId: string,
    seatIds: readonly string[],
    now: Date = new Date(),
  ): Promise<Map<string, SeatState>> {
    const ids = sortSeatIds(seatIds);
    const rows = await this.findRows(eventId, ids);
    const byId = new Map(rows.map((row) => [row.seatId, row]));

    const availability = new Map<string, SeatState>();
    for (const seatId of ids) {
      const row = byId.get(seatId);
      availability.set(
        seatId,
        row ? effectiveSeatState(row, now) : SeatState.FREE,
      );
    }
    return availability;
  }

  /**
   * Apply state changes to locked rows, rejecting any transition the seat
   * state machine does not allow before anything is written.
   */
  async applyTransitions(
    ctx: TransactionContext,
    transitions: readonly SeatTransition[],
  ): Promise<void> {
    for (const transition of transitions) {
      assertSeatTransition(
        transition.row.seatId,
        transition.row.state,
        transition.to,
      );
    }
    await this.writeTransitions(ctx, transitions);
  }

  /**
   * Lock the (event, seat) rows for the rest of the transaction, in
   * ascending seat-id order, creating missing rows as free. Returns the rows
   * in that order.
   */
  abstract lockForUpdate(
    ctx: TransactionContext,
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]>;

  /**
   * Reserved rows whose expiry is before `now`, oldest first.
   */
  abstract findExpiredReservations(
    now: Date,
    limit: number,
  ): Promise<SeatAvailabilityRecord[]>;

  /**
   * Create free rows for seats that have none yet. Returns how many were
   * created.
   */
  abstract materialize(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<number>;

  protected abstract findRows(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]>;

  protected abstract writeTransitions(
    ctx: TransactionContext,
    transitions: readonly SeatTransition[],
  ): Promise<void>;
}
