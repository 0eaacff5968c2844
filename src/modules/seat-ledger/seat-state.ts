import { InvalidStateError } from '../../common/errors/booking.errors';

/**
 * Occupancy of one seat for one event.
 */
export enum SeatState {
  FREE = 'free',
  RESERVED = 'reserved',
  BOOKED = 'booked',
}

/**
 * Allowed seat transitions. A seat is never booked without first being
 * reserved.
 */
export const SEAT_STATE_TRANSITIONS: Record<SeatState, readonly SeatState[]> =
  {
    [SeatState.FREE]: [SeatState.RESERVED],
    [SeatState.RESERVED]: [SeatState.BOOKED, SeatState.FREE],
    [SeatState.BOOKED]: [SeatState.FREE],
  };

export function isValidSeatTransition(from: SeatState, to: SeatState): boolean {
  return SEAT_STATE_TRANSITIONS[from].includes(to);
}

export function assertSeatTransition(
  seatId: string,
  from: SeatState,
  to: SeatState,
): void {
  if (!isValidSeatTransition(from, to)) {
    throw new InvalidStateError(
      `Seat ${seatId} cannot move from ${from} to ${to}`,
      from,
    );
  }
}

/**
 * Row of the seat ledger for one (event, seat) pair.
 */
export interface SeatAvailabilityRecord {
  eventId: string;
  seatId: string;
  state: SeatState;
  holderId: string | null;
  bookingId: string | null;
  expiresAt: Date | null;
  /** Incremented on every lock; writes are guarded by the value read under lock */
  lockVersion: number;
}

export function isReservationExpired(
  row: Pick<SeatAvailabilityRecord, 'state' | 'expiresAt'>,
  now: Date,
): boolean {
  return (
    row.state === SeatState.RESERVED &&
    row.expiresAt !== null &&
    row.expiresAt.getTime() < now.getTime()
  );
}

/**
 * State as seen by a new reservation: a lapsed reservation counts as free
 * even before the sweep has released it.
 */
export function effectiveSeatState(
  row: Pick<SeatAvailabilityRecord, 'state' | 'expiresAt'>,
  now: Date,
): SeatState {
  return isReservationExpired(row, now) ? SeatState.FREE : row.state;
}

/**
 * The global lock order: distinct seat ids, ascending.
 */
export function sortSeatIds(seatIds: readonly string[]): string[] {
  return [...new Set(seatIds)].sort();
}

export function freeSeatRow(
  eventId: string,
  seatId: string,
): SeatAvailabilityRecord {
  return {
    eventId,
    seatId,
    state: SeatState.FREE,
    holderId: null,
    bookingId: null,
    expiresAt: null,
    lockVersion: 0,
  };
}
