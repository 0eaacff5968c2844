import { SeatType } from '../stadium/seat.schema';
import { IssuedTicket } from '../ticket/ticket.types';
import { BookingStatus, ReleaseReason } from './booking-state';

export interface BookingLine {
  seatId: string;
  section: string;
  label: string;
  seatType: SeatType;
  price: number;
}

export interface BookingRecord {
  id: string;
  bookingCode: string;
  customerId: string;
  eventId: string;
  /** Ascending, the order seats are locked in */
  seatIds: string[];
  lines: BookingLine[];
  totalAmount: number;
  currency: string;
  status: BookingStatus;
  heldAt: Date;
  holdExpiresAt: Date;
  confirmedAt: Date | null;
  releasedAt: Date | null;
  releaseReason: ReleaseReason | null;
  paymentRef: string | null;
  refundedAt: Date | null;
  idempotencyKey: string | null;
}

export type NewBooking = Omit<
  BookingRecord,
  | 'id'
  | 'status'
  | 'confirmedAt'
  | 'releasedAt'
  | 'releaseReason'
  | 'paymentRef'
  | 'refundedAt'
>;

export type BookingChanges = Partial<
  Pick<
    BookingRecord,
    | 'status'
    | 'confirmedAt'
    | 'releasedAt'
    | 'releaseReason'
    | 'paymentRef'
    | 'refundedAt'
  >
>;

export interface ReserveOptions {
  /** Client-supplied key; a repeated key returns the original booking */
  idempotencyKey?: string;
}

export interface BookingConfirmation {
  booking: BookingRecord;
  tickets: IssuedTicket[];
  /** True when the booking had already been confirmed by an earlier call */
  alreadyConfirmed: boolean;
}
