import { BookingStatus, ReleaseReason } from '../booking-state';

/**
 * Response of POST /api/bookings
 */
export interface ReservationResponse {
  booking_id: string;
  booking_code: string;
  event_id: string;
  seat_ids: string[];
  total_amount: number;
  currency: string;
  status: BookingStatus;
  held_at: string;
  hold_expires_at: string;
}

export interface BookingSeatResponse {
  seat_id: string;
  section: string;
  label: string;
  seat_type: string;
  price: number;
}

/**
 * Response of GET /api/bookings/:id and of cancel/refund
 */
export interface BookingDetailsResponse {
  id: string;
  booking_code: string;
  event_id: string;
  customer_id: string;
  seats: BookingSeatResponse[];
  total_amount: number;
  currency: string;
  status: BookingStatus;
  held_at: string;
  hold_expires_at: string;
  confirmed_at?: string;
  released_at?: string;
  release_reason?: ReleaseReason;
  refunded_at?: string;
  payment_ref?: string;
}

export interface IssuedTicketResponse {
  ticket_id: string;
  seat_id: string;
  event_id: string;
  booking_id: string;
}

/**
 * Response of POST /api/bookings/:id/checkout
 *
 * `expired` means the hold lapsed before payment could be applied; any
 * authorized amount has been refunded.
 */
export interface CheckoutResponse {
  booking_id: string;
  booking_code: string;
  status: 'confirmed' | 'expired';
  payment_ref?: string;
  payment_refunded?: boolean;
  tickets: IssuedTicketResponse[];
}

export interface TicketResponse {
  ticket_id: string;
  ticket_code: string;
  seat_id: string;
  event_id: string;
  customer_id: string;
  access_gate: string;
  status: string;
  transferred_from?: string;
}
