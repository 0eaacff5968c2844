import { SeatState } from '../../seat-ledger/seat-state';
import { SeatType } from '../../stadium/seat.schema';
import { EventStatus } from '../event.schema';

export interface SeatMapEntry {
  seat_id: string;
  label: string;
  row: string;
  number: number;
  seat_type: SeatType;
  price: number;
  state: SeatState;
}

export interface SectionAvailability {
  section: string;
  total_seats: number;
  available_seats: number;
  seats: SeatMapEntry[];
}

/**
 * Response of GET /api/events/:id/seats
 */
export interface EventSeatMapResponse {
  event_id: string;
  event_name: string;
  starts_at: string;
  status: EventStatus;
  total_seats: number;
  available_seats: number;
  sections: SectionAvailability[];
}
