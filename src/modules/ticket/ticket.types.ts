/**
 * Ticket status enum
 * - valid: Issued and not yet scanned
 * - used: Scanned at the gate
 * - cancelled: Voided by a refund
 * - transferred: Replaced by a ticket issued to another customer
 */
export enum TicketStatus {
  VALID = 'valid',
  USED = 'used',
  CANCELLED = 'cancelled',
  TRANSFERRED = 'transferred',
}

/**
 * Statuses of tickets that still entitle someone to the seat. Exactly one
 * live ticket exists per booked seat.
 */
export const LIVE_TICKET_STATUSES: readonly TicketStatus[] = [
  TicketStatus.VALID,
  TicketStatus.USED,
];

export interface TicketRecord {
  id: string;
  ticketCode: string;
  bookingId: string;
  seatId: string;
  eventId: string;
  customerId: string;
  accessGate: string;
  status: TicketStatus;
  transferredFrom: string | null;
  issuedAt: Date;
}

export type NewTicket = Omit<TicketRecord, 'id' | 'status'>;

/**
 * Record emitted for each ticket written by a confirmed booking.
 */
export interface IssuedTicket {
  ticketId: string;
  seatId: string;
  eventId: string;
  bookingId: string;
}

export function toIssuedTicket(ticket: TicketRecord): IssuedTicket {
  return {
    ticketId: ticket.id,
    seatId: ticket.seatId,
    eventId: ticket.eventId,
    bookingId: ticket.bookingId,
  };
}

/**
 * Entry gate printed on a ticket, named after the first letter of the
 * seat's section ("NORTH" enters through "Gate N").
 */
export function accessGateFor(section: string): string {
  const letter = section.trim().charAt(0).toUpperCase();
  return letter ? `Gate ${letter}` : 'Main Gate';
}
