import { TransactionContext } from '../database/transaction-runner';
import { NewTicket, TicketRecord, TicketStatus } from './ticket.types';

/**
 * Persistence of tickets. Writes only happen inside a transaction.
 */
export abstract class TicketRepository {
  abstract insertMany(
    ctx: TransactionContext,
    tickets: readonly NewTicket[],
  ): Promise<TicketRecord[]>;

  /**
   * Tickets of a booking, ordered by seat id. Pass a context to read inside
   * the transaction.
   */
  abstract findByBooking(
    bookingId: string,
    ctx?: TransactionContext,
  ): Promise<TicketRecord[]>;

  abstract findById(ticketId: string): Promise<TicketRecord | null>;

  abstract lockById(
    ctx: TransactionContext,
    ticketId: string,
  ): Promise<TicketRecord | null>;

  abstract updateStatus(
    ctx: TransactionContext,
    ticketIds: readonly string[],
    status: TicketStatus,
  ): Promise<void>;
}
