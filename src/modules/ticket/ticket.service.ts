import { Injectable, Logger } from '@nestjs/common';
import {
  InvalidRequestError,
  InvalidStateError,
} from '../../common/errors/booking.errors';
import { generateCode } from '../../common/utils/code.util';
import { CustomerDirectory } from '../customer/customer-directory';
import { TransactionRunner } from '../database/transaction-runner';
import { TicketRepository } from './ticket-repository';
import { TicketRecord, TicketStatus } from './ticket.types';

/**
 * TicketService handles the life of a ticket after issuance
 *
 * - markUsed: gate scan, valid -> used
 * - transfer: valid -> transferred, plus a new valid ticket for the recipient
 *
 * Both run in a transaction that locks the ticket, so a ticket cannot be
 * scanned and transferred at the same time. Errors are BookingErrors.
 */
@Injectable()
export class TicketService {
  private readonly logger = new Logger(TicketService.name);

  constructor(
    private readonly transactionRunner: TransactionRunner,
    private readonly ticketRepository: TicketRepository,
    private readonly customerDirectory: CustomerDirectory,
  ) {}

  async getTicketsForBooking(bookingId: string): Promise<TicketRecord[]> {
    return this.ticketRepository.findByBooking(bookingId);
  }

  async markUsed(ticketId: string): Promise<TicketRecord> {
    return this.transactionRunner.run('markTicketUsed', async (ctx) => {
      const ticket = await this.ticketRepository.lockById(ctx, ticketId);
      if (!ticket) {
        throw new InvalidRequestError(
          'TICKET_NOT_FOUND',
          `Ticket ${ticketId} not found`,
        );
      }

      if (ticket.status !== TicketStatus.VALID) {
        throw new InvalidStateError(
          `Ticket ${ticket.ticketCode} is ${ticket.status} and cannot be used`,
          ticket.status,
        );
      }

      await this.ticketRepository.updateStatus(
        ctx,
        [ticket.id],
        TicketStatus.USED,
      );

      this.logger.log(
        `Ticket ${ticket.ticketCode} scanned at ${ticket.accessGate}`,
      );
      return { ...ticket, status: TicketStatus.USED };
    });
  }

  /**
   * Hand a valid ticket to another customer. The original is kept as
   * `transferred` and a replacement is issued for the same seat.
   */
  async transfer(
    ticketId: string,
    ownerId: string,
    recipientId: string,
  ): Promise<TicketRecord> {
    if (ownerId === recipientId) {
      throw new InvalidRequestError(
        'INVALID_ID',
        'A ticket cannot be transferred to its current holder',
      );
    }

    if (!(await this.customerDirectory.exists(recipientId))) {
      throw new InvalidRequestError(
        'RECIPIENT_NOT_FOUND',
        `Customer ${recipientId} not found`,
      );
    }

    return this.transactionRunner.run('transferTicket', async (ctx) => {
      const ticket = await this.ticketRepository.lockById(ctx, ticketId);
      if (!ticket) {
        throw new InvalidRequestError(
          'TICKET_NOT_FOUND',
          `Ticket ${ticketId} not found`,
        );
      }

      if (ticket.customerId !== ownerId) {
        throw new InvalidRequestError(
          'NOT_OWNER',
          'Only the ticket holder can transfer it',
        );
      }

      if (ticket.status !== TicketStatus.VALID) {
        throw new InvalidStateError(
          `Ticket ${ticket.ticketCode} is ${ticket.status} and cannot be transferred`,
          ticket.status,
        );
      }

      await this.ticketRepository.updateStatus(
        ctx,
        [ticket.id],
        TicketStatus.TRANSFERRED,
      );

      const [replacement] = await this.ticketRepository.insertMany(ctx, [
        {
          ticketCode: generateCode('TK', 10),
          bookingId: ticket.bookingId,
          seatId: ticket.seatId,
          eventId: ticket.eventId,
          customerId: recipientId,
          accessGate: ticket.accessGate,
          transferredFrom: ticket.id,
          issuedAt: ctx.now,
        },
      ]);

      this.logger.log(
        `Ticket ${ticket.ticketCode} transferred to customer ${recipientId} as ${replacement.ticketCode}`,
      );
      return replacement;
    });
  }
}
