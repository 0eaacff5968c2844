import {
  InvalidRequestError,
  InvalidStateError,
} from '../../common/errors/booking.errors';
import {
  BookingFixture,
  createBookingFixture,
  CUSTOMER_A,
  CUSTOMER_B,
  EVENT_ID,
} from '../../../test/support/booking-fixture';
import { valueOf } from '../../../test/support/results';
import { IssuedTicket, TicketStatus } from './ticket.types';

describe('TicketService', () => {
  let fixture: BookingFixture;
  let issued: IssuedTicket[];

  beforeEach(async () => {
    fixture = await createBookingFixture();
    const booking = valueOf(
      await fixture.engine.reserveSeats(CUSTOMER_A, EVENT_ID, ['S1', 'S2']),
    );
    issued = valueOf(await fixture.engine.confirmBooking(booking.id)).tickets;
  });

  afterEach(async () => {
    await fixture.module.close();
  });

  describe('markUsed', () => {
    it('marks a valid ticket as used', async () => {
      const used = await fixture.tickets.markUsed(issued[0].ticketId);

      expect(used.status).toBe(TicketStatus.USED);
      expect(fixture.db.tickets.get(issued[0].ticketId)?.status).toBe(
        TicketStatus.USED,
      );
    });

    it('refuses a second scan', async () => {
      await fixture.tickets.markUsed(issued[0].ticketId);

      await expect(
        fixture.tickets.markUsed(issued[0].ticketId),
      ).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('reports unknown tickets', async () => {
      await expect(fixture.tickets.markUsed('ticket-9999')).rejects.toMatchObject(
        { reason: 'TICKET_NOT_FOUND' },
      );
    });
  });

  describe('transfer', () => {
    it('issues a replacement to the recipient and retires the original', async () => {
      const original = issued[0].ticketId;

      const replacement = await fixture.tickets.transfer(
        original,
        CUSTOMER_A,
        CUSTOMER_B,
      );

      expect(replacement).toMatchObject({
        seatId: 'S1',
        eventId: EVENT_ID,
        customerId: CUSTOMER_B,
        accessGate: 'Gate N',
        status: TicketStatus.VALID,
        transferredFrom: original,
      });
      expect(fixture.db.tickets.get(original)?.status).toBe(
        TicketStatus.TRANSFERRED,
      );

      const live = (
        await fixture.tickets.getTicketsForBooking(issued[0].bookingId)
      ).filter((ticket) => ticket.status === TicketStatus.VALID);
      expect(live.map((ticket) => ticket.seatId)).toEqual(['S1', 'S2']);
    });

    it('only lets the holder transfer', async () => {
      await expect(
        fixture.tickets.transfer(issued[0].ticketId, CUSTOMER_B, CUSTOMER_A),
      ).rejects.toMatchObject({ reason: 'NOT_OWNER' });
    });

    it('rejects unknown recipients and self transfers before locking', async () => {
      await expect(
        fixture.tickets.transfer(issued[0].ticketId, CUSTOMER_A, 'customer-z'),
      ).rejects.toMatchObject({ reason: 'RECIPIENT_NOT_FOUND' });
      await expect(
        fixture.tickets.transfer(issued[0].ticketId, CUSTOMER_A, CUSTOMER_A),
      ).rejects.toBeInstanceOf(InvalidRequestError);

      expect(fixture.db.locksTakenBy('transferTicket')).toEqual([]);
    });

    it('refuses used tickets', async () => {
      await fixture.tickets.markUsed(issued[0].ticketId);

      await expect(
        fixture.tickets.transfer(issued[0].ticketId, CUSTOMER_A, CUSTOMER_B),
      ).rejects.toMatchObject({ currentState: TicketStatus.USED });
    });
  });
});
