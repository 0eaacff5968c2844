import { HttpException } from '@nestjs/common';
import {
  fail,
  PersistenceFailureError,
} from '../../common/errors/booking.errors';
import {
  BookingFixture,
  createBookingFixture,
  CUSTOMER_A,
  CUSTOMER_B,
  EVENT_ID,
  TEST_PAYMENT_REF,
} from '../../../test/support/booking-fixture';
import { seatKey } from '../../../test/support/in-memory-database';
import { valueOf } from '../../../test/support/results';
import { SeatState } from '../seat-ledger/seat-state';
import { BookingStatus, ReleaseReason } from './booking-state';

const TEN_MINUTES = 10 * 60 * 1000;

async function rejectionOf(promise: Promise<unknown>): Promise<HttpException> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to be rejected');
}

describe('BookingService', () => {
  let fixture: BookingFixture;

  beforeEach(async () => {
    fixture = await createBookingFixture();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fixture.module.close();
  });

  function seatState(seatId: string): SeatState | undefined {
    return fixture.db.seatRows.get(seatKey(EVENT_ID, seatId))?.state;
  }

  function reserve(seatIds: string[], customerId = CUSTOMER_A, key?: string) {
    return fixture.bookings.reserveSeats(
      customerId,
      { event_id: EVENT_ID, seat_ids: seatIds },
      key,
    );
  }

  describe('reserveSeats', () => {
    it('returns the held reservation', async () => {
      const response = await reserve(['S1', 'S2']);

      expect(response).toEqual({
        booking_id: 'booking-0001',
        booking_code: expect.stringMatching(/^BK-[A-Z0-9]{8}$/),
        event_id: EVENT_ID,
        seat_ids: ['S1', 'S2'],
        total_amount: 100,
        currency: 'AUD',
        status: BookingStatus.PENDING,
        held_at: '2030-01-01T10:00:00.000Z',
        hold_expires_at: '2030-01-01T10:10:00.000Z',
      });
    });

    it('answers 409 with the blocking seats', async () => {
      await reserve(['S1', 'S2']);

      const error = await rejectionOf(reserve(['S2', 'S3'], CUSTOMER_B));

      expect(error.getStatus()).toBe(409);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'SEATS_NOT_AVAILABLE',
        message: 'Some seats are not available: S2',
        details: { seat_ids: ['S2'] },
      });
      expect(seatState('S3')).toBe(SeatState.FREE);
    });

    it('serves a repeated idempotency key from the cache', async () => {
      const engineCall = jest.spyOn(fixture.engine, 'reserveSeats');

      const first = await reserve(['S1'], CUSTOMER_A, 'key-00000001');
      const second = await reserve(['S1'], CUSTOMER_A, 'key-00000001');

      expect(second).toEqual(first);
      expect(engineCall).toHaveBeenCalledTimes(1);
      expect(fixture.redis.get).toHaveBeenLastCalledWith(
        'idempotency:reserve:customer-a:key-00000001',
      );
    });

    it('falls back to the stored booking when the cache is down', async () => {
      const first = await reserve(['S1'], CUSTOMER_A, 'key-00000002');
      fixture.redis.get.mockRejectedValueOnce(new Error('connection refused'));

      const second = await reserve(['S1'], CUSTOMER_A, 'key-00000002');

      expect(second.booking_id).toBe(first.booking_id);
      expect(fixture.db.bookings.size).toBe(1);
    });

    it('retries a persistence failure', async () => {
      const engineCall = jest
        .spyOn(fixture.engine, 'reserveSeats')
        .mockResolvedValueOnce(fail(new PersistenceFailureError('write conflict')));

      const response = await reserve(['S1']);

      expect(engineCall).toHaveBeenCalledTimes(2);
      expect(response.seat_ids).toEqual(['S1']);
    });

    it('answers 503 once the retries run out', async () => {
      const engineCall = jest
        .spyOn(fixture.engine, 'reserveSeats')
        .mockResolvedValue(fail(new PersistenceFailureError('write conflict')));

      const error = await rejectionOf(reserve(['S1']));

      expect(engineCall).toHaveBeenCalledTimes(3);
      expect(error.getStatus()).toBe(503);
      expect(error.getResponse()).toMatchObject({ errorCode: 'SERVICE_BUSY' });
    });
  });

  describe('checkout', () => {
    it('charges the customer and issues a ticket per seat', async () => {
      const { booking_id } = await reserve(['S1', 'S2']);

      const response = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      expect(response.status).toBe('confirmed');
      expect(response.payment_ref).toBe(TEST_PAYMENT_REF);
      expect(response.tickets.map((ticket) => ticket.seat_id)).toEqual([
        'S1',
        'S2',
      ]);
      expect(fixture.payments.authorize).toHaveBeenCalledWith(
        {
          bookingId: booking_id,
          bookingCode: response.booking_code,
          customerId: CUSTOMER_A,
          amount: 100,
          currency: 'AUD',
        },
        200,
      );
      expect(fixture.payments.capture).toHaveBeenCalledWith(TEST_PAYMENT_REF);
      expect(seatState('S1')).toBe(SeatState.BOOKED);
    });

    it('returns the same tickets without charging again', async () => {
      const { booking_id } = await reserve(['S1']);
      const first = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      const second = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      expect(second.tickets).toEqual(first.tickets);
      expect(fixture.payments.authorize).toHaveBeenCalledTimes(1);
    });

    it('releases the seats and answers 402 when the card is declined', async () => {
      const { booking_id } = await reserve(['S1', 'S2']);
      fixture.payments.authorize.mockResolvedValueOnce({
        status: 'declined',
        reason: 'Card declined',
      });

      const error = await rejectionOf(
        fixture.bookings.checkout(booking_id, CUSTOMER_A),
      );

      expect(error.getStatus()).toBe(402);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'PAYMENT_DECLINED',
        message: 'Card declined',
      });
      const booking = fixture.db.bookings.get(booking_id);
      expect(booking?.status).toBe(BookingStatus.FAILED);
      expect(booking?.releaseReason).toBe(ReleaseReason.PAYMENT_FAILED);
      expect(seatState('S1')).toBe(SeatState.FREE);
      expect(seatState('S2')).toBe(SeatState.FREE);
    });

    it('releases the seats when the payment gateway times out', async () => {
      const { booking_id } = await reserve(['S1']);
      fixture.payments.authorize.mockResolvedValueOnce({
        status: 'timeout',
        reason: 'No answer from payment gateway within 200ms',
      });

      const error = await rejectionOf(
        fixture.bookings.checkout(booking_id, CUSTOMER_A),
      );

      expect(error.getResponse()).toMatchObject({ errorCode: 'PAYMENT_TIMEOUT' });
      expect(fixture.db.bookings.get(booking_id)?.releaseReason).toBe(
        ReleaseReason.PAYMENT_TIMEOUT,
      );
      expect(seatState('S1')).toBe(SeatState.FREE);
    });

    it('reports a lapsed hold as expired without charging', async () => {
      const { booking_id, booking_code } = await reserve(['S1']);
      fixture.clock.advance(TEN_MINUTES + 1);

      const response = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      expect(response).toEqual({
        booking_id,
        booking_code,
        status: 'expired',
        tickets: [],
      });
      expect(fixture.payments.authorize).not.toHaveBeenCalled();
      expect(fixture.db.bookings.get(booking_id)?.releaseReason).toBe(
        ReleaseReason.EXPIRED,
      );
    });

    it('refunds the payment when the seats were lost during authorization', async () => {
      const { booking_id, booking_code } = await reserve(['S1']);
      fixture.payments.authorize.mockImplementationOnce(async () => {
        fixture.clock.advance(TEN_MINUTES + 1);
        valueOf(await fixture.engine.reserveSeats(CUSTOMER_B, EVENT_ID, ['S1']));
        return { status: 'authorized', paymentRef: 'TXN_TEST0009' };
      });

      const response = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      expect(response).toEqual({
        booking_id,
        booking_code,
        status: 'expired',
        payment_ref: 'TXN_TEST0009',
        payment_refunded: true,
        tickets: [],
      });
      expect(fixture.payments.refund).toHaveBeenCalledWith('TXN_TEST0009', 50);
      expect(fixture.payments.capture).not.toHaveBeenCalled();
      expect(fixture.db.tickets.size).toBe(0);
    });

    it('still confirms when the capture fails', async () => {
      const { booking_id } = await reserve(['S1']);
      fixture.payments.capture.mockRejectedValueOnce(new Error('gateway down'));

      const response = await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      expect(response.status).toBe('confirmed');
      expect(response.tickets).toHaveLength(1);
    });

    it('refuses cancelled bookings', async () => {
      const { booking_id } = await reserve(['S1']);
      await fixture.bookings.cancelBooking(booking_id, CUSTOMER_A);

      const error = await rejectionOf(
        fixture.bookings.checkout(booking_id, CUSTOMER_A),
      );

      expect(error.getStatus()).toBe(409);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'INVALID_BOOKING_STATE',
        details: { current_state: BookingStatus.CANCELLED },
      });
    });

    it('refuses other customers', async () => {
      const { booking_id } = await reserve(['S1']);

      const error = await rejectionOf(
        fixture.bookings.checkout(booking_id, CUSTOMER_B),
      );

      expect(error.getStatus()).toBe(403);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'NOT_BOOKING_OWNER',
      });
      expect(fixture.payments.authorize).not.toHaveBeenCalled();
    });
  });

  describe('cancelBooking', () => {
    it('frees the seats of a pending booking', async () => {
      const { booking_id } = await reserve(['S1', 'S2']);

      const response = await fixture.bookings.cancelBooking(
        booking_id,
        CUSTOMER_A,
      );

      expect(response.status).toBe(BookingStatus.CANCELLED);
      expect(response.release_reason).toBe(ReleaseReason.CANCELLED);
      expect(response.released_at).toBe('2030-01-01T10:00:00.000Z');
      expect(seatState('S1')).toBe(SeatState.FREE);
    });

    it('refuses confirmed bookings', async () => {
      const { booking_id } = await reserve(['S1']);
      await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      const error = await rejectionOf(
        fixture.bookings.cancelBooking(booking_id, CUSTOMER_A),
      );

      expect(error.getStatus()).toBe(409);
      expect(seatState('S1')).toBe(SeatState.BOOKED);
    });
  });

  describe('refundBooking', () => {
    it('frees the seats and refunds the payment once', async () => {
      const { booking_id } = await reserve(['S1', 'S2']);
      await fixture.bookings.checkout(booking_id, CUSTOMER_A);
      fixture.clock.advance(60 * 1000);

      const first = await fixture.bookings.refundBooking(booking_id, CUSTOMER_A);
      const second = await fixture.bookings.refundBooking(booking_id, CUSTOMER_A);

      expect(first.refunded_at).toBe('2030-01-01T10:01:00.000Z');
      expect(second).toEqual(first);
      expect(fixture.payments.refund).toHaveBeenCalledTimes(1);
      expect(fixture.payments.refund).toHaveBeenCalledWith(TEST_PAYMENT_REF, 100);
      expect(seatState('S1')).toBe(SeatState.FREE);
    });

    it('answers 502 when the payment refund fails', async () => {
      const { booking_id } = await reserve(['S1']);
      await fixture.bookings.checkout(booking_id, CUSTOMER_A);
      fixture.payments.refund.mockRejectedValueOnce(new Error('gateway down'));

      const error = await rejectionOf(
        fixture.bookings.refundBooking(booking_id, CUSTOMER_A),
      );

      expect(error.getStatus()).toBe(502);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'PAYMENT_REFUND_FAILED',
      });
      expect(seatState('S1')).toBe(SeatState.FREE);
    });
  });

  describe('getBooking', () => {
    it('describes each seat line', async () => {
      const { booking_id } = await reserve(['S1', 'S5']);

      const response = await fixture.bookings.getBooking(booking_id, CUSTOMER_A);

      expect(response.seats).toEqual([
        {
          seat_id: 'S1',
          section: 'NORTH',
          label: 'NORTH-A1',
          seat_type: 'standard',
          price: 50,
        },
        {
          seat_id: 'S5',
          section: 'EAST',
          label: 'EAST-B1',
          seat_type: 'premium',
          price: 80,
        },
      ]);
      expect(response.total_amount).toBe(130);
    });

    it('answers 404 for unknown bookings', async () => {
      const error = await rejectionOf(
        fixture.bookings.getBooking('booking-9999', CUSTOMER_A),
      );

      expect(error.getStatus()).toBe(404);
      expect(error.getResponse()).toMatchObject({
        errorCode: 'BOOKING_NOT_FOUND',
      });
    });
  });

  describe('getTickets', () => {
    it('lists the tickets with their gates', async () => {
      const { booking_id } = await reserve(['S1', 'S5']);
      await fixture.bookings.checkout(booking_id, CUSTOMER_A);

      const tickets = await fixture.bookings.getTickets(booking_id, CUSTOMER_A);

      expect(
        tickets.map(({ seat_id, access_gate, status }) => ({
          seat_id,
          access_gate,
          status,
        })),
      ).toEqual([
        { seat_id: 'S1', access_gate: 'Gate N', status: 'valid' },
        { seat_id: 'S5', access_gate: 'Gate E', status: 'valid' },
      ]);
      expect(tickets[0].ticket_code).toMatch(/^TK-[A-Z0-9]{10}$/);
    });
  });
});
