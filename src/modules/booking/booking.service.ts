import {
  BadGatewayException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { bookingConfig, BookingConfig } from '../../config/booking.config';
import { toHttpException } from '../../common/errors/booking-error.mapper';
import {
  BookingResult,
  InvalidStateError,
  PersistenceFailureError,
} from '../../common/errors/booking.errors';
import {
  calculateBackoff,
  describeError,
  sleep,
} from '../../common/utils/backoff.util';
import { Clock } from '../database/clock';
import { PaymentService } from '../payment/payment.service';
import {
  IDEMPOTENCY_RESERVE_PREFIX,
  IDEMPOTENCY_TTL_MS,
} from '../redis/redis.constants';
import { RedisService } from '../redis/redis.service';
import { TicketService } from '../ticket/ticket.service';
import {
  IssuedTicket,
  LIVE_TICKET_STATUSES,
  TicketRecord,
  toIssuedTicket,
} from '../ticket/ticket.types';
import { BookingEngine } from './booking-engine.service';
import { BookingStatus, ReleaseReason } from './booking-state';
import { BookingConfirmation, BookingRecord } from './booking.types';
import { ReserveSeatsDto } from './dto/reserve-seats.dto';
import {
  BookingDetailsResponse,
  CheckoutResponse,
  IssuedTicketResponse,
  ReservationResponse,
  TicketResponse,
} from './interfaces/booking-response.interface';

const RETRY_BASE_DELAY_MS = 50;

/**
 * BookingService is the application layer over BookingEngine.
 *
 * It checks ownership, drives payment around the engine's transactions,
 * retries persistence failures and turns engine results into HTTP
 * responses.
 *
 * Checkout flow:
 * 1. Hold already lapsed: release as expired, nothing is charged
 * 2. Authorize payment (bounded by the payment timeout)
 * 3. Declined or timed out: release the seats, respond 402
 * 4. Authorized: confirm; if the sweep won the race, refund and report expired
 * 5. Capture the payment
 */
@Injectable()
export class BookingService {
  private readonly logger = new Logger(BookingService.name);

  constructor(
    private readonly engine: BookingEngine,
    private readonly paymentService: PaymentService,
    private readonly ticketService: TicketService,
    private readonly redisService: RedisService,
    private readonly clock: Clock,
    @Inject(bookingConfig.KEY)
    private readonly config: BookingConfig,
  ) {}

  /**
   * Reserve seats for a customer. A repeated idempotency key returns the
   * first response, from Redis when cached and from the booking otherwise.
   */
  async reserveSeats(
    customerId: string,
    dto: ReserveSeatsDto,
    idempotencyKey?: string,
  ): Promise<ReservationResponse> {
    const cacheKey = idempotencyKey
      ? `${IDEMPOTENCY_RESERVE_PREFIX}${customerId}:${idempotencyKey}`
      : null;

    if (cacheKey) {
      const cached = await this.readCachedReservation(cacheKey);
      if (cached) {
        this.logger.debug(`Returning cached reservation for ${cacheKey}`);
        return cached;
      }
    }

    const booking = this.unwrap(
      await this.withRetry('reserveSeats', () =>
        this.engine.reserveSeats(customerId, dto.event_id, dto.seat_ids, {
          idempotencyKey,
        }),
      ),
    );
    const response = this.toReservationResponse(booking);

    if (cacheKey) {
      await this.cacheReservation(cacheKey, response);
    }
    return response;
  }

  async checkout(
    bookingId: string,
    customerId: string,
  ): Promise<CheckoutResponse> {
    const booking = await this.loadOwnedBooking(bookingId, customerId);

    if (booking.status === BookingStatus.CONFIRMED) {
      const confirmation = this.unwrap(
        await this.withRetry('confirmBooking', () =>
          this.engine.confirmBooking(booking.id),
        ),
      );
      return this.toCheckoutResponse(confirmation.booking, confirmation.tickets);
    }

    if (booking.status !== BookingStatus.PENDING) {
      throw toHttpException(
        new InvalidStateError(
          `Booking ${booking.bookingCode} is ${booking.status} and cannot be paid`,
          booking.status,
        ),
      );
    }

    if (booking.holdExpiresAt.getTime() < this.clock.now().getTime()) {
      this.unwrap(
        await this.withRetry('releaseBooking', () =>
          this.engine.releaseBooking(booking.id, ReleaseReason.EXPIRED),
        ),
      );
      this.logger.log(
        `Checkout for ${booking.bookingCode} arrived after the hold lapsed`,
      );
      return {
        booking_id: booking.id,
        booking_code: booking.bookingCode,
        status: 'expired',
        tickets: [],
      };
    }

    const attempt = await this.paymentService.authorize(
      {
        bookingId: booking.id,
        bookingCode: booking.bookingCode,
        customerId: booking.customerId,
        amount: booking.totalAmount,
        currency: booking.currency,
      },
      this.config.paymentTimeoutMs,
    );

    if (attempt.status !== 'authorized') {
      const reason =
        attempt.status === 'timeout'
          ? ReleaseReason.PAYMENT_TIMEOUT
          : ReleaseReason.PAYMENT_FAILED;
      const released = await this.withRetry('releaseBooking', () =>
        this.engine.releaseBooking(booking.id, reason),
      );
      if (!released.success) {
        this.logger.error(
          `Could not release ${booking.bookingCode} after ${reason}: ${released.error.message}`,
        );
      }
      throw new HttpException(
        {
          statusCode: HttpStatus.PAYMENT_REQUIRED,
          errorCode:
            attempt.status === 'timeout' ? 'PAYMENT_TIMEOUT' : 'PAYMENT_DECLINED',
          message: attempt.reason,
          timestamp: new Date().toISOString(),
        },
        HttpStatus.PAYMENT_REQUIRED,
      );
    }

    const paymentRef = attempt.paymentRef;
    const confirmed = await this.withRetry('confirmBooking', () =>
      this.engine.confirmBooking(booking.id, paymentRef),
    );

    let confirmation: BookingConfirmation;
    if (confirmed.success) {
      confirmation = confirmed.value;
    } else if (confirmed.error instanceof InvalidStateError) {
      this.logger.warn(
        `Booking ${booking.bookingCode} could not be confirmed after payment ${paymentRef}: ${confirmed.error.message}`,
      );
      const refunded = await this.refundPayment(
        paymentRef,
        booking.totalAmount,
        booking.bookingCode,
      );
      return {
        booking_id: booking.id,
        booking_code: booking.bookingCode,
        status: 'expired',
        payment_ref: paymentRef,
        payment_refunded: refunded,
        tickets: [],
      };
    } else if (confirmed.error instanceof PersistenceFailureError) {
      confirmation = await this.recoverConfirmation(booking, paymentRef);
    } else {
      throw toHttpException(confirmed.error);
    }

    try {
      await this.paymentService.capture(paymentRef);
    } catch (error) {
      this.logger.error(
        `Capture of ${paymentRef} for ${booking.bookingCode} failed: ${describeError(error)}`,
      );
    }

    return this.toCheckoutResponse(confirmation.booking, confirmation.tickets);
  }

  async cancelBooking(
    bookingId: string,
    customerId: string,
  ): Promise<BookingDetailsResponse> {
    const booking = await this.loadOwnedBooking(bookingId, customerId);
    const released = this.unwrap(
      await this.withRetry('releaseBooking', () =>
        this.engine.releaseBooking(booking.id, ReleaseReason.CANCELLED),
      ),
    );
    return this.toDetailsResponse(released);
  }

  /**
   * Refund a confirmed booking: free its seats, cancel its tickets and
   * return the money. A booking refunded before is returned as it is.
   */
  async refundBooking(
    bookingId: string,
    customerId: string,
  ): Promise<BookingDetailsResponse> {
    const booking = await this.loadOwnedBooking(bookingId, customerId);
    if (booking.refundedAt) {
      return this.toDetailsResponse(booking);
    }

    const refunded = this.unwrap(
      await this.withRetry('refundBooking', () =>
        this.engine.refundBooking(booking.id),
      ),
    );

    if (refunded.paymentRef) {
      try {
        await this.paymentService.refund(
          refunded.paymentRef,
          refunded.totalAmount,
        );
      } catch (error) {
        this.logger.error(
          `Seats of ${refunded.bookingCode} were released but refund of ${refunded.paymentRef} failed: ${describeError(error)}`,
        );
        throw new BadGatewayException({
          statusCode: 502,
          errorCode: 'PAYMENT_REFUND_FAILED',
          message: 'The booking was cancelled but the refund could not be sent',
          timestamp: new Date().toISOString(),
        });
      }
    }

    return this.toDetailsResponse(refunded);
  }

  async getBooking(
    bookingId: string,
    customerId: string,
  ): Promise<BookingDetailsResponse> {
    return this.toDetailsResponse(
      await this.loadOwnedBooking(bookingId, customerId),
    );
  }

  async getTickets(
    bookingId: string,
    customerId: string,
  ): Promise<TicketResponse[]> {
    const booking = await this.loadOwnedBooking(bookingId, customerId);
    const tickets = await this.ticketService.getTicketsForBooking(booking.id);
    return tickets.map((ticket) => this.toTicketResponse(ticket));
  }

  private async loadOwnedBooking(
    bookingId: string,
    customerId: string,
  ): Promise<BookingRecord> {
    const booking = this.unwrap(
      await this.withRetry('getBooking', () =>
        this.engine.getBooking(bookingId),
      ),
    );

    if (booking.customerId !== customerId) {
      throw new ForbiddenException({
        statusCode: 403,
        errorCode: 'NOT_BOOKING_OWNER',
        message: 'You do not have access to this booking',
        timestamp: new Date().toISOString(),
      });
    }
    return booking;
  }

  /**
   * The confirm transaction failed after every retry. Its commit may still
   * have landed, so read the booking back before giving the money back.
   */
  private async recoverConfirmation(
    booking: BookingRecord,
    paymentRef: string,
  ): Promise<BookingConfirmation> {
    const current = await this.engine.getBooking(booking.id);
    if (current.success && current.value.status === BookingStatus.CONFIRMED) {
      const tickets = await this.ticketService.getTicketsForBooking(booking.id);
      return {
        booking: current.value,
        tickets: tickets
          .filter((ticket) => LIVE_TICKET_STATUSES.includes(ticket.status))
          .map(toIssuedTicket),
        alreadyConfirmed: true,
      };
    }

    await this.refundPayment(paymentRef, booking.totalAmount, booking.bookingCode);
    throw new ServiceUnavailableException({
      statusCode: 503,
      errorCode: 'SERVICE_BUSY',
      message: 'The booking could not be confirmed. Your payment was refunded.',
      timestamp: new Date().toISOString(),
    });
  }

  private async refundPayment(
    paymentRef: string,
    amount: number,
    bookingCode: string,
  ): Promise<boolean> {
    try {
      await this.paymentService.refund(paymentRef, amount);
      return true;
    } catch (error) {
      this.logger.error(
        `Refund of ${paymentRef} for ${bookingCode} failed and needs reconciliation: ${describeError(error)}`,
      );
      return false;
    }
  }

  /**
   * Run an engine operation again while it fails with a retryable
   * persistence error, backing off between attempts.
   */
  private async withRetry<T>(
    label: string,
    operation: () => Promise<BookingResult<T>>,
  ): Promise<BookingResult<T>> {
    let result = await operation();

    for (
      let attempt = 0;
      attempt < this.config.persistenceRetryAttempts;
      attempt++
    ) {
      if (result.success || !result.error.retryable) {
        return result;
      }
      const delay = calculateBackoff(RETRY_BASE_DELAY_MS, attempt);
      this.logger.warn(
        `${label} failed (${result.error.message}), retrying in ${delay}ms`,
      );
      await sleep(delay);
      result = await operation();
    }

    return result;
  }

  private unwrap<T>(result: BookingResult<T>): T {
    if (!result.success) {
      throw toHttpException(result.error);
    }
    return result.value;
  }

  private async readCachedReservation(
    cacheKey: string,
  ): Promise<ReservationResponse | null> {
    try {
      const cached = await this.redisService.get(cacheKey);
      if (!cached) {
        return null;
      }
      const parsed: unknown = JSON.parse(cached);
      return isReservationResponse(parsed) ? parsed : null;
    } catch (error) {
      this.logger.warn(
        `Idempotency cache read failed for ${cacheKey}: ${describeError(error)}`,
      );
      return null;
    }
  }

  private async cacheReservation(
    cacheKey: string,
    response: ReservationResponse,
  ): Promise<void> {
    try {
      await this.redisService.set(
        cacheKey,
        JSON.stringify(response),
        IDEMPOTENCY_TTL_MS,
      );
    } catch (error) {
      this.logger.warn(
        `Idempotency cache write failed for ${cacheKey}: ${describeError(error)}`,
      );
    }
  }

  private toReservationResponse(booking: BookingRecord): ReservationResponse {
    return {
      booking_id: booking.id,
      booking_code: booking.bookingCode,
      event_id: booking.eventId,
      seat_ids: booking.seatIds,
      total_amount: booking.totalAmount,
      currency: booking.currency,
      status: booking.status,
      held_at: booking.heldAt.toISOString(),
      hold_expires_at: booking.holdExpiresAt.toISOString(),
    };
  }

  private toDetailsResponse(booking: BookingRecord): BookingDetailsResponse {
    return {
      id: booking.id,
      booking_code: booking.bookingCode,
      event_id: booking.eventId,
      customer_id: booking.customerId,
      seats: booking.lines.map((line) => ({
        seat_id: line.seatId,
        section: line.section,
        label: line.label,
        seat_type: line.seatType,
        price: line.price,
      })),
      total_amount: booking.totalAmount,
      currency: booking.currency,
      status: booking.status,
      held_at: booking.heldAt.toISOString(),
      hold_expires_at: booking.holdExpiresAt.toISOString(),
      confirmed_at: booking.confirmedAt?.toISOString(),
      released_at: booking.releasedAt?.toISOString(),
      release_reason: booking.releaseReason ?? undefined,
      refunded_at: booking.refundedAt?.toISOString(),
      payment_ref: booking.paymentRef ?? undefined,
    };
  }

  private toCheckoutResponse(
    booking: BookingRecord,
    tickets: IssuedTicket[],
  ): CheckoutResponse {
    return {
      booking_id: booking.id,
      booking_code: booking.bookingCode,
      status: 'confirmed',
      payment_ref: booking.paymentRef ?? undefined,
      tickets: tickets.map(
        (ticket): IssuedTicketResponse => ({
          ticket_id: ticket.ticketId,
          seat_id: ticket.seatId,
          event_id: ticket.eventId,
          booking_id: ticket.bookingId,
        }),
      ),
    };
  }

  private toTicketResponse(ticket: TicketRecord): TicketResponse {
    return {
      ticket_id: ticket.id,
      ticket_code: ticket.ticketCode,
      seat_id: ticket.seatId,
      event_id: ticket.eventId,
      customer_id: ticket.customerId,
      access_gate: ticket.accessGate,
      status: ticket.status,
      transferred_from: ticket.transferredFrom ?? undefined,
    };
  }
}

function isReservationResponse(value: unknown): value is ReservationResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'booking_id' in value &&
    typeof value.booking_id === 'string' &&
    'seat_ids' in value &&
    Array.isArray(value.seat_ids) &&
    'hold_expires_at' in value &&
    typeof value.hold_expires_at === 'string'
  );
}
