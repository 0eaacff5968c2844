import { Inject, Injectable, Logger } from '@nestjs/common';
import { bookingConfig, BookingConfig } from '../../config/booking.config';
import {
  BookingError,
  BookingNotFoundError,
  BookingResult,
  fail,
  InvalidRequestError,
  InvalidStateError,
  ok,
  PersistenceFailureError,
  SeatUnavailableError,
} from '../../common/errors/booking.errors';
import { describeError } from '../../common/utils/backoff.util';
import { generateCode } from '../../common/utils/code.util';
import { CustomerDirectory } from '../customer/customer-directory';
import { Clock } from '../database/clock';
import { isMongoError } from '../database/mongo.util';
import {
  TransactionContext,
  TransactionRunner,
} from '../database/transaction-runner';
import { EventCatalog, isBookable } from '../event/event-catalog';
import { SeatLedger } from '../seat-ledger/seat-ledger';
import {
  effectiveSeatState,
  SeatAvailabilityRecord,
  SeatState,
} from '../seat-ledger/seat-state';
import { SeatCatalog, SeatRecord } from '../stadium/seat-catalog';
import { TicketRepository } from '../ticket/ticket-repository';
import {
  accessGateFor,
  LIVE_TICKET_STATUSES,
  TicketStatus,
  toIssuedTicket,
} from '../ticket/ticket.types';
import { BookingRepository } from './booking-repository';
import {
  BookingStatus,
  isTerminalStatus,
  isValidBookingTransition,
  ReleaseReason,
  releaseTargetStatus,
} from './booking-state';
import {
  BookingConfirmation,
  BookingRecord,
  ReserveOptions,
} from './booking.types';

/**
 * BookingEngine is the only writer of seat occupancy.
 *
 * Every operation runs in one database transaction and takes its locks in a
 * fixed order: the booking document first (when there is one), then seat
 * rows in ascending seat id. Two transactions can therefore never wait on
 * each other in a cycle.
 *
 * Flow:
 * 1. reserveSeats: Free -> Reserved for every requested seat, or nothing
 * 2. confirmBooking: Reserved -> Booked, tickets issued
 * 3. releaseBooking: Reserved -> Free (payment failure, cancel, expiry)
 * 4. refundBooking: Booked -> Free, tickets cancelled
 *
 * All operations return a BookingResult; nothing here throws for an
 * expected business outcome.
 */
@Injectable()
export class BookingEngine {
  private readonly logger = new Logger(BookingEngine.name);

  constructor(
    private readonly transactionRunner: TransactionRunner,
    private readonly seatLedger: SeatLedger,
    private readonly bookingRepository: BookingRepository,
    private readonly ticketRepository: TicketRepository,
    private readonly seatCatalog: SeatCatalog,
    private readonly eventCatalog: EventCatalog,
    private readonly customerDirectory: CustomerDirectory,
    private readonly clock: Clock,
    @Inject(bookingConfig.KEY)
    private readonly config: BookingConfig,
  ) {}

  /**
   * Reserve every seat in `seatIds` for the customer, or none of them.
   *
   * A seat whose reservation has lapsed counts as free even if the sweep
   * has not released it yet. On success the booking is pending and its
   * seats are held until `holdExpiresAt`.
   */
  async reserveSeats(
    customerId: string,
    eventId: string,
    seatIds: readonly string[],
    options: ReserveOptions = {},
  ): Promise<BookingResult<BookingRecord>> {
    return this.attempt('reserveSeats', async () => {
      // Step 1: Validate the request before taking any lock
      const seats = await this.loadReservableSeats(
        customerId,
        eventId,
        seatIds,
      );

      // Step 2: Lock, check and reserve inside one transaction
      const booking = await this.transactionRunner.run(
        'reserveSeats',
        async (ctx) => {
          if (options.idempotencyKey) {
            const existing = await this.bookingRepository.findByIdempotencyKey(
              ctx,
              customerId,
              options.idempotencyKey,
            );
            if (existing) {
              this.logger.debug(
                `Returning booking ${existing.bookingCode} for idempotency key ${options.idempotencyKey}`,
              );
              return existing;
            }
          }

          return this.reserveLocked(ctx, customerId, eventId, seats, options);
        },
      );

      this.logger.log(
        `Reserved ${booking.seatIds.length} seat(s) for booking ${booking.bookingCode} until ${booking.holdExpiresAt.toISOString()}`,
      );
      return booking;
    });
  }

  /**
   * Turn a pending booking's reservations into bookings and issue one
   * ticket per seat. Confirming an already confirmed booking returns its
   * existing tickets.
   */
  async confirmBooking(
    bookingId: string,
    paymentRef?: string,
  ): Promise<BookingResult<BookingConfirmation>> {
    return this.attempt('confirmBooking', async () => {
      const confirmation = await this.transactionRunner.run(
        'confirmBooking',
        async (ctx): Promise<BookingConfirmation> => {
          const booking = await this.lockBooking(ctx, bookingId);

          if (booking.status === BookingStatus.CONFIRMED) {
            const tickets = await this.ticketRepository.findByBooking(
              booking.id,
              ctx,
            );
            return {
              booking,
              tickets: tickets
                .filter((ticket) => LIVE_TICKET_STATUSES.includes(ticket.status))
                .map(toIssuedTicket),
              alreadyConfirmed: true,
            };
          }

          this.assertBookingTransition(booking, BookingStatus.CONFIRMED);

          const rows = await this.seatLedger.lockForUpdate(
            ctx,
            booking.eventId,
            booking.seatIds,
          );
          const lost = rows
            .filter((row) => !this.isReservedBy(row, booking))
            .map((row) => row.seatId);
          if (lost.length > 0) {
            throw new InvalidStateError(
              `Booking ${booking.bookingCode} no longer holds seats: ${lost.join(', ')}`,
              booking.status,
            );
          }

          await this.seatLedger.applyTransitions(
            ctx,
            rows.map((row) => ({
              row,
              to: SeatState.BOOKED,
              holderId: booking.customerId,
              bookingId: booking.id,
              expiresAt: null,
            })),
          );

          const sections = new Map(
            booking.lines.map((line) => [line.seatId, line.section]),
          );
          const tickets = await this.ticketRepository.insertMany(
            ctx,
            rows.map((row) => ({
              ticketCode: generateCode('TK', 10),
              bookingId: booking.id,
              seatId: row.seatId,
              eventId: booking.eventId,
              customerId: booking.customerId,
              accessGate: accessGateFor(sections.get(row.seatId) ?? ''),
              transferredFrom: null,
              issuedAt: ctx.now,
            })),
          );

          const confirmed = await this.bookingRepository.update(
            ctx,
            booking.id,
            {
              status: BookingStatus.CONFIRMED,
              confirmedAt: ctx.now,
              paymentRef: paymentRef ?? booking.paymentRef,
            },
          );

          return {
            booking: confirmed,
            tickets: tickets.map(toIssuedTicket),
            alreadyConfirmed: false,
          };
        },
      );

      if (!confirmation.alreadyConfirmed) {
        this.logger.log(
          `Confirmed booking ${confirmation.booking.bookingCode}, issued tickets: ${confirmation.tickets
            .map((ticket) => `${ticket.ticketId}@${ticket.seatId}`)
            .join(', ')}`,
        );
      }
      return confirmation;
    });
  }

  /**
   * Give a pending booking's seats back.
   *
   * Releasing a booking that already failed or was cancelled succeeds
   * without changing it, and frees any seat still reserved under it.
   * `expired` is refused while the hold has not lapsed.
   */
  async releaseBooking(
    bookingId: string,
    reason: ReleaseReason,
  ): Promise<BookingResult<BookingRecord>> {
    return this.attempt('releaseBooking', async () => {
      const { booking, freed } = await this.transactionRunner.run(
        'releaseBooking',
        async (ctx) => {
          const current = await this.lockBooking(ctx, bookingId);

          if (current.status === BookingStatus.CONFIRMED) {
            throw new InvalidStateError(
              `Booking ${current.bookingCode} is confirmed and cannot be released`,
              current.status,
            );
          }

          if (
            reason === ReleaseReason.EXPIRED &&
            current.status === BookingStatus.PENDING &&
            current.holdExpiresAt.getTime() >= ctx.now.getTime()
          ) {
            throw new InvalidStateError(
              `Booking ${current.bookingCode} holds its seats until ${current.holdExpiresAt.toISOString()}`,
              current.status,
            );
          }

          const rows = await this.seatLedger.lockForUpdate(
            ctx,
            current.eventId,
            current.seatIds,
          );
          const held = rows.filter((row) => this.isReservedBy(row, current));
          await this.seatLedger.applyTransitions(
            ctx,
            held.map((row) => ({
              row,
              to: SeatState.FREE,
              holderId: null,
              bookingId: null,
              expiresAt: null,
            })),
          );

          if (isTerminalStatus(current.status)) {
            return { booking: current, freed: held.length };
          }

          const released = await this.bookingRepository.update(
            ctx,
            current.id,
            {
              status: releaseTargetStatus(reason),
              releasedAt: ctx.now,
              releaseReason: reason,
            },
          );
          return { booking: released, freed: held.length };
        },
      );

      this.logger.log(
        `Released booking ${booking.bookingCode} (${reason}): ${freed} seat(s) freed, status ${booking.status}`,
      );
      return booking;
    });
  }

  /**
   * Undo a confirmed booking: cancel its tickets and free its seats. The
   * booking keeps its confirmed status and records when it was refunded.
   * Refused once any ticket has been used.
   */
  async refundBooking(
    bookingId: string,
  ): Promise<BookingResult<BookingRecord>> {
    return this.attempt('refundBooking', async () =>
      this.transactionRunner.run('refundBooking', async (ctx) => {
        const booking = await this.lockBooking(ctx, bookingId);

        if (booking.status !== BookingStatus.CONFIRMED) {
          throw new InvalidStateError(
            `Booking ${booking.bookingCode} is ${booking.status}; only confirmed bookings can be refunded`,
            booking.status,
          );
        }

        if (booking.refundedAt) {
          return booking;
        }

        const tickets = await this.ticketRepository.findByBooking(
          booking.id,
          ctx,
        );
        const used = tickets.filter(
          (ticket) => ticket.status === TicketStatus.USED,
        );
        if (used.length > 0) {
          throw new InvalidStateError(
            `Booking ${booking.bookingCode} has used tickets: ${used
              .map((ticket) => ticket.ticketCode)
              .join(', ')}`,
            booking.status,
          );
        }

        const rows = await this.seatLedger.lockForUpdate(
          ctx,
          booking.eventId,
          booking.seatIds,
        );
        await this.seatLedger.applyTransitions(
          ctx,
          rows
            .filter(
              (row) =>
                row.state === SeatState.BOOKED && row.bookingId === booking.id,
            )
            .map((row) => ({
              row,
              to: SeatState.FREE,
              holderId: null,
              bookingId: null,
              expiresAt: null,
            })),
        );

        await this.ticketRepository.updateStatus(
          ctx,
          tickets
            .filter((ticket) => ticket.status === TicketStatus.VALID)
            .map((ticket) => ticket.id),
          TicketStatus.CANCELLED,
        );

        const refunded = await this.bookingRepository.update(ctx, booking.id, {
          refundedAt: ctx.now,
        });
        this.logger.log(
          `Refunded booking ${booking.bookingCode}: ${rows.length} seat(s) freed`,
        );
        return refunded;
      }),
    );
  }

  async getBooking(bookingId: string): Promise<BookingResult<BookingRecord>> {
    return this.attempt('getBooking', async () => {
      const booking = await this.bookingRepository.findById(bookingId);
      if (!booking) {
        throw new BookingNotFoundError(bookingId);
      }
      return booking;
    });
  }

  /**
   * Check customer, event and seats, returning the seats in lock order.
   */
  private async loadReservableSeats(
    customerId: string,
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatRecord[]> {
    if (seatIds.length === 0) {
      throw new InvalidRequestError(
        'EMPTY_SEAT_LIST',
        'At least one seat must be requested',
      );
    }

    const distinct = new Set(seatIds);
    if (distinct.size !== seatIds.length) {
      throw new InvalidRequestError(
        'DUPLICATE_SEATS',
        'The same seat was requested more than once',
      );
    }

    if (seatIds.length > this.config.maxSeatsPerBooking) {
      throw new InvalidRequestError(
        'TOO_MANY_SEATS',
        `At most ${this.config.maxSeatsPerBooking} seats can be reserved at once`,
        { max_seats: this.config.maxSeatsPerBooking },
      );
    }

    if (!(await this.customerDirectory.exists(customerId))) {
      throw new InvalidRequestError(
        'CUSTOMER_NOT_FOUND',
        `Customer ${customerId} not found`,
      );
    }

    const event = await this.eventCatalog.findById(eventId);
    if (!event) {
      throw new InvalidRequestError(
        'EVENT_NOT_FOUND',
        `Event ${eventId} not found`,
      );
    }
    if (!isBookable(event, this.clock.now())) {
      throw new InvalidRequestError(
        'EVENT_NOT_BOOKABLE',
        `Event ${event.name} is ${event.status} and starts at ${event.startsAt.toISOString()}; it cannot accept reservations`,
      );
    }

    const seats = await this.seatCatalog.findSeats(event.stadiumId, seatIds);
    const known = new Set(seats.map((seat) => seat.id));
    const missing = [...distinct].filter((id) => !known.has(id)).sort();
    if (missing.length > 0) {
      throw new InvalidRequestError(
        'SEAT_NOT_FOUND',
        `Seats not found in this stadium: ${missing.join(', ')}`,
        { seat_ids: missing },
      );
    }

    return [...seats].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  private async reserveLocked(
    ctx: TransactionContext,
    customerId: string,
    eventId: string,
    seats: readonly SeatRecord[],
    options: ReserveOptions,
  ): Promise<BookingRecord> {
    const rows = await this.seatLedger.lockForUpdate(
      ctx,
      eventId,
      seats.map((seat) => seat.id),
    );

    // Re-check under the lock: any seat that is not free aborts everything
    const blocked = rows
      .filter((row) => effectiveSeatState(row, ctx.now) !== SeatState.FREE)
      .map((row) => row.seatId);
    if (blocked.length > 0) {
      throw new SeatUnavailableError(blocked);
    }

    const holdExpiresAt = new Date(
      ctx.now.getTime() + this.config.reservationWindowMinutes * 60 * 1000,
    );
    const lines = seats.map((seat) => ({
      seatId: seat.id,
      section: seat.section,
      label: seat.label,
      seatType: seat.seatType,
      price: seat.price,
    }));

    const booking = await this.bookingRepository.create(ctx, {
      bookingCode: generateCode('BK'),
      customerId,
      eventId,
      seatIds: lines.map((line) => line.seatId),
      lines,
      totalAmount: lines.reduce((sum, line) => sum + line.price, 0),
      currency: this.config.currency,
      heldAt: ctx.now,
      holdExpiresAt,
      idempotencyKey: options.idempotencyKey ?? null,
    });

    await this.seatLedger.applyTransitions(
      ctx,
      rows.map((row) => {
        if (row.state === SeatState.RESERVED) {
          this.logger.debug(
            `Seat ${row.seatId} taken over from lapsed booking ${row.bookingId}`,
          );
        }
        return {
          // A lapsed reservation is replaced as if the seat were free
          row: { ...row, state: effectiveSeatState(row, ctx.now) },
          to: SeatState.RESERVED,
          holderId: customerId,
          bookingId: booking.id,
          expiresAt: holdExpiresAt,
        };
      }),
    );

    return booking;
  }

  private async lockBooking(
    ctx: TransactionContext,
    bookingId: string,
  ): Promise<BookingRecord> {
    const booking = await this.bookingRepository.lockById(ctx, bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    return booking;
  }

  private isReservedBy(
    row: SeatAvailabilityRecord,
    booking: BookingRecord,
  ): boolean {
    return row.state === SeatState.RESERVED && row.bookingId === booking.id;
  }

  private assertBookingTransition(
    booking: BookingRecord,
    to: BookingStatus,
  ): void {
    if (!isValidBookingTransition(booking.status, to)) {
      throw new InvalidStateError(
        `Booking ${booking.bookingCode} is ${booking.status} and cannot become ${to}`,
        booking.status,
      );
    }
  }

  /**
   * Run an operation and fold its errors into a BookingResult. Driver
   * errors raised outside a transaction become PersistenceFailure;
   * anything else is a bug and propagates.
   */
  private async attempt<T>(
    operation: string,
    fn: () => Promise<T>,
  ): Promise<BookingResult<T>> {
    try {
      return ok(await fn());
    } catch (error) {
      if (error instanceof BookingError) {
        this.logger.debug(`${operation} rejected: ${error.code} ${error.message}`);
        return fail(error);
      }
      if (isMongoError(error)) {
        this.logger.warn(`${operation} storage error: ${describeError(error)}`);
        return fail(
          new PersistenceFailureError(
            `${operation} could not be completed: ${describeError(error)}`,
            { cause: error },
          ),
        );
      }
      throw error;
    }
  }
}
