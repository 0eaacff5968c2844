import {
  BookingNotFoundError,
  PersistenceFailureError,
} from '../../src/common/errors/booking.errors';
import { BookingRepository } from '../../src/modules/booking/booking-repository';
import {
  BookingChanges,
  BookingRecord,
  NewBooking,
} from '../../src/modules/booking/booking.types';
import { BookingStatus } from '../../src/modules/booking/booking-state';
import { CustomerDirectory } from '../../src/modules/customer/customer-directory';
import { Clock } from '../../src/modules/database/clock';
import {
  TransactionContext,
  TransactionRunner,
  TransactionWork,
} from '../../src/modules/database/transaction-runner';
import {
  EventCatalog,
  EventRecord,
  NewEvent,
} from '../../src/modules/event/event-catalog';
import { EventStatus } from '../../src/modules/event/event.schema';
import {
  SeatLedger,
  SeatTransition,
} from '../../src/modules/seat-ledger/seat-ledger';
import {
  freeSeatRow,
  isReservationExpired,
  SeatAvailabilityRecord,
  sortSeatIds,
} from '../../src/modules/seat-ledger/seat-state';
import {
  SeatCatalog,
  SeatRecord,
} from '../../src/modules/stadium/seat-catalog';
import { TicketRepository } from '../../src/modules/ticket/ticket-repository';
import {
  NewTicket,
  TicketRecord,
  TicketStatus,
} from '../../src/modules/ticket/ticket.types';
import { InMemoryDatabase, seatKey } from './in-memory-database';

export class InMemoryTransactionRunner extends TransactionRunner {
  private counter = 0;

  constructor(
    private readonly db: InMemoryDatabase,
    private readonly clock: Clock,
  ) {
    super();
  }

  async run<T>(label: string, work: TransactionWork<T>): Promise<T> {
    this.counter += 1;
    const ctx: TransactionContext = {
      id: `${label}#${this.counter}`,
      now: this.clock.now(),
    };

    this.db.begin(ctx.id, label);
    try {
      const result = await work(ctx);
      this.db.commit(ctx.id);
      return result;
    } catch (error) {
      this.db.rollback(ctx.id);
      throw error;
    }
  }
}

export class InMemorySeatLedger extends SeatLedger {
  constructor(private readonly db: InMemoryDatabase) {
    super();
  }

  async lockForUpdate(
    ctx: TransactionContext,
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]> {
    const rows: SeatAvailabilityRecord[] = [];
    for (const seatId of sortSeatIds(seatIds)) {
      const key = seatKey(eventId, seatId);
      await this.db.lock(ctx.id, key);
      const current =
        this.db.readSeatRow(ctx.id, key) ?? freeSeatRow(eventId, seatId);
      const locked = { ...current, lockVersion: current.lockVersion + 1 };
      this.db.stageSeatRow(ctx.id, key, locked);
      rows.push(locked);
    }
    return rows;
  }

  async findExpiredReservations(
    now: Date,
    limit: number,
  ): Promise<SeatAvailabilityRecord[]> {
    return [...this.db.seatRows.values()]
      .filter((row) => isReservationExpired(row, now))
      .sort(
        (a, b) => (a.expiresAt?.getTime() ?? 0) - (b.expiresAt?.getTime() ?? 0),
      )
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  async materialize(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<number> {
    let created = 0;
    for (const seatId of sortSeatIds(seatIds)) {
      const key = seatKey(eventId, seatId);
      if (!this.db.seatRows.has(key)) {
        this.db.seatRows.set(key, freeSeatRow(eventId, seatId));
        created += 1;
      }
    }
    return created;
  }

  protected async findRows(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]> {
    return seatIds.flatMap((seatId) => {
      const row = this.db.readSeatRow(null, seatKey(eventId, seatId));
      return row ? [row] : [];
    });
  }

  protected async writeTransitions(
    ctx: TransactionContext,
    transitions: readonly SeatTransition[],
  ): Promise<void> {
    for (const { row, to, holderId, bookingId, expiresAt } of transitions) {
      const key = seatKey(row.eventId, row.seatId);
      const current = this.db.readSeatRow(ctx.id, key);
      if (!current || current.lockVersion !== row.lockVersion) {
        throw new PersistenceFailureError(
          `Seat ${row.seatId} changed since it was locked`,
        );
      }
      this.db.stageSeatRow(ctx.id, key, {
        ...current,
        state: to,
        holderId,
        bookingId,
        expiresAt,
      });
    }
  }
}

export class InMemoryBookingRepository extends BookingRepository {
  constructor(private readonly db: InMemoryDatabase) {
    super();
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    return this.db.readBooking(null, bookingId) ?? null;
  }

  async findLapsedPending(now: Date, limit: number): Promise<string[]> {
    return this.db
      .listBookings(null)
      .filter(
        (booking) =>
          booking.status === BookingStatus.PENDING &&
          booking.holdExpiresAt.getTime() < now.getTime(),
      )
      .sort(
        (a, b) =>
          a.holdExpiresAt.getTime() - b.holdExpiresAt.getTime() ||
          a.id.localeCompare(b.id),
      )
      .slice(0, limit)
      .map((booking) => booking.id);
  }

  async findByIdempotencyKey(
    ctx: TransactionContext,
    customerId: string,
    idempotencyKey: string,
  ): Promise<BookingRecord | null> {
    return (
      this.db
        .listBookings(ctx.id)
        .find(
          (booking) =>
            booking.customerId === customerId &&
            booking.idempotencyKey === idempotencyKey,
        ) ?? null
    );
  }

  async lockById(
    ctx: TransactionContext,
    bookingId: string,
  ): Promise<BookingRecord | null> {
    if (!this.db.readBooking(ctx.id, bookingId)) {
      return null;
    }
    await this.db.lock(ctx.id, `booking:${bookingId}`);
    return this.db.readBooking(ctx.id, bookingId) ?? null;
  }

  async create(
    ctx: TransactionContext,
    booking: NewBooking,
  ): Promise<BookingRecord> {
    const record: BookingRecord = {
      ...booking,
      id: this.db.nextId('booking'),
      status: BookingStatus.PENDING,
      confirmedAt: null,
      releasedAt: null,
      releaseReason: null,
      paymentRef: null,
      refundedAt: null,
    };
    this.db.stageBooking(ctx.id, record);
    return { ...record };
  }

  async update(
    ctx: TransactionContext,
    bookingId: string,
    changes: BookingChanges,
  ): Promise<BookingRecord> {
    const current = this.db.readBooking(ctx.id, bookingId);
    if (!current) {
      throw new BookingNotFoundError(bookingId);
    }
    const updated = { ...current, ...changes };
    this.db.stageBooking(ctx.id, updated);
    return { ...updated };
  }
}

export class InMemoryTicketRepository extends TicketRepository {
  constructor(private readonly db: InMemoryDatabase) {
    super();
  }

  async insertMany(
    ctx: TransactionContext,
    tickets: readonly NewTicket[],
  ): Promise<TicketRecord[]> {
    return tickets.map((ticket) => {
      const record: TicketRecord = {
        ...ticket,
        id: this.db.nextId('ticket'),
        status: TicketStatus.VALID,
      };
      this.db.stageTicket(ctx.id, record);
      return { ...record };
    });
  }

  async findByBooking(
    bookingId: string,
    ctx?: TransactionContext,
  ): Promise<TicketRecord[]> {
    return this.db
      .listTickets(ctx ? ctx.id : null)
      .filter((ticket) => ticket.bookingId === bookingId)
      .sort((a, b) =>
        a.seatId === b.seatId
          ? a.id.localeCompare(b.id)
          : a.seatId.localeCompare(b.seatId),
      );
  }

  async findById(ticketId: string): Promise<TicketRecord | null> {
    return this.db.readTicket(null, ticketId) ?? null;
  }

  async lockById(
    ctx: TransactionContext,
    ticketId: string,
  ): Promise<TicketRecord | null> {
    if (!this.db.readTicket(ctx.id, ticketId)) {
      return null;
    }
    await this.db.lock(ctx.id, `ticket:${ticketId}`);
    return this.db.readTicket(ctx.id, ticketId) ?? null;
  }

  async updateStatus(
    ctx: TransactionContext,
    ticketIds: readonly string[],
    status: TicketStatus,
  ): Promise<void> {
    for (const id of ticketIds) {
      const current = this.db.readTicket(ctx.id, id);
      if (current) {
        this.db.stageTicket(ctx.id, { ...current, status });
      }
    }
  }
}

export class InMemorySeatCatalog extends SeatCatalog {
  readonly seats: SeatRecord[] = [];

  async findSeats(
    stadiumId: string,
    seatIds: readonly string[],
  ): Promise<SeatRecord[]> {
    const wanted = new Set(seatIds);
    return this.seats.filter(
      (seat) => seat.stadiumId === stadiumId && wanted.has(seat.id),
    );
  }

  async listSeats(stadiumId: string): Promise<SeatRecord[]> {
    return this.seats.filter((seat) => seat.stadiumId === stadiumId);
  }
}

export class InMemoryEventCatalog extends EventCatalog {
  readonly events = new Map<string, EventRecord>();

  async findById(eventId: string): Promise<EventRecord | null> {
    return this.events.get(eventId) ?? null;
  }

  async create(event: NewEvent): Promise<EventRecord> {
    const record: EventRecord = {
      ...event,
      id: `event-${this.events.size + 1}`,
      status: EventStatus.SCHEDULED,
    };
    this.events.set(record.id, record);
    return record;
  }
}

export class InMemoryCustomerDirectory extends CustomerDirectory {
  readonly customerIds = new Set<string>();

  async exists(customerId: string): Promise<boolean> {
    return this.customerIds.has(customerId);
  }
}
