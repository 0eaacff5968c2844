import { Test, TestingModule } from '@nestjs/testing';
import { bookingConfig, BookingConfig } from '../../src/config/booking.config';
import { BookingEngine } from '../../src/modules/booking/booking-engine.service';
import { BookingRepository } from '../../src/modules/booking/booking-repository';
import { BookingService } from '../../src/modules/booking/booking.service';
import { ReservationSweepService } from '../../src/modules/booking/reservation-sweep.service';
import { CustomerDirectory } from '../../src/modules/customer/customer-directory';
import { Clock } from '../../src/modules/database/clock';
import { TransactionRunner } from '../../src/modules/database/transaction-runner';
import { EventCatalog } from '../../src/modules/event/event-catalog';
import { EventStatus } from '../../src/modules/event/event.schema';
import { EventService } from '../../src/modules/event/event.service';
import {
  PaymentAttempt,
  PaymentService,
  PaymentSubject,
} from '../../src/modules/payment/payment.service';
import { DistributedLockService } from '../../src/modules/redis/distributed-lock.service';
import { RedisService } from '../../src/modules/redis/redis.service';
import { SeatLedger } from '../../src/modules/seat-ledger/seat-ledger';
import { SeatCatalog, seatLabel } from '../../src/modules/stadium/seat-catalog';
import { SeatType } from '../../src/modules/stadium/seat.schema';
import { TicketRepository } from '../../src/modules/ticket/ticket-repository';
import { TicketService } from '../../src/modules/ticket/ticket.service';
import {
  InMemoryBookingRepository,
  InMemoryCustomerDirectory,
  InMemoryEventCatalog,
  InMemorySeatCatalog,
  InMemorySeatLedger,
  InMemoryTicketRepository,
  InMemoryTransactionRunner,
} from './in-memory-adapters';
import { InMemoryDatabase } from './in-memory-database';
import { ManualClock } from './manual-clock';

export const STADIUM_ID = 'stadium-1';
export const EVENT_ID = 'event-1';
export const CUSTOMER_A = 'customer-a';
export const CUSTOMER_B = 'customer-b';
export const CUSTOMER_C = 'customer-c';

export const TEST_BOOKING_CONFIG: BookingConfig = {
  reservationWindowMinutes: 10,
  lockTimeoutMs: 1000,
  transactionMaxRetries: 2,
  persistenceRetryAttempts: 2,
  maxSeatsPerBooking: 4,
  sweepBatchSize: 100,
  paymentTimeoutMs: 200,
  currency: 'AUD',
};

/**
 * S1..S4 are standard seats in NORTH row A at 50; S5 and S6 are premium
 * seats in EAST row B at 80.
 */
const SEATS: {
  id: string;
  section: string;
  row: string;
  number: number;
  seatType: SeatType;
  price: number;
}[] = [
  { id: 'S1', section: 'NORTH', row: 'A', number: 1, seatType: SeatType.STANDARD, price: 50 },
  { id: 'S2', section: 'NORTH', row: 'A', number: 2, seatType: SeatType.STANDARD, price: 50 },
  { id: 'S3', section: 'NORTH', row: 'A', number: 3, seatType: SeatType.STANDARD, price: 50 },
  { id: 'S4', section: 'NORTH', row: 'A', number: 4, seatType: SeatType.STANDARD, price: 50 },
  { id: 'S5', section: 'EAST', row: 'B', number: 1, seatType: SeatType.PREMIUM, price: 80 },
  { id: 'S6', section: 'EAST', row: 'B', number: 2, seatType: SeatType.PREMIUM, price: 80 },
];

export const TEST_PAYMENT_REF = 'TXN_TEST0001';

export interface PaymentStub {
  authorize: jest.Mock<Promise<PaymentAttempt>, [PaymentSubject, number]>;
  capture: jest.Mock<Promise<void>, [string]>;
  refund: jest.Mock<Promise<void>, [string, number]>;
}

export interface RedisStub {
  cache: Map<string, string>;
  get: jest.Mock<Promise<string | null>, [string]>;
  set: jest.Mock<Promise<'OK'>, [string, string, number?]>;
}

export interface BookingFixture {
  module: TestingModule;
  db: InMemoryDatabase;
  clock: ManualClock;
  engine: BookingEngine;
  bookings: BookingService;
  payments: PaymentStub;
  redis: RedisStub;
  ledger: InMemorySeatLedger;
  tickets: TicketService;
  eventService: EventService;
  sweep: ReservationSweepService;
  lockService: { withLock: jest.Mock };
  events: InMemoryEventCatalog;
  customers: InMemoryCustomerDirectory;
}

export async function createBookingFixture(
  overrides: Partial<BookingConfig> = {},
): Promise<BookingFixture> {
  const db = new InMemoryDatabase();
  const clock = new ManualClock();
  const config = { ...TEST_BOOKING_CONFIG, ...overrides };
  db.lockWaitTimeoutMs = config.lockTimeoutMs;

  const ledger = new InMemorySeatLedger(db);
  const seatCatalog = new InMemorySeatCatalog();
  const events = new InMemoryEventCatalog();
  const customers = new InMemoryCustomerDirectory();

  for (const seat of SEATS) {
    seatCatalog.seats.push({
      ...seat,
      stadiumId: STADIUM_ID,
      label: seatLabel(seat.section, seat.row, seat.number),
    });
  }
  events.events.set(EVENT_ID, {
    id: EVENT_ID,
    stadiumId: STADIUM_ID,
    name: 'Harbour Hawks vs Valley Rovers',
    startsAt: new Date(clock.now().getTime() + 7 * 24 * 60 * 60 * 1000),
    status: EventStatus.SCHEDULED,
  });
  [CUSTOMER_A, CUSTOMER_B, CUSTOMER_C].forEach((id) =>
    customers.customerIds.add(id),
  );
  await ledger.materialize(
    EVENT_ID,
    SEATS.map((seat) => seat.id),
  );

  const lockService = {
    withLock: jest.fn(async (_resource: string, fn: () => Promise<unknown>) => ({
      success: true,
      result: await fn(),
    })),
  };

  const payments: PaymentStub = {
    authorize: jest.fn<Promise<PaymentAttempt>, [PaymentSubject, number]>(
      async () => ({ status: 'authorized', paymentRef: TEST_PAYMENT_REF }),
    ),
    capture: jest.fn<Promise<void>, [string]>(async () => undefined),
    refund: jest.fn<Promise<void>, [string, number]>(async () => undefined),
  };

  const cache = new Map<string, string>();
  const redis: RedisStub = {
    cache,
    get: jest.fn<Promise<string | null>, [string]>(
      async (key) => cache.get(key) ?? null,
    ),
    set: jest.fn<Promise<'OK'>, [string, string, number?]>(
      async (key, value) => {
        cache.set(key, value);
        return 'OK';
      },
    ),
  };

  const module = await Test.createTestingModule({
    providers: [
      BookingEngine,
      BookingService,
      TicketService,
      EventService,
      ReservationSweepService,
      { provide: Clock, useValue: clock },
      { provide: TransactionRunner, useValue: new InMemoryTransactionRunner(db, clock) },
      { provide: SeatLedger, useValue: ledger },
      { provide: BookingRepository, useValue: new InMemoryBookingRepository(db) },
      { provide: TicketRepository, useValue: new InMemoryTicketRepository(db) },
      { provide: SeatCatalog, useValue: seatCatalog },
      { provide: EventCatalog, useValue: events },
      { provide: CustomerDirectory, useValue: customers },
      { provide: DistributedLockService, useValue: lockService },
      { provide: PaymentService, useValue: payments },
      { provide: RedisService, useValue: redis },
      { provide: bookingConfig.KEY, useValue: config },
    ],
  }).compile();

  return {
    module,
    db,
    clock,
    engine: module.get(BookingEngine),
    bookings: module.get(BookingService),
    payments,
    redis,
    ledger,
    tickets: module.get(TicketService),
    eventService: module.get(EventService),
    sweep: module.get(ReservationSweepService),
    lockService,
    events,
    customers,
  };
}
