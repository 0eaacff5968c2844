import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { CustomerModule } from '../customer/customer.module';
import { EventModule } from '../event/event.module';
import { PaymentModule } from '../payment/payment.module';
import { SeatLedgerModule } from '../seat-ledger/seat-ledger.module';
import { StadiumModule } from '../stadium/stadium.module';
import { TicketModule } from '../ticket/ticket.module';
import { BookingEngine } from './booking-engine.service';
import { BookingRepository } from './booking-repository';
import { BookingController } from './booking.controller';
import { Booking, BookingSchema } from './booking.schema';
import { BookingService } from './booking.service';
import { MongoBookingRepository } from './mongo-booking.repository';
import { ReservationSweepService } from './reservation-sweep.service';

/**
 * BookingModule owns the booking lifecycle
 *
 * Features:
 * - Reserve seats all-or-nothing under row locks (BookingEngine)
 * - Checkout: payment, confirmation and ticket issuance
 * - Cancel, refund and automatic release of expired reservations
 *
 * Dependencies:
 * - DatabaseModule (global): TransactionRunner and Clock
 * - RedisModule (global): sweep lock and idempotency cache
 * - ScheduleModule: configured in AppModule for the expiry sweep
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: Booking.name, schema: BookingSchema }]),
    SeatLedgerModule,
    StadiumModule,
    EventModule,
    CustomerModule,
    TicketModule,
    PaymentModule,
  ],
  controllers: [BookingController],
  providers: [
    BookingEngine,
    BookingService,
    ReservationSweepService,
    { provide: BookingRepository, useClass: MongoBookingRepository },
  ],
  exports: [BookingEngine, BookingService],
})
export class BookingModule {}
