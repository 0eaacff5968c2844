import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MongoSeatLedger } from './mongo-seat-ledger.service';
import { SeatLedger } from './seat-ledger';
import {
  SeatAvailability,
  SeatAvailabilitySchema,
} from './seat-availability.schema';

/**
 * SeatLedgerModule exposes the SeatLedger backed by `seat_availability`.
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: SeatAvailability.name, schema: SeatAvailabilitySchema },
    ]),
  ],
  providers: [{ provide: SeatLedger, useClass: MongoSeatLedger }],
  exports: [SeatLedger],
})
export class SeatLedgerModule {}
