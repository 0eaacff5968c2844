import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MongoSeatCatalog } from './mongo-seat-catalog.service';
import { SeatCatalog } from './seat-catalog';
import { Seat, SeatSchema } from './seat.schema';
import { Stadium, StadiumSchema } from './stadium.schema';

/**
 * StadiumModule owns stadiums and their physical seats
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Stadium.name, schema: StadiumSchema },
      { name: Seat.name, schema: SeatSchema },
    ]),
  ],
  providers: [{ provide: SeatCatalog, useClass: MongoSeatCatalog }],
  exports: [SeatCatalog],
})
export class StadiumModule {}
