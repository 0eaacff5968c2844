import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { SeatLedgerModule } from '../seat-ledger/seat-ledger.module';
import { StadiumModule } from '../stadium/stadium.module';
import { EventCatalog } from './event-catalog';
import { EventController } from './event.controller';
import { StadiumEvent, StadiumEventSchema } from './event.schema';
import { EventService } from './event.service';
import { MongoEventCatalog } from './mongo-event-catalog.service';

/**
 * EventModule handles event scheduling and seat maps
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: StadiumEvent.name, schema: StadiumEventSchema },
    ]),
    StadiumModule,
    SeatLedgerModule,
  ],
  controllers: [EventController],
  providers: [
    EventService,
    { provide: EventCatalog, useClass: MongoEventCatalog },
  ],
  exports: [EventCatalog, EventService],
})
export class EventModule {}
