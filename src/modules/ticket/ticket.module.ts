import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CustomerModule } from '../customer/customer.module';
import { MongoTicketRepository } from './mongo-ticket.repository';
import { TicketRepository } from './ticket-repository';
import { TicketController } from './ticket.controller';
import { Ticket, TicketSchema } from './ticket.schema';
import { TicketService } from './ticket.service';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Ticket.name, schema: TicketSchema }]),
    CustomerModule,
  ],
  controllers: [TicketController],
  providers: [
    TicketService,
    { provide: TicketRepository, useClass: MongoTicketRepository },
  ],
  exports: [TicketRepository, TicketService],
})
export class TicketModule {}
