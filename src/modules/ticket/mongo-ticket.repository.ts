import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import {
  isObjectId,
  toIdString,
  toObjectId,
} from '../database/mongo.util';
import {
  requireSession,
  TransactionContext,
} from '../database/transaction-runner';
import { TicketRepository } from './ticket-repository';
import { Ticket, TicketDocument } from './ticket.schema';
import { NewTicket, TicketRecord, TicketStatus } from './ticket.types';

type TicketLean = Ticket & { _id: Types.ObjectId };

function toRecord(doc: TicketLean): TicketRecord {
  return {
    id: doc._id.toString(),
    ticketCode: doc.ticket_code,
    bookingId: doc.booking_id.toString(),
    seatId: doc.seat_id.toString(),
    eventId: doc.event_id.toString(),
    customerId: doc.customer_id.toString(),
    accessGate: doc.access_gate,
    status: doc.status,
    transferredFrom: toIdString(doc.transferred_from),
    issuedAt: doc.issued_at,
  };
}

@Injectable()
export class MongoTicketRepository extends TicketRepository {
  constructor(
    @InjectModel(Ticket.name)
    private readonly ticketModel: Model<TicketDocument>,
  ) {
    super();
  }

  async insertMany(
    ctx: TransactionContext,
    tickets: readonly NewTicket[],
  ): Promise<TicketRecord[]> {
    const session = requireSession(ctx);
    const docs = tickets.map((ticket) => ({
      _id: new Types.ObjectId(),
      ticket_code: ticket.ticketCode,
      booking_id: toObjectId(ticket.bookingId),
      seat_id: toObjectId(ticket.seatId),
      event_id: toObjectId(ticket.eventId),
      customer_id: toObjectId(ticket.customerId),
      access_gate: ticket.accessGate,
      status: TicketStatus.VALID,
      transferred_from: ticket.transferredFrom
        ? toObjectId(ticket.transferredFrom)
        : null,
      issued_at: ticket.issuedAt,
      lock_version: 0,
    }));

    await this.ticketModel.insertMany(docs, { session });
    return docs.map(toRecord);
  }

  async findByBooking(
    bookingId: string,
    ctx?: TransactionContext,
  ): Promise<TicketRecord[]> {
    if (!isObjectId(bookingId)) {
      return [];
    }
    const docs = await this.ticketModel
      .find({ booking_id: toObjectId(bookingId) })
      .sort({ seat_id: 1, issued_at: 1 })
      .session(ctx?.session ?? null)
      .lean<TicketLean[]>()
      .exec();
    return docs.map(toRecord);
  }

  async findById(ticketId: string): Promise<TicketRecord | null> {
    if (!isObjectId(ticketId)) {
      return null;
    }
    const doc = await this.ticketModel
      .findById(toObjectId(ticketId))
      .lean<TicketLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async lockById(
    ctx: TransactionContext,
    ticketId: string,
  ): Promise<TicketRecord | null> {
    if (!isObjectId(ticketId)) {
      return null;
    }
    const doc = await this.ticketModel
      .findOneAndUpdate(
        { _id: toObjectId(ticketId) },
        { $inc: { lock_version: 1 } },
        { session: requireSession(ctx), new: true },
      )
      .lean<TicketLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async updateStatus(
    ctx: TransactionContext,
    ticketIds: readonly string[],
    status: TicketStatus,
  ): Promise<void> {
    if (ticketIds.length === 0) {
      return;
    }
    await this.ticketModel
      .updateMany(
        { _id: { $in: ticketIds.map(toObjectId) } },
        { $set: { status } },
        { session: requireSession(ctx) },
      )
      .exec();
  }
}
