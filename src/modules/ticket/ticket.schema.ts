import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { TicketStatus } from './ticket.types';

export type TicketDocument = HydratedDocument<Ticket>;

@Schema({
  timestamps: true,
  collection: 'tickets',
})
export class Ticket {
  @Prop({
    required: true,
    unique: true,
    uppercase: true,
    maxlength: 20,
    comment: 'Code printed on the ticket (e.g., "TK-ABC12345")',
  })
  ticket_code!: string;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Booking', index: true })
  booking_id!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Seat' })
  seat_id!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'StadiumEvent' })
  event_id!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, ref: 'Customer', index: true })
  customer_id!: Types.ObjectId;

  @Prop({ required: true, maxlength: 20 })
  access_gate!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(TicketStatus),
    default: TicketStatus.VALID,
  })
  status!: TicketStatus;

  @Prop({
    type: Types.ObjectId,
    ref: 'Ticket',
    default: null,
    comment: 'Ticket this one replaced when transferred',
  })
  transferred_from!: Types.ObjectId | null;

  @Prop({ required: true, type: Date })
  issued_at!: Date;

  @Prop({ required: true, type: Number, default: 0 })
  lock_version!: number;
}

export const TicketSchema = SchemaFactory.createForClass(Ticket);

TicketSchema.index({ event_id: 1, seat_id: 1, status: 1 });
