import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { SeatType } from '../stadium/seat.schema';
import { BookingStatus, ReleaseReason } from './booking-state';

/**
 * Individual seat information in a booking
 */
@Schema({ _id: false })
export class BookedSeat {
  @Prop({ required: true, type: Types.ObjectId, ref: 'Seat' })
  seat_id!: Types.ObjectId;

  @Prop({ required: true, type: String })
  section!: string;

  @Prop({
    required: true,
    type: String,
    comment: 'Seat label at booking time (e.g., "NORTH-C12")',
  })
  label!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(SeatType),
    default: SeatType.STANDARD,
  })
  seat_type!: SeatType;

  @Prop({
    required: true,
    min: 0,
    comment: 'Price for this specific seat',
  })
  price!: number;
}

export const BookedSeatSchema = SchemaFactory.createForClass(BookedSeat);

export type BookingDocument = HydratedDocument<Booking>;

@Schema({
  timestamps: true,
  collection: 'bookings',
})
export class Booking {
  @Prop({
    required: true,
    unique: true,
    trim: true,
    uppercase: true,
    maxlength: 20,
    comment: 'Human-readable booking code (e.g., "BK-ABC12345")',
  })
  booking_code!: string;

  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Customer',
    index: true,
  })
  customer_id!: Types.ObjectId;

  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'StadiumEvent',
    index: true,
  })
  event_id!: Types.ObjectId;

  @Prop({
    type: [BookedSeatSchema],
    required: true,
    validate: {
      validator: (seats: BookedSeat[]) => seats.length > 0,
      message: 'Booking must have at least one seat',
    },
    comment: 'Seats in ascending seat id order',
  })
  seats!: BookedSeat[];

  @Prop({
    required: true,
    min: 0,
    comment: 'Sum of all seat prices',
  })
  total_amount!: number;

  @Prop({
    required: true,
    type: String,
    maxlength: 10,
    comment: 'Currency code (e.g., AUD)',
  })
  currency!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(BookingStatus),
    default: BookingStatus.PENDING,
  })
  status!: BookingStatus;

  @Prop({
    required: true,
    type: Date,
    comment: 'When the seats were reserved',
  })
  held_at!: Date;

  @Prop({
    required: true,
    type: Date,
    comment: 'When the reservation lapses if not paid',
  })
  hold_expires_at!: Date;

  @Prop({ type: Date, default: null })
  confirmed_at!: Date | null;

  @Prop({
    type: Date,
    default: null,
    comment: 'When the seats were given back (failed or cancelled)',
  })
  released_at!: Date | null;

  @Prop({
    type: String,
    enum: Object.values(ReleaseReason),
    default: null,
  })
  release_reason!: ReleaseReason | null;

  @Prop({
    type: String,
    default: null,
    comment: 'Payment provider reference',
  })
  payment_ref!: string | null;

  @Prop({
    type: Date,
    default: null,
    comment: 'When a confirmed booking was refunded and its seats freed',
  })
  refunded_at!: Date | null;

  @Prop({
    type: String,
    default: null,
    maxlength: 64,
    comment: 'Idempotency key to prevent duplicate bookings',
  })
  idempotency_key!: string | null;

  @Prop({ required: true, type: Number, default: 0 })
  lock_version!: number;
}

export const BookingSchema = SchemaFactory.createForClass(Booking);

// Compound indexes for common query patterns
BookingSchema.index({ customer_id: 1, status: 1 });
BookingSchema.index({ event_id: 1, status: 1 });
BookingSchema.index(
  { customer_id: 1, idempotency_key: 1 },
  {
    unique: true,
    partialFilterExpression: { idempotency_key: { $type: 'string' } },
  },
);

// Sweep of pending bookings whose hold has lapsed
BookingSchema.index(
  { status: 1, hold_expires_at: 1 },
  { partialFilterExpression: { status: BookingStatus.PENDING } },
);
