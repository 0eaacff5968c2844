import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { SeatState } from './seat-state';

export type SeatAvailabilityDocument = HydratedDocument<SeatAvailability>;

@Schema({
  timestamps: true,
  collection: 'seat_availability',
})
export class SeatAvailability {
  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'StadiumEvent',
  })
  event_id!: Types.ObjectId;

  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Seat',
  })
  seat_id!: Types.ObjectId;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(SeatState),
    default: SeatState.FREE,
  })
  state!: SeatState;

  @Prop({
    type: Types.ObjectId,
    ref: 'Customer',
    default: null,
    comment: 'Customer holding the seat while reserved or booked',
  })
  holder_id!: Types.ObjectId | null;

  @Prop({
    type: Types.ObjectId,
    ref: 'Booking',
    default: null,
  })
  booking_id!: Types.ObjectId | null;

  @Prop({
    type: Date,
    default: null,
    comment: 'When the reservation lapses; null unless reserved',
  })
  expires_at!: Date | null;

  @Prop({
    required: true,
    type: Number,
    default: 0,
    comment: 'Bumped by every row lock, guards writes made under that lock',
  })
  lock_version!: number;
}

export const SeatAvailabilitySchema =
  SchemaFactory.createForClass(SeatAvailability);

// One row per seat per event
SeatAvailabilitySchema.index({ seat_id: 1, event_id: 1 }, { unique: true });

// Availability reads and the expiry sweep
SeatAvailabilitySchema.index({ event_id: 1, state: 1, expires_at: 1 });
SeatAvailabilitySchema.index(
  { state: 1, expires_at: 1 },
  {
    partialFilterExpression: {
      state: SeatState.RESERVED,
    },
  },
);
