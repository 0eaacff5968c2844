import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

/**
 * Seat category, drives pricing
 */
export enum SeatType {
  STANDARD = 'standard',
  PREMIUM = 'premium',
  VIP = 'vip',
  ACCESSIBLE = 'accessible',
}

export type SeatDocument = HydratedDocument<Seat>;

/**
 * A physical seat. Immutable once created; per-event occupancy lives in
 * `seat_availability`.
 */
@Schema({
  timestamps: true,
  collection: 'seats',
})
export class Seat {
  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Stadium',
    index: true,
  })
  stadium_id!: Types.ObjectId;

  @Prop({
    required: true,
    trim: true,
    uppercase: true,
    maxlength: 20,
    comment: 'Section name (e.g., "NORTH", "M12")',
  })
  section!: string;

  @Prop({ required: true, trim: true, uppercase: true, maxlength: 5 })
  row!: string;

  @Prop({ required: true, min: 1 })
  number!: number;

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
    comment: 'Base price for this seat',
  })
  price!: number;
}

export const SeatSchema = SchemaFactory.createForClass(Seat);

SeatSchema.index(
  { stadium_id: 1, section: 1, row: 1, number: 1 },
  { unique: true },
);
