import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

/**
 * Event status enum
 * - scheduled: Event is upcoming and accepting bookings
 * - cancelled: Event has been called off
 * - completed: Event has taken place
 */
export enum EventStatus {
  SCHEDULED = 'scheduled',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
}

export type StadiumEventDocument = HydratedDocument<StadiumEvent>;

@Schema({
  timestamps: true,
  collection: 'events',
})
export class StadiumEvent {
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
    maxlength: 200,
    comment: 'Fixture name (e.g., "Heat vs Scorchers")',
  })
  name!: string;

  @Prop({ required: true, type: Date, index: true })
  starts_at!: Date;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(EventStatus),
    default: EventStatus.SCHEDULED,
    index: true,
  })
  status!: EventStatus;
}

export const StadiumEventSchema = SchemaFactory.createForClass(StadiumEvent);

StadiumEventSchema.index({ stadium_id: 1, starts_at: 1 });
