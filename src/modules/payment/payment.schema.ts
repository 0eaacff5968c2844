import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

/**
 * Payment status enum
 * - authorized: Funds held by the provider
 * - declined: Provider refused the authorization
 * - timed_out: Provider did not answer in time
 * - captured: Funds settled after the booking was confirmed
 * - refunded: Funds returned to the customer
 */
export enum PaymentStatus {
  AUTHORIZED = 'authorized',
  DECLINED = 'declined',
  TIMED_OUT = 'timed_out',
  CAPTURED = 'captured',
  REFUNDED = 'refunded',
}

export type PaymentDocument = HydratedDocument<Payment>;

@Schema({
  timestamps: true,
  collection: 'payments',
})
export class Payment {
  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Booking',
    index: true,
  })
  booking_id!: Types.ObjectId;

  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Customer',
    index: true,
  })
  customer_id!: Types.ObjectId;

  @Prop({
    type: String,
    default: null,
    comment: 'Provider reference, present once authorized',
  })
  payment_ref!: string | null;

  @Prop({
    required: true,
    min: 0,
    comment: 'Amount in major currency units',
  })
  amount!: number;

  @Prop({ required: true, type: String, maxlength: 10 })
  currency!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(PaymentStatus),
    index: true,
  })
  status!: PaymentStatus;

  @Prop({
    type: String,
    default: null,
    maxlength: 500,
    comment: 'Decline or timeout reason',
  })
  failure_reason!: string | null;

  @Prop({ type: Date, default: null })
  captured_at!: Date | null;

  @Prop({ type: Date, default: null })
  refunded_at!: Date | null;
}

export const PaymentSchema = SchemaFactory.createForClass(Payment);

PaymentSchema.index(
  { payment_ref: 1 },
  {
    unique: true,
    partialFilterExpression: { payment_ref: { $type: 'string' } },
  },
);
