import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { PersistenceFailureError } from '../../common/errors/booking.errors';
import { isObjectId, toObjectId } from '../database/mongo.util';
import {
  requireSession,
  TransactionContext,
} from '../database/transaction-runner';
import { BookingRepository } from './booking-repository';
import { BookingStatus } from './booking-state';
import { Booking, BookingDocument } from './booking.schema';
import { BookingChanges, BookingRecord, NewBooking } from './booking.types';

type BookingLean = Booking & { _id: Types.ObjectId };

function toRecord(doc: BookingLean): BookingRecord {
  return {
    id: doc._id.toString(),
    bookingCode: doc.booking_code,
    customerId: doc.customer_id.toString(),
    eventId: doc.event_id.toString(),
    seatIds: doc.seats.map((seat) => seat.seat_id.toString()),
    lines: doc.seats.map((seat) => ({
      seatId: seat.seat_id.toString(),
      section: seat.section,
      label: seat.label,
      seatType: seat.seat_type,
      price: seat.price,
    })),
    totalAmount: doc.total_amount,
    currency: doc.currency,
    status: doc.status,
    heldAt: doc.held_at,
    holdExpiresAt: doc.hold_expires_at,
    confirmedAt: doc.confirmed_at ?? null,
    releasedAt: doc.released_at ?? null,
    releaseReason: doc.release_reason ?? null,
    paymentRef: doc.payment_ref ?? null,
    refundedAt: doc.refunded_at ?? null,
    idempotencyKey: doc.idempotency_key ?? null,
  };
}

function toUpdate(changes: BookingChanges): Partial<Booking> {
  const update: Partial<Booking> = {};
  if (changes.status !== undefined) update.status = changes.status;
  if (changes.confirmedAt !== undefined) {
    update.confirmed_at = changes.confirmedAt;
  }
  if (changes.releasedAt !== undefined) update.released_at = changes.releasedAt;
  if (changes.releaseReason !== undefined) {
    update.release_reason = changes.releaseReason;
  }
  if (changes.paymentRef !== undefined) update.payment_ref = changes.paymentRef;
  if (changes.refundedAt !== undefined) update.refunded_at = changes.refundedAt;
  return update;
}

@Injectable()
export class MongoBookingRepository extends BookingRepository {
  constructor(
    @InjectModel(Booking.name)
    private readonly bookingModel: Model<BookingDocument>,
  ) {
    super();
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    if (!isObjectId(bookingId)) {
      return null;
    }
    const doc = await this.bookingModel
      .findById(toObjectId(bookingId))
      .lean<BookingLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async findLapsedPending(now: Date, limit: number): Promise<string[]> {
    const docs = await this.bookingModel
      .find({ status: BookingStatus.PENDING, hold_expires_at: { $lt: now } })
      .sort({ hold_expires_at: 1, _id: 1 })
      .limit(limit)
      .select({ _id: 1 })
      .lean<{ _id: Types.ObjectId }[]>()
      .exec();
    return docs.map((doc) => doc._id.toString());
  }

  async findByIdempotencyKey(
    ctx: TransactionContext,
    customerId: string,
    idempotencyKey: string,
  ): Promise<BookingRecord | null> {
    const doc = await this.bookingModel
      .findOne({
        customer_id: toObjectId(customerId),
        idempotency_key: idempotencyKey,
      })
      .session(requireSession(ctx))
      .lean<BookingLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async lockById(
    ctx: TransactionContext,
    bookingId: string,
  ): Promise<BookingRecord | null> {
    if (!isObjectId(bookingId)) {
      return null;
    }
    const doc = await this.bookingModel
      .findOneAndUpdate(
        { _id: toObjectId(bookingId) },
        { $inc: { lock_version: 1 } },
        { session: requireSession(ctx), new: true },
      )
      .lean<BookingLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async create(
    ctx: TransactionContext,
    booking: NewBooking,
  ): Promise<BookingRecord> {
    const [doc] = await this.bookingModel.create(
      [
        {
          booking_code: booking.bookingCode,
          customer_id: toObjectId(booking.customerId),
          event_id: toObjectId(booking.eventId),
          seats: booking.lines.map((line) => ({
            seat_id: toObjectId(line.seatId),
            section: line.section,
            label: line.label,
            seat_type: line.seatType,
            price: line.price,
          })),
          total_amount: booking.totalAmount,
          currency: booking.currency,
          status: BookingStatus.PENDING,
          held_at: booking.heldAt,
          hold_expires_at: booking.holdExpiresAt,
          idempotency_key: booking.idempotencyKey,
          lock_version: 0,
        },
      ],
      { session: requireSession(ctx) },
    );
    return toRecord(doc.toObject());
  }

  async update(
    ctx: TransactionContext,
    bookingId: string,
    changes: BookingChanges,
  ): Promise<BookingRecord> {
    const doc = await this.bookingModel
      .findOneAndUpdate(
        { _id: toObjectId(bookingId) },
        { $set: toUpdate(changes) },
        { session: requireSession(ctx), new: true },
      )
      .lean<BookingLean>()
      .exec();

    if (!doc) {
      throw new PersistenceFailureError(
        `Booking ${bookingId} disappeared during update`,
      );
    }
    return toRecord(doc);
  }
}
