import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { bookingConfig, BookingConfig } from '../../config/booking.config';
import { PersistenceFailureError } from '../../common/errors/booking.errors';
import {
  requireSession,
  TransactionContext,
} from '../database/transaction-runner';
import { isObjectId, toIdString, toObjectId } from '../database/mongo.util';
import { SeatLedger, SeatTransition } from './seat-ledger';
import {
  SeatAvailability,
  SeatAvailabilityDocument,
} from './seat-availability.schema';
import {
  SeatAvailabilityRecord,
  SeatState,
  sortSeatIds,
} from './seat-state';

function toRecord(doc: SeatAvailability): SeatAvailabilityRecord {
  return {
    eventId: doc.event_id.toString(),
    seatId: doc.seat_id.toString(),
    state: doc.state,
    holderId: toIdString(doc.holder_id),
    bookingId: toIdString(doc.booking_id),
    expiresAt: doc.expires_at ?? null,
    lockVersion: doc.lock_version ?? 0,
  };
}

/**
 * MongoSeatLedger stores seat occupancy in the `seat_availability` collection.
 *
 * Row locks use the write-to-lock pattern: lockForUpdate bumps
 * `lock_version` on each row inside the caller's transaction, which makes
 * MongoDB hold the document's write lock until commit or abort. A competing
 * transaction gets a WriteConflict and is replayed by the transaction runner.
 */
@Injectable()
export class MongoSeatLedger extends SeatLedger {
  private readonly logger = new Logger(MongoSeatLedger.name);

  constructor(
    @InjectModel(SeatAvailability.name)
    private readonly availabilityModel: Model<SeatAvailabilityDocument>,
    @Inject(bookingConfig.KEY)
    private readonly config: BookingConfig,
  ) {
    super();
  }

  async lockForUpdate(
    ctx: TransactionContext,
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]> {
    const session = requireSession(ctx);
    const eventObjectId = toObjectId(eventId);
    const rows: SeatAvailabilityRecord[] = [];

    // Sequential on purpose: the order of acquisition is the lock order
    for (const seatId of sortSeatIds(seatIds)) {
      const doc = await this.availabilityModel
        .findOneAndUpdate(
          { event_id: eventObjectId, seat_id: toObjectId(seatId) },
          {
            $inc: { lock_version: 1 },
            $setOnInsert: {
              state: SeatState.FREE,
              holder_id: null,
              booking_id: null,
              expires_at: null,
            },
          },
          {
            session,
            new: true,
            upsert: true,
            setDefaultsOnInsert: false,
            maxTimeMS: this.config.lockTimeoutMs,
          },
        )
        .lean<SeatAvailability>()
        .exec();

      if (!doc) {
        throw new PersistenceFailureError(
          `Seat ${seatId} for event ${eventId} could not be locked`,
        );
      }
      rows.push(toRecord(doc));
    }

    this.logger.debug(
      `[${ctx.id}] locked ${rows.length} seat row(s) for event ${eventId}`,
    );
    return rows;
  }

  async findExpiredReservations(
    now: Date,
    limit: number,
  ): Promise<SeatAvailabilityRecord[]> {
    const docs = await this.availabilityModel
      .find({ state: SeatState.RESERVED, expires_at: { $lt: now } })
      .sort({ expires_at: 1 })
      .limit(limit)
      .lean<SeatAvailability[]>()
      .exec();

    return docs.map(toRecord);
  }

  async materialize(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<number> {
    if (seatIds.length === 0) {
      return 0;
    }

    const eventObjectId = toObjectId(eventId);
    const result = await this.availabilityModel.bulkWrite(
      sortSeatIds(seatIds).map((seatId) => ({
        updateOne: {
          filter: { event_id: eventObjectId, seat_id: toObjectId(seatId) },
          update: {
            $setOnInsert: {
              state: SeatState.FREE,
              holder_id: null,
              booking_id: null,
              expires_at: null,
              lock_version: 0,
            },
          },
          upsert: true,
        },
      })),
      { ordered: false },
    );

    return result.upsertedCount;
  }

  protected async findRows(
    eventId: string,
    seatIds: readonly string[],
  ): Promise<SeatAvailabilityRecord[]> {
    const validIds = seatIds.filter(isObjectId);
    if (!isObjectId(eventId) || validIds.length === 0) {
      return [];
    }

    const docs = await this.availabilityModel
      .find({
        event_id: toObjectId(eventId),
        seat_id: { $in: validIds.map(toObjectId) },
      })
      .lean<SeatAvailability[]>()
      .exec();

    return docs.map(toRecord);
  }

  protected async writeTransitions(
    ctx: TransactionContext,
    transitions: readonly SeatTransition[],
  ): Promise<void> {
    const session = requireSession(ctx);

    for (const { row, to, holderId, bookingId, expiresAt } of transitions) {
      const result = await this.availabilityModel
        .updateOne(
          {
            event_id: toObjectId(row.eventId),
            seat_id: toObjectId(row.seatId),
            lock_version: row.lockVersion,
          },
          {
            $set: {
              state: to,
              holder_id: holderId ? toObjectId(holderId) : null,
              booking_id: bookingId ? toObjectId(bookingId) : null,
              expires_at: expiresAt,
            },
          },
          { session },
        )
        .exec();

      if (result.matchedCount !== 1) {
        throw new PersistenceFailureError(
          `Lock on seat ${row.seatId} for event ${row.eventId} was lost`,
        );
      }
    }
  }
}
