import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { isObjectId, toObjectId } from '../database/mongo.util';
import { SeatCatalog, SeatRecord, seatLabel } from './seat-catalog';
import { Seat, SeatDocument } from './seat.schema';

type SeatLean = Seat & { _id: Types.ObjectId };

function toRecord(doc: SeatLean): SeatRecord {
  return {
    id: doc._id.toString(),
    stadiumId: doc.stadium_id.toString(),
    section: doc.section,
    row: doc.row,
    number: doc.number,
    seatType: doc.seat_type,
    price: doc.price,
    label: seatLabel(doc.section, doc.row, doc.number),
  };
}

@Injectable()
export class MongoSeatCatalog extends SeatCatalog {
  constructor(
    @InjectModel(Seat.name)
    private readonly seatModel: Model<SeatDocument>,
  ) {
    super();
  }

  async findSeats(
    stadiumId: string,
    seatIds: readonly string[],
  ): Promise<SeatRecord[]> {
    const validIds = seatIds.filter(isObjectId);
    if (!isObjectId(stadiumId) || validIds.length === 0) {
      return [];
    }

    const docs = await this.seatModel
      .find({
        _id: { $in: validIds.map(toObjectId) },
        stadium_id: toObjectId(stadiumId),
      })
      .lean<SeatLean[]>()
      .exec();

    return docs.map(toRecord);
  }

  async listSeats(stadiumId: string): Promise<SeatRecord[]> {
    if (!isObjectId(stadiumId)) {
      return [];
    }

    const docs = await this.seatModel
      .find({ stadium_id: toObjectId(stadiumId) })
      .sort({ section: 1, row: 1, number: 1 })
      .lean<SeatLean[]>()
      .exec();

    return docs.map(toRecord);
  }
}
