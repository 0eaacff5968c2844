import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { isObjectId, toObjectId } from '../database/mongo.util';
import { EventCatalog, EventRecord, NewEvent } from './event-catalog';
import {
  EventStatus,
  StadiumEvent,
  StadiumEventDocument,
} from './event.schema';

type EventLean = StadiumEvent & { _id: Types.ObjectId };

function toRecord(doc: EventLean): EventRecord {
  return {
    id: doc._id.toString(),
    stadiumId: doc.stadium_id.toString(),
    name: doc.name,
    startsAt: doc.starts_at,
    status: doc.status,
  };
}

@Injectable()
export class MongoEventCatalog extends EventCatalog {
  constructor(
    @InjectModel(StadiumEvent.name)
    private readonly eventModel: Model<StadiumEventDocument>,
  ) {
    super();
  }

  async findById(eventId: string): Promise<EventRecord | null> {
    if (!isObjectId(eventId)) {
      return null;
    }
    const doc = await this.eventModel
      .findById(toObjectId(eventId))
      .lean<EventLean>()
      .exec();
    return doc ? toRecord(doc) : null;
  }

  async create(event: NewEvent): Promise<EventRecord> {
    const doc = await this.eventModel.create({
      stadium_id: toObjectId(event.stadiumId),
      name: event.name,
      starts_at: event.startsAt,
      status: EventStatus.SCHEDULED,
    });
    return toRecord(doc.toObject());
  }
}
