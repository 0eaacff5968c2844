/**
 * Database Seeder Script
 *
 * Creates one stadium with its seat inventory, a few customers and some
 * scheduled events, each with a Free availability row for every seat.
 *
 * Usage: npm run seed
 *
 * Environment Variables:
 * - MONGO_URI: MongoDB connection string (required, from .env file)
 */

import mongoose, { Types } from 'mongoose';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

import { CustomerSchema } from '../modules/customer/customer.schema';
import { EventStatus, StadiumEventSchema } from '../modules/event/event.schema';
import { SeatAvailabilitySchema } from '../modules/seat-ledger/seat-availability.schema';
import { SeatState } from '../modules/seat-ledger/seat-state';
import { SeatSchema, SeatType } from '../modules/stadium/seat.schema';
import { StadiumSchema } from '../modules/stadium/stadium.schema';

interface SeedSection {
  name: string;
  rows: string[];
  seats_per_row: number;
  seat_type: string;
  price: number;
}

interface SeedData {
  stadium: { name: string; location: string; sections: SeedSection[] };
  customers: { name: string; email: string }[];
  events: { name: string; days_from_now: number; hour: number }[];
}

const logger = {
  info: (message: string, data?: unknown) => {
    console.log(`[INFO] ${message}`, data ? JSON.stringify(data, null, 2) : '');
  },
  success: (message: string, data?: unknown) => {
    console.log(
      `[SUCCESS] ${message}`,
      data ? JSON.stringify(data, null, 2) : '',
    );
  },
  error: (message: string, error?: unknown) => {
    console.error(`[ERROR] ${message}`, error);
  },
  warn: (message: string) => {
    console.warn(`[WARN] ${message}`);
  },
};

function isSeedData(value: unknown): value is SeedData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'stadium' in value &&
    typeof value.stadium === 'object' &&
    'customers' in value &&
    Array.isArray(value.customers) &&
    'events' in value &&
    Array.isArray(value.events)
  );
}

function toSeatType(value: string): SeatType {
  const match = Object.values(SeatType).find((type) => type === value);
  if (!match) {
    throw new Error(`Unknown seat type "${value}" in seed data`);
  }
  return match;
}

function loadSeedData(): SeedData {
  const raw = fs.readFileSync(
    path.join(__dirname, 'data', 'seed-data.json'),
    'utf-8',
  );
  const parsed: unknown = JSON.parse(raw);
  if (!isSeedData(parsed)) {
    throw new Error('seed-data.json does not have stadium, customers and events');
  }
  return parsed;
}

/**
 * One seat per row position in every section
 */
function buildSeats(stadiumId: Types.ObjectId, sections: SeedSection[]) {
  return sections.flatMap((section) => {
    const seatType = toSeatType(section.seat_type);
    return section.rows.flatMap((row) =>
      Array.from({ length: section.seats_per_row }, (_, index) => ({
        stadium_id: stadiumId,
        section: section.name,
        row,
        number: index + 1,
        seat_type: seatType,
        price: section.price,
      })),
    );
  });
}

function eventStart(daysFromNow: number, hour: number): Date {
  const start = new Date();
  start.setDate(start.getDate() + daysFromNow);
  start.setHours(hour, 0, 0, 0);
  return start;
}

async function seed(): Promise<void> {
  dotenv.config();

  const mongoUri = process.env.MONGO_URI;
  if (!mongoUri) {
    logger.error('MONGO_URI is not defined in .env file');
    process.exit(1);
  }

  logger.info('Starting database seeder...');
  logger.info(
    `Connecting to MongoDB: ${mongoUri.replace(/\/\/[^:]+:[^@]+@/, '//<credentials>@')}`,
  );

  try {
    await mongoose.connect(mongoUri);
    logger.success('Connected to MongoDB');

    const StadiumModel = mongoose.model('Stadium', StadiumSchema);
    const SeatModel = mongoose.model('Seat', SeatSchema);
    const CustomerModel = mongoose.model('Customer', CustomerSchema);
    const EventModel = mongoose.model('StadiumEvent', StadiumEventSchema);
    const AvailabilityModel = mongoose.model(
      'SeatAvailability',
      SeatAvailabilitySchema,
    );

    const data = loadSeedData();

    logger.warn('Clearing existing data...');
    await Promise.all([
      StadiumModel.deleteMany({}),
      SeatModel.deleteMany({}),
      CustomerModel.deleteMany({}),
      EventModel.deleteMany({}),
      AvailabilityModel.deleteMany({}),
    ]);

    const seatCount = data.stadium.sections.reduce(
      (total, section) => total + section.rows.length * section.seats_per_row,
      0,
    );
    const stadium = await StadiumModel.create({
      name: data.stadium.name,
      location: data.stadium.location,
      capacity: seatCount,
    });
    logger.success(`Created stadium ${stadium.name}`, { id: stadium._id });

    const seats = await SeatModel.insertMany(
      buildSeats(stadium._id, data.stadium.sections),
    );
    logger.success(`Created ${seats.length} seats`);

    const customers = await CustomerModel.insertMany(data.customers);
    logger.success(`Created ${customers.length} customers`, {
      customers: customers.map((c) => ({ id: c._id, email: c.email })),
    });

    const events = await EventModel.insertMany(
      data.events.map((event) => ({
        stadium_id: stadium._id,
        name: event.name,
        starts_at: eventStart(event.days_from_now, event.hour),
        status: EventStatus.SCHEDULED,
      })),
    );

    for (const event of events) {
      await AvailabilityModel.insertMany(
        seats.map((seat) => ({
          event_id: event._id,
          seat_id: seat._id,
          state: SeatState.FREE,
          holder_id: null,
          booking_id: null,
          expires_at: null,
          lock_version: 0,
        })),
      );
    }
    logger.success(`Created ${events.length} events`, {
      events: events.map((e) => ({
        id: e._id,
        name: e.name,
        starts_at: e.starts_at,
      })),
    });

    logger.success('Database seeding completed!');
  } catch (error) {
    logger.error('Seeding failed', error);
    process.exitCode = 1;
  } finally {
    await mongoose.disconnect();
    logger.info('Disconnected from MongoDB');
  }
}

seed().catch((error: unknown) => {
  logger.error('Seeder crashed', error);
  process.exit(1);
});
