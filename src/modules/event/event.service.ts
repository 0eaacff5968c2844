import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { Clock } from '../database/clock';
import { SeatLedger } from '../seat-ledger/seat-ledger';
import { SeatState } from '../seat-ledger/seat-state';
import { SeatCatalog } from '../stadium/seat-catalog';
import { EventCatalog, EventRecord, NewEvent } from './event-catalog';
import {
  EventSeatMapResponse,
  SectionAvailability,
} from './interfaces/seat-map-response.interface';

/**
 * EventService schedules events and serves their seat maps
 *
 * Scheduling pre-creates one free seat_availability row per stadium seat so
 * the first reservations do not race to create rows. Rows missing for any
 * reason are still created lazily by the first lock.
 */
@Injectable()
export class EventService {
  private readonly logger = new Logger(EventService.name);

  constructor(
    private readonly eventCatalog: EventCatalog,
    private readonly seatCatalog: SeatCatalog,
    private readonly seatLedger: SeatLedger,
    private readonly clock: Clock,
  ) {}

  async scheduleEvent(input: NewEvent): Promise<EventRecord> {
    const seats = await this.seatCatalog.listSeats(input.stadiumId);
    if (seats.length === 0) {
      throw new BadRequestException({
        statusCode: 400,
        errorCode: 'STADIUM_HAS_NO_SEATS',
        message: `Stadium ${input.stadiumId} has no seats`,
        timestamp: new Date().toISOString(),
      });
    }

    const event = await this.eventCatalog.create(input);
    const created = await this.seatLedger.materialize(
      event.id,
      seats.map((seat) => seat.id),
    );

    this.logger.log(
      `Scheduled event ${event.id} (${event.name}) with ${created} seat rows`,
    );
    return event;
  }

  /**
   * Seat map of an event grouped by section, with live availability.
   * Reads are non-locking, so the map may be stale by the time it is shown.
   */
  async getSeatMap(eventId: string): Promise<EventSeatMapResponse> {
    const event = await this.eventCatalog.findById(eventId);
    if (!event) {
      throw new NotFoundException({
        statusCode: 404,
        errorCode: 'EVENT_NOT_FOUND',
        message: 'Event not found',
        timestamp: new Date().toISOString(),
      });
    }

    const seats = await this.seatCatalog.listSeats(event.stadiumId);
    const availability = await this.seatLedger.getAvailability(
      event.id,
      seats.map((seat) => seat.id),
      this.clock.now(),
    );

    const sections = new Map<string, SectionAvailability>();
    for (const seat of seats) {
      const state = availability.get(seat.id) ?? SeatState.FREE;
      let section = sections.get(seat.section);
      if (!section) {
        section = {
          section: seat.section,
          total_seats: 0,
          available_seats: 0,
          seats: [],
        };
        sections.set(seat.section, section);
      }

      section.total_seats += 1;
      if (state === SeatState.FREE) {
        section.available_seats += 1;
      }
      section.seats.push({
        seat_id: seat.id,
        label: seat.label,
        row: seat.row,
        number: seat.number,
        seat_type: seat.seatType,
        price: seat.price,
        state,
      });
    }

    const sectionList = [...sections.values()];
    return {
      event_id: event.id,
      event_name: event.name,
      starts_at: event.startsAt.toISOString(),
      status: event.status,
      total_seats: seats.length,
      available_seats: sectionList.reduce(
        (acc, section) => acc + section.available_seats,
        0,
      ),
      sections: sectionList,
    };
  }
}
