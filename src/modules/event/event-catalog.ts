import { EventStatus } from './event.schema';

export interface EventRecord {
  id: string;
  stadiumId: string;
  name: string;
  startsAt: Date;
  status: EventStatus;
}

export interface NewEvent {
  stadiumId: string;
  name: string;
  startsAt: Date;
}

export abstract class EventCatalog {
  abstract findById(eventId: string): Promise<EventRecord | null>;

  abstract create(event: NewEvent): Promise<EventRecord>;
}

/**
 * Only scheduled events that have not started yet take reservations.
 */
export function isBookable(event: EventRecord, now: Date): boolean {
  return (
    event.status === EventStatus.SCHEDULED &&
    event.startsAt.getTime() > now.getTime()
  );
}
