import { Clock } from '../../src/modules/database/clock';

/**
 * Clock that only moves when a test moves it.
 */
export class ManualClock extends Clock {
  private current: Date;

  constructor(start: Date | string = '2030-01-01T10:00:00.000Z') {
    super();
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): Date {
    this.current = new Date(this.current.getTime() + ms);
    return this.now();
  }

  advanceMinutes(minutes: number): Date {
    return this.advance(minutes * 60 * 1000);
  }

  set(to: Date | string): void {
    this.current = new Date(to);
  }
}
