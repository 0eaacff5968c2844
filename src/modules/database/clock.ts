import { Injectable } from '@nestjs/common';

/**
 * Source of "now" for the booking core. Swapped for a controllable clock in tests.
 */
export abstract class Clock {
  abstract now(): Date;
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}
