import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { bookingConfig, BookingConfig } from '../../config/booking.config';
import {
  BookingNotFoundError,
  InvalidStateError,
} from '../../common/errors/booking.errors';
import { describeError } from '../../common/utils/backoff.util';
import { Clock } from '../database/clock';
import { DistributedLockService } from '../redis/distributed-lock.service';
import { LOCK_RESERVATION_SWEEP } from '../redis/redis.constants';
import { SeatLedger } from '../seat-ledger/seat-ledger';
import { ReleaseReason } from './booking-state';
import { BookingEngine } from './booking-engine.service';
import { BookingRepository } from './booking-repository';

export interface SweepReport {
  /** Expired seat rows found */
  scanned: number;
  /** Bookings whose seats were given back */
  released: number;
  /** Bookings already settled by a concurrent confirm or release */
  skipped: number;
  /** Bookings left for the next run after a persistence failure */
  failed: number;
}

const SWEEP_LOCK_TTL_MS = 55000;

/**
 * ReservationSweepService releases reservations whose hold has lapsed
 *
 * Flow:
 * 1. Scan seat rows still reserved past their expiry (non-locking)
 * 2. Group them by booking
 * 3. Add pending bookings past their hold; a lapsed hold whose seats were
 *    all taken over by later reservations has no reserved row left
 * 4. releaseBooking(expired) for each booking, which takes the same locks
 *    in the same order as confirmBooking
 *
 * Losing a race to a confirm or a cancel is expected and only logged.
 * The Redis lock keeps instances from sweeping at the same time; the row
 * locks alone keep the result correct.
 */
@Injectable()
export class ReservationSweepService {
  private readonly logger = new Logger(ReservationSweepService.name);

  constructor(
    private readonly seatLedger: SeatLedger,
    private readonly bookingRepository: BookingRepository,
    private readonly bookingEngine: BookingEngine,
    private readonly distributedLockService: DistributedLockService,
    private readonly clock: Clock,
    @Inject(bookingConfig.KEY)
    private readonly config: BookingConfig,
  ) {}

  /**
   * Release expired holds - runs every minute
   */
  @Cron(CronExpression.EVERY_MINUTE, { name: 'reservation-sweep' })
  async handleCron(): Promise<void> {
    try {
      const outcome = await this.distributedLockService.withLock(
        LOCK_RESERVATION_SWEEP,
        () => this.sweep(this.clock.now()),
        { ttl: SWEEP_LOCK_TTL_MS, maxRetry: 0 },
      );

      if (!outcome.success) {
        this.logger.debug('Another instance is sweeping, skipping this run');
      }
    } catch (error) {
      this.logger.error(`Reservation sweep failed: ${describeError(error)}`);
    }
  }

  async sweep(now: Date): Promise<SweepReport> {
    const rows = await this.seatLedger.findExpiredReservations(
      now,
      this.config.sweepBatchSize,
    );
    const report: SweepReport = {
      scanned: rows.length,
      released: 0,
      skipped: 0,
      failed: 0,
    };

    const lapsed = await this.bookingRepository.findLapsedPending(
      now,
      this.config.sweepBatchSize,
    );

    const bookingIds = [
      ...new Set([
        ...rows.flatMap((row) => (row.bookingId ? [row.bookingId] : [])),
        ...lapsed,
      ]),
    ];

    for (const bookingId of bookingIds) {
      const result = await this.bookingEngine.releaseBooking(
        bookingId,
        ReleaseReason.EXPIRED,
      );

      if (result.success) {
        report.released += 1;
        continue;
      }

      const { error } = result;
      if (
        error instanceof InvalidStateError ||
        error instanceof BookingNotFoundError
      ) {
        report.skipped += 1;
        this.logger.debug(
          `Skipped expired booking ${bookingId}: ${error.message}`,
        );
      } else {
        report.failed += 1;
        this.logger.warn(
          `Could not release expired booking ${bookingId}: ${error.message}`,
        );
      }
    }

    if (bookingIds.length > 0) {
      this.logger.log(
        `Reservation sweep: ${report.released} released, ${report.skipped} skipped, ${report.failed} failed`,
      );
    }
    return report;
  }
}
