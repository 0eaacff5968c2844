import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { ClientSession, Connection } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { bookingConfig, BookingConfig } from '../../config/booking.config';
import {
  BookingError,
  PersistenceFailureError,
} from '../../common/errors/booking.errors';
import {
  calculateBackoff,
  describeError,
  sleep,
} from '../../common/utils/backoff.util';
import { Clock } from './clock';
import {
  TransactionContext,
  TransactionRunner,
  TransactionWork,
} from './transaction-runner';
import { hasErrorLabel, isTransientTransactionError } from './mongo.util';

const RETRY_BASE_DELAY_MS = 20;

/**
 * MongoTransactionRunner executes booking work inside MongoDB multi-document
 * transactions.
 *
 * Locking model:
 * - A document written inside a transaction stays write-locked until commit
 * - A second transaction writing the same document fails fast with a
 *   TransientTransactionError (WriteConflict)
 * - The losing transaction is aborted and replayed with exponential backoff
 *   until LOCK_TIMEOUT_MS or TRANSACTION_MAX_RETRIES runs out
 *
 * Together this behaves like a bounded lock wait: contended rows are either
 * obtained within the window or the call fails with PersistenceFailureError.
 *
 * Requires MongoDB running as a replica set.
 */
@Injectable()
export class MongoTransactionRunner extends TransactionRunner {
  private readonly logger = new Logger(MongoTransactionRunner.name);

  constructor(
    @InjectConnection()
    private readonly connection: Connection,
    private readonly clock: Clock,
    @Inject(bookingConfig.KEY)
    private readonly config: BookingConfig,
  ) {
    super();
  }

  async run<T>(label: string, work: TransactionWork<T>): Promise<T> {
    const deadline = Date.now() + this.config.lockTimeoutMs;
    const maxRetries = this.config.transactionMaxRetries;

    for (let attempt = 0; ; attempt++) {
      const session = await this.connection.startSession();
      const ctx: TransactionContext = {
        id: uuidv4(),
        now: this.clock.now(),
        session,
      };

      try {
        session.startTransaction({
          readConcern: { level: 'snapshot' },
          writeConcern: { w: 'majority' },
          maxCommitTimeMS: this.config.lockTimeoutMs,
        });

        const result = await work(ctx);
        await this.commitWithRetry(session, label, deadline);
        return result;
      } catch (error) {
        await this.abortIfActive(session, label);

        if (error instanceof BookingError) {
          throw error;
        }

        const remaining = deadline - Date.now();
        if (
          isTransientTransactionError(error) &&
          attempt < maxRetries &&
          remaining > 0
        ) {
          const delay = Math.min(
            calculateBackoff(RETRY_BASE_DELAY_MS, attempt),
            remaining,
          );
          this.logger.debug(
            `${label}: write conflict, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries})`,
          );
          await sleep(delay);
          continue;
        }

        this.logger.warn(
          `${label} failed after ${attempt + 1} attempt(s): ${describeError(error)}`,
        );
        throw new PersistenceFailureError(
          `${label} could not be completed: ${describeError(error)}`,
          { cause: error },
        );
      } finally {
        await session.endSession();
      }
    }
  }

  /**
   * Commit, retrying while the outcome is unknown (e.g. a primary stepdown
   * during commit). Commit is idempotent for the same session.
   */
  private async commitWithRetry(
    session: ClientSession,
    label: string,
    deadline: number,
  ): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await session.commitTransaction();
        return;
      } catch (error) {
        const remaining = deadline - Date.now();
        if (
          hasErrorLabel(error, 'UnknownTransactionCommitResult') &&
          remaining > 0
        ) {
          const delay = Math.min(
            calculateBackoff(RETRY_BASE_DELAY_MS, attempt),
            remaining,
          );
          this.logger.warn(
            `${label}: commit result unknown, retrying commit in ${delay}ms`,
          );
          await sleep(delay);
          continue;
        }
        throw error;
      }
    }
  }

  private async abortIfActive(
    session: ClientSession,
    label: string,
  ): Promise<void> {
    if (!session.inTransaction()) {
      return;
    }
    try {
      await session.abortTransaction();
    } catch (error) {
      this.logger.error(
        `${label}: failed to abort transaction: ${describeError(error)}`,
      );
    }
  }
}
