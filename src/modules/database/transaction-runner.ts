import { ClientSession } from 'mongoose';

/**
 * Handle passed to every step of a booking transaction.
 *
 * - id: unique per attempt, identifies the lock owner
 * - now: the single timestamp the whole transaction reasons with
 * - session: the MongoDB session carrying the transaction, absent for
 *   stores that manage transactions themselves
 */
export interface TransactionContext {
  readonly id: string;
  readonly now: Date;
  readonly session?: ClientSession;
}

export type TransactionWork<T> = (ctx: TransactionContext) => Promise<T>;

/**
 * Runs a unit of work inside a database transaction.
 *
 * Implementations commit when the work resolves and roll back when it
 * rejects. Domain errors (BookingError) pass through unchanged; storage
 * errors, lock wait timeouts and exhausted conflict retries surface as
 * PersistenceFailureError.
 */
export abstract class TransactionRunner {
  abstract run<T>(label: string, work: TransactionWork<T>): Promise<T>;
}

export function requireSession(ctx: TransactionContext): ClientSession {
  if (!ctx.session) {
    throw new Error(
      `Transaction ${ctx.id} has no session; row locks are only available inside MongoTransactionRunner`,
    );
  }
  return ctx.session;
}
