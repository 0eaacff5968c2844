import { Global, Module } from '@nestjs/common';
import { Clock, SystemClock } from './clock';
import { MongoTransactionRunner } from './mongo-transaction-runner.service';
import { TransactionRunner } from './transaction-runner';

/**
 * DatabaseModule provides the transaction runner and clock shared by every
 * module that writes booking state. The Mongo connection itself is
 * configured in AppModule.
 */
@Global()
@Module({
  providers: [
    { provide: Clock, useClass: SystemClock },
    { provide: TransactionRunner, useClass: MongoTransactionRunner },
  ],
  exports: [Clock, TransactionRunner],
})
export class DatabaseModule {}
