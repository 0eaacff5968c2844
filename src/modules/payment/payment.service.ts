import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { describeError } from '../../common/utils/backoff.util';
import { toObjectId } from '../database/mongo.util';
import { AuthorizationOutcome, PaymentGateway } from './payment-gateway';
import { Payment, PaymentDocument, PaymentStatus } from './payment.schema';

export interface PaymentSubject {
  bookingId: string;
  bookingCode: string;
  customerId: string;
  amount: number;
  currency: string;
}

export type PaymentAttempt =
  | AuthorizationOutcome
  | { status: 'timeout'; reason: string };

/**
 * PaymentService talks to the PaymentGateway and keeps a record of every
 * authorization, capture and refund in the `payments` collection.
 *
 * It never touches seats or bookings; the booking flow decides what to do
 * with each outcome.
 */
@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(
    private readonly gateway: PaymentGateway,
    @InjectModel(Payment.name)
    private readonly paymentModel: Model<PaymentDocument>,
  ) {}

  /**
   * Ask the gateway to authorize the amount, giving up after `timeoutMs`.
   * A late approval after a timeout is logged and left to reconciliation.
   */
  async authorize(
    subject: PaymentSubject,
    timeoutMs: number,
  ): Promise<PaymentAttempt> {
    const pending = this.gateway.authorize({
      amount: subject.amount,
      currency: subject.currency,
      customerRef: subject.customerId,
      bookingRef: subject.bookingCode,
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<PaymentAttempt>((resolve) => {
      timer = setTimeout(
        () =>
          resolve({
            status: 'timeout',
            reason: `No answer from payment gateway within ${timeoutMs}ms`,
          }),
        timeoutMs,
      );
    });

    let attempt: PaymentAttempt;
    try {
      attempt = await Promise.race([pending, timeout]);
    } catch (error) {
      attempt = { status: 'declined', reason: describeError(error) };
    } finally {
      clearTimeout(timer);
    }

    if (attempt.status === 'timeout') {
      void pending
        .then((late) => {
          if (late.status === 'authorized') {
            this.logger.warn(
              `Late authorization ${late.paymentRef} for booking ${subject.bookingCode} after timeout`,
            );
          }
        })
        .catch((error: unknown) => {
          this.logger.warn(
            `Authorization for booking ${subject.bookingCode} failed after timeout: ${describeError(error)}`,
          );
        });
    }

    await this.paymentModel.create({
      booking_id: toObjectId(subject.bookingId),
      customer_id: toObjectId(subject.customerId),
      payment_ref: attempt.status === 'authorized' ? attempt.paymentRef : null,
      amount: subject.amount,
      currency: subject.currency,
      status: this.statusFor(attempt),
      failure_reason: attempt.status === 'authorized' ? null : attempt.reason,
    });

    this.logger.log(
      `Payment for booking ${subject.bookingCode}: ${attempt.status}`,
    );
    return attempt;
  }

  async capture(paymentRef: string): Promise<void> {
    await this.gateway.capture(paymentRef);
    await this.paymentModel
      .updateOne(
        { payment_ref: paymentRef, status: PaymentStatus.AUTHORIZED },
        { $set: { status: PaymentStatus.CAPTURED, captured_at: new Date() } },
      )
      .exec();
  }

  async refund(paymentRef: string, amount: number): Promise<void> {
    await this.gateway.refund(paymentRef, amount);
    await this.paymentModel
      .updateOne(
        { payment_ref: paymentRef, status: { $ne: PaymentStatus.REFUNDED } },
        { $set: { status: PaymentStatus.REFUNDED, refunded_at: new Date() } },
      )
      .exec();
    this.logger.log(`Refunded ${amount} on ${paymentRef}`);
  }

  private statusFor(attempt: PaymentAttempt): PaymentStatus {
    switch (attempt.status) {
      case 'authorized':
        return PaymentStatus.AUTHORIZED;
      case 'declined':
        return PaymentStatus.DECLINED;
      case 'timeout':
        return PaymentStatus.TIMED_OUT;
    }
  }
}
