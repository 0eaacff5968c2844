import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { sleep } from '../../common/utils/backoff.util';
import {
  AuthorizationOutcome,
  AuthorizationRequest,
  PaymentGateway,
} from './payment-gateway';

const SIMULATED_LATENCY_MS = 100;

/**
 * Stand-in provider used until a real acquirer is wired in. Approves every
 * positive amount after a short delay.
 */
@Injectable()
export class SimulatedPaymentGateway extends PaymentGateway {
  private readonly logger = new Logger(SimulatedPaymentGateway.name);

  async authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome> {
    this.logger.debug(
      `Authorizing ${request.amount} ${request.currency} for ${request.bookingRef}`,
    );
    await sleep(SIMULATED_LATENCY_MS);

    if (request.amount <= 0) {
      return { status: 'declined', reason: 'Amount must be positive' };
    }

    return {
      status: 'authorized',
      paymentRef: `TXN_${uuidv4().slice(0, 8).toUpperCase()}`,
    };
  }

  async capture(paymentRef: string): Promise<void> {
    this.logger.debug(`Capturing ${paymentRef}`);
    await sleep(SIMULATED_LATENCY_MS);
  }

  async refund(paymentRef: string, amount: number): Promise<void> {
    this.logger.debug(`Refunding ${amount} on ${paymentRef}`);
    await sleep(SIMULATED_LATENCY_MS);
  }
}
