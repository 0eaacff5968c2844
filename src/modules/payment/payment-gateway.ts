export interface AuthorizationRequest {
  amount: number;
  currency: string;
  /** Customer reference passed to the provider */
  customerRef: string;
  /** Booking code shown on the customer's statement */
  bookingRef: string;
}

export type AuthorizationOutcome =
  | { status: 'authorized'; paymentRef: string }
  | { status: 'declined'; reason: string };

/**
 * External payment provider. Calls are never made while booking locks are
 * held.
 */
export abstract class PaymentGateway {
  abstract authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome>;

  /** Settle a previously authorized payment */
  abstract capture(paymentRef: string): Promise<void>;

  abstract refund(paymentRef: string, amount: number): Promise<void>;
}
