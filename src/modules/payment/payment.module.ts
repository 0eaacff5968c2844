import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { PaymentGateway } from './payment-gateway';
import { Payment, PaymentSchema } from './payment.schema';
import { PaymentService } from './payment.service';
import { SimulatedPaymentGateway } from './simulated-payment-gateway.service';

/**
 * PaymentModule wraps the external payment provider
 *
 * - PaymentGateway: authorize / capture / refund against the provider
 * - PaymentService: gateway calls with timeout, recorded in `payments`
 *
 * Booking decides what to do with each outcome; this module has no
 * dependency on it.
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: Payment.name, schema: PaymentSchema }]),
  ],
  providers: [
    PaymentService,
    { provide: PaymentGateway, useClass: SimulatedPaymentGateway },
  ],
  exports: [PaymentService],
})
export class PaymentModule {}
