import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { bookingConfig } from './config/booking.config';

// Infrastructure
import { DatabaseModule } from './modules/database/database.module';
import { RedisModule } from './modules/redis/redis.module';
import { HealthModule } from './modules/health/health.module';

// Feature modules
import { StadiumModule } from './modules/stadium/stadium.module';
import { EventModule } from './modules/event/event.module';
import { CustomerModule } from './modules/customer/customer.module';
import { TicketModule } from './modules/ticket/ticket.module';
import { PaymentModule } from './modules/payment/payment.module';
import { BookingModule } from './modules/booking/booking.module';

/**
 * AppModule - Root module of the stadium booking service
 *
 * Configuration:
 * - ConfigModule: .env support plus the `booking` namespace
 * - MongooseModule: MongoDB via MONGO_URI (a replica set, for transactions)
 * - ScheduleModule: drives the reservation expiry sweep
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [bookingConfig],
    }),

    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        uri: configService.get<string>(
          'MONGO_URI',
          'mongodb://localhost:27017/stadium-booking?replicaSet=rs0',
        ),
      }),
      inject: [ConfigService],
    }),

    ScheduleModule.forRoot(),

    CommonModule,
    DatabaseModule,
    RedisModule,
    HealthModule,

    StadiumModule,
    EventModule,
    CustomerModule,
    TicketModule,
    PaymentModule,
    BookingModule,
  ],
})
export class AppModule {}
