import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CustomerDirectory } from './customer-directory';
import { Customer, CustomerSchema } from './customer.schema';
import { MongoCustomerDirectory } from './mongo-customer-directory.service';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Customer.name, schema: CustomerSchema },
    ]),
  ],
  providers: [{ provide: CustomerDirectory, useClass: MongoCustomerDirectory }],
  exports: [CustomerDirectory],
})
export class CustomerModule {}
