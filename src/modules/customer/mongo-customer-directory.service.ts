import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { isObjectId, toObjectId } from '../database/mongo.util';
import { CustomerDirectory } from './customer-directory';
import { Customer, CustomerDocument } from './customer.schema';

@Injectable()
export class MongoCustomerDirectory extends CustomerDirectory {
  constructor(
    @InjectModel(Customer.name)
    private readonly customerModel: Model<CustomerDocument>,
  ) {
    super();
  }

  async exists(customerId: string): Promise<boolean> {
    if (!isObjectId(customerId)) {
      return false;
    }
    const found = await this.customerModel
      .exists({ _id: toObjectId(customerId) })
      .exec();
    return found !== null;
  }
}
