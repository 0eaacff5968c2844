import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type CustomerDocument = HydratedDocument<Customer>;

@Schema({
  timestamps: true,
  collection: 'customers',
})
export class Customer {
  @Prop({ required: true, trim: true, maxlength: 200 })
  name!: string;

  @Prop({
    required: true,
    trim: true,
    lowercase: true,
    unique: true,
    maxlength: 320,
  })
  email!: string;
}

export const CustomerSchema = SchemaFactory.createForClass(Customer);
