import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type StadiumDocument = HydratedDocument<Stadium>;

@Schema({
  timestamps: true,
  collection: 'stadiums',
})
export class Stadium {
  @Prop({ required: true, trim: true, maxlength: 200 })
  name!: string;

  @Prop({ required: true, trim: true, maxlength: 200 })
  location!: string;

  @Prop({ required: true, min: 1 })
  capacity!: number;
}

export const StadiumSchema = SchemaFactory.createForClass(Stadium);

StadiumSchema.index({ name: 1 }, { unique: true });
