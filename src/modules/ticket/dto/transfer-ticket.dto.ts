import { IsMongoId, IsNotEmpty } from 'class-validator';

export class TransferTicketDto {
  @IsMongoId({ message: 'recipient_id must be a valid MongoDB ObjectId' })
  @IsNotEmpty({ message: 'recipient_id is required' })
  recipient_id!: string;
}
