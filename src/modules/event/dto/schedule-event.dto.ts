import { Type } from 'class-transformer';
import { IsDate, IsMongoId, IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * DTO for scheduling an event at a stadium
 */
export class ScheduleEventDto {
  @IsMongoId({ message: 'stadium_id must be a valid MongoDB ObjectId' })
  @IsNotEmpty({ message: 'stadium_id is required' })
  stadium_id!: string;

  @IsString()
  @IsNotEmpty({ message: 'name is required' })
  @MaxLength(200)
  name!: string;

  @Type(() => Date)
  @IsDate({ message: 'starts_at must be a valid date' })
  starts_at!: Date;
}
