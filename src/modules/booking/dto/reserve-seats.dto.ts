import {
  ArrayMaxSize,
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsMongoId,
  IsNotEmpty,
} from 'class-validator';

/**
 * DTO for reserving seats
 *
 * Seats are held for the reservation window (10 minutes by default) while
 * the customer pays. An X-Idempotency-Key header makes retries safe.
 *
 * @example
 * ```json
 * {
 *   "event_id": "64a7b8c9d0e1f2a3b4c5d6e7",
 *   "seat_ids": ["64a7b8c9d0e1f2a3b4c5d701", "64a7b8c9d0e1f2a3b4c5d702"]
 * }
 * ```
 */
export class ReserveSeatsDto {
  @IsMongoId({ message: 'event_id must be a valid MongoDB ObjectId' })
  @IsNotEmpty({ message: 'event_id is required' })
  event_id!: string;

  /**
   * Seats to reserve; all of them are reserved or none
   */
  @IsArray({ message: 'seat_ids must be an array' })
  @ArrayMinSize(1, { message: 'At least one seat must be selected' })
  @ArrayMaxSize(10, { message: 'At most 10 seats can be reserved at once' })
  @ArrayUnique({ message: 'seat_ids must not contain duplicates' })
  @IsMongoId({ each: true, message: 'Each seat id must be a valid ObjectId' })
  seat_ids!: string[];
}
