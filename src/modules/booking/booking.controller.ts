import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { IdempotencyKey } from '../../common/decorators/idempotency-key.decorator';
import { AuthGuard } from '../../common/guards/auth.guard';
import { BookingService } from './booking.service';
import { ReserveSeatsDto } from './dto/reserve-seats.dto';
import {
  BookingDetailsResponse,
  CheckoutResponse,
  ReservationResponse,
  TicketResponse,
} from './interfaces/booking-response.interface';

/**
 * BookingController handles all booking-related HTTP endpoints
 *
 * Endpoints:
 * - POST /api/bookings - Reserve seats for an event
 * - POST /api/bookings/:id/checkout - Pay for a reservation and issue tickets
 * - GET /api/bookings/:id - Get booking details
 * - GET /api/bookings/:id/tickets - List the booking's tickets
 * - POST /api/bookings/:id/refund - Refund a confirmed booking
 * - DELETE /api/bookings/:id - Cancel a pending booking
 *
 * All endpoints require authentication via AuthGuard and act on the
 * caller's own bookings only.
 */
@Controller('bookings')
@UseGuards(AuthGuard)
export class BookingController {
  constructor(private readonly bookingService: BookingService) {}

  /**
   * Reserve seats for an event
   *
   * Every requested seat is reserved or none is. Seats stay held for the
   * reservation window, after which the sweep frees them.
   *
   * @header X-Idempotency-Key - Optional. Repeating it returns the first reservation.
   * @header Authorization - Required. Bearer token.
   *
   * @example
   * POST /api/bookings
   * Body: { "event_id": "64a7b8c9d0e1f2a3b4c5d6e7", "seat_ids": ["64a7...01", "64a7...02"] }
   *
   * Response 201: {
   *   "booking_id": "64a7b8c9d0e1f2a3b4c5d6e8",
   *   "booking_code": "BK-ABC12345",
   *   "status": "pending",
   *   "total_amount": 240,
   *   "currency": "AUD",
   *   "hold_expires_at": "2024-01-15T10:40:00.000Z",
   *   ...
   * }
   *
   * Error 409: Seats not available (details.seat_ids lists them)
   * Error 400: Invalid seats or event not open for booking
   * Error 404: Event not found
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async reserveSeats(
    @Body() dto: ReserveSeatsDto,
    @CurrentUser('id') customerId: string,
    @IdempotencyKey(false) idempotencyKey: string | undefined,
  ): Promise<ReservationResponse> {
    return this.bookingService.reserveSeats(customerId, dto, idempotencyKey);
  }

  /**
   * Pay for a pending booking
   *
   * Response 200 with `status: "confirmed"` and one ticket per seat, or
   * `status: "expired"` when the hold ran out first (any payment taken is
   * refunded).
   *
   * Error 402: Payment declined or timed out; the seats are released
   * Error 409: Booking is no longer pending
   */
  @Post(':id/checkout')
  @HttpCode(HttpStatus.OK)
  async checkout(
    @Param('id') bookingId: string,
    @CurrentUser('id') customerId: string,
  ): Promise<CheckoutResponse> {
    return this.bookingService.checkout(bookingId, customerId);
  }

  @Get(':id')
  async getBooking(
    @Param('id') bookingId: string,
    @CurrentUser('id') customerId: string,
  ): Promise<BookingDetailsResponse> {
    return this.bookingService.getBooking(bookingId, customerId);
  }

  @Get(':id/tickets')
  async getTickets(
    @Param('id') bookingId: string,
    @CurrentUser('id') customerId: string,
  ): Promise<TicketResponse[]> {
    return this.bookingService.getTickets(bookingId, customerId);
  }

  /**
   * Refund a confirmed booking. Refused once a ticket has been scanned.
   */
  @Post(':id/refund')
  @HttpCode(HttpStatus.OK)
  async refundBooking(
    @Param('id') bookingId: string,
    @CurrentUser('id') customerId: string,
  ): Promise<BookingDetailsResponse> {
    return this.bookingService.refundBooking(bookingId, customerId);
  }

  /**
   * Cancel a pending booking and release its seats. Cancelling a booking
   * that is already cancelled or failed returns it unchanged.
   *
   * Error 409: Booking is confirmed
   */
  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  async cancelBooking(
    @Param('id') bookingId: string,
    @CurrentUser('id') customerId: string,
  ): Promise<BookingDetailsResponse> {
    return this.bookingService.cancelBooking(bookingId, customerId);
  }
}
