import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  BookingError,
  BookingNotFoundError,
  InvalidRequestError,
  InvalidStateError,
  PersistenceFailureError,
  SeatUnavailableError,
} from './booking.errors';

const NOT_FOUND_REASONS = new Set([
  'CUSTOMER_NOT_FOUND',
  'EVENT_NOT_FOUND',
  'TICKET_NOT_FOUND',
  'RECIPIENT_NOT_FOUND',
]);

/**
 * Translate a booking core error into the HTTP exception returned to clients.
 * Persistence details never leave the service.
 */
export function toHttpException(error: BookingError): HttpException {
  const timestamp = new Date().toISOString();

  if (error instanceof SeatUnavailableError) {
    return new ConflictException({
      statusCode: 409,
      errorCode: 'SEATS_NOT_AVAILABLE',
      message: `Some seats are not available: ${error.seatIds.join(', ')}`,
      details: { seat_ids: error.seatIds },
      timestamp,
    });
  }

  if (error instanceof BookingNotFoundError) {
    return new NotFoundException({
      statusCode: 404,
      errorCode: 'BOOKING_NOT_FOUND',
      message: 'Booking not found',
      timestamp,
    });
  }

  if (error instanceof InvalidStateError) {
    return new ConflictException({
      statusCode: 409,
      errorCode: 'INVALID_BOOKING_STATE',
      message: error.message,
      ...(error.currentState
        ? { details: { current_state: error.currentState } }
        : {}),
      timestamp,
    });
  }

  if (error instanceof InvalidRequestError) {
    const body = {
      errorCode: error.reason,
      message: error.message,
      ...(error.details && { details: error.details }),
      timestamp,
    };
    if (NOT_FOUND_REASONS.has(error.reason)) {
      return new NotFoundException({ statusCode: 404, ...body });
    }
    if (error.reason === 'NOT_OWNER') {
      return new ForbiddenException({ statusCode: 403, ...body });
    }
    return new BadRequestException({ statusCode: 400, ...body });
  }

  if (error instanceof PersistenceFailureError) {
    return new ServiceUnavailableException({
      statusCode: 503,
      errorCode: 'SERVICE_BUSY',
      message: 'The booking service is busy. Please try again.',
      timestamp,
    });
  }

  return new ServiceUnavailableException({
    statusCode: 503,
    errorCode: error.code,
    message: 'The booking could not be processed',
    timestamp,
  });
}
