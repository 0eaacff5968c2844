import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { toHttpException } from '../errors/booking-error.mapper';
import { BookingError } from '../errors/booking.errors';
import { ErrorResponse } from '../interfaces/error-response.interface';

const DEFAULT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  402: 'PAYMENT_REQUIRED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  500: 'INTERNAL_ERROR',
  502: 'BAD_GATEWAY',
  503: 'SERVICE_UNAVAILABLE',
};

/**
 * Global exception filter rendering every failure as an ErrorResponse.
 * A BookingError that escapes a handler is mapped like the services map it.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toErrorResponse(exception, request.url);
    response.status(body.statusCode).json(body);
  }

  toErrorResponse(exception: unknown, path: string): ErrorResponse {
    const httpException =
      exception instanceof BookingError
        ? toHttpException(exception)
        : exception instanceof HttpException
          ? exception
          : null;

    if (!httpException) {
      if (exception instanceof Error) {
        this.logger.error(
          `Unhandled exception: ${exception.message}`,
          exception.stack,
        );
      }
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        errorCode: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        timestamp: new Date().toISOString(),
        path,
      };
    }

    const status = httpException.getStatus();
    const payload = httpException.getResponse();
    const fallbackCode = DEFAULT_ERROR_CODES[status] ?? 'UNKNOWN_ERROR';

    if (typeof payload !== 'object' || payload === null) {
      return {
        statusCode: status,
        errorCode: fallbackCode,
        message: typeof payload === 'string' ? payload : httpException.message,
        timestamp: new Date().toISOString(),
        path,
      };
    }

    const errorCode =
      'errorCode' in payload && typeof payload.errorCode === 'string'
        ? payload.errorCode
        : fallbackCode;
    const message = 'message' in payload ? payload.message : undefined;
    const details =
      'details' in payload && isRecord(payload.details)
        ? payload.details
        : undefined;

    return {
      statusCode: status,
      errorCode,
      // ValidationPipe reports a list of messages
      message: Array.isArray(message)
        ? message.join('; ')
        : typeof message === 'string'
          ? message
          : httpException.message,
      timestamp: new Date().toISOString(),
      path,
      ...(details && { details }),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
