import {
  BadRequestException,
  createParamDecorator,
  ExecutionContext,
} from '@nestjs/common';
import { Request } from 'express';

export const IDEMPOTENCY_KEY_HEADER = 'x-idempotency-key';

const UUID_V4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
const TOKEN = /^[a-zA-Z0-9_-]{8,64}$/;

/**
 * Extracts the X-Idempotency-Key header.
 *
 * Pass `false` to make the header optional; the parameter is then
 * `undefined` when the client sends none.
 *
 * @example
 * ```typescript
 * @Post()
 * async reserve(@IdempotencyKey(false) key: string | undefined) {}
 * ```
 */
export const IdempotencyKey = createParamDecorator(
  (required: boolean | undefined, ctx: ExecutionContext): string | undefined => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const header = request.headers[IDEMPOTENCY_KEY_HEADER];
    const key = typeof header === 'string' && header !== '' ? header : undefined;

    if (key === undefined) {
      if (required === false) {
        return undefined;
      }
      throw new BadRequestException({
        statusCode: 400,
        errorCode: 'IDEMPOTENCY_KEY_REQUIRED',
        message: `Header '${IDEMPOTENCY_KEY_HEADER}' is required`,
        timestamp: new Date().toISOString(),
        path: request.url,
      });
    }

    if (!UUID_V4.test(key) && !TOKEN.test(key)) {
      throw new BadRequestException({
        statusCode: 400,
        errorCode: 'INVALID_IDEMPOTENCY_KEY',
        message:
          'Idempotency key must be a UUID or an 8-64 character token of letters, digits, _ or -',
        timestamp: new Date().toISOString(),
        path: request.url,
      });
    }

    return key;
  },
);
