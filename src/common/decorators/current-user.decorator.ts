import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

/**
 * Caller identity taken from a verified bearer token. `id` is the
 * customer id; `role` is `customer`, `staff` or `admin`.
 */
export interface CurrentUserData {
  id: string;
  email: string;
  role: string;
}

export interface AuthenticatedRequest extends Request {
  user?: CurrentUserData;
}

/**
 * Reads the caller attached by AuthGuard, or one of its properties.
 *
 * @example
 * ```typescript
 * @Get(':id')
 * async getBooking(@CurrentUser('id') customerId: string) {}
 * ```
 */
export const CurrentUser = createParamDecorator(
  (property: keyof CurrentUserData | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;

    if (!user) {
      return null;
    }

    return property ? user[property] : user;
  },
);
