import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { describeError } from '../utils/backoff.util';
import {
  AuthenticatedRequest,
  CurrentUserData,
} from '../decorators/current-user.decorator';

interface AccessTokenPayload {
  sub: string;
  email: string;
  role?: string;
}

const DEFAULT_ROLE = 'customer';

/**
 * Verifies the bearer token and attaches the caller to the request.
 *
 * The signing secret and expiry come from the JwtModule registration in
 * CommonModule. Failed attempts are logged as security events.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private readonly logger = new Logger(AuthGuard.name);

  constructor(private readonly jwtService: JwtService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.logSecurityEvent('AUTH_TOKEN_MISSING', request);
      throw new UnauthorizedException({
        statusCode: 401,
        errorCode: 'TOKEN_MISSING',
        message: 'Authentication token is required',
        timestamp: new Date().toISOString(),
        path: request.url,
      });
    }

    let payload: AccessTokenPayload;
    try {
      payload = await this.jwtService.verifyAsync<AccessTokenPayload>(token);
    } catch (error) {
      this.logSecurityEvent('AUTH_TOKEN_INVALID', request, describeError(error));
      throw new UnauthorizedException({
        statusCode: 401,
        errorCode: 'TOKEN_INVALID',
        message: 'Invalid or expired authentication token',
        timestamp: new Date().toISOString(),
        path: request.url,
      });
    }

    const user: CurrentUserData = {
      id: payload.sub,
      email: payload.email,
      role: payload.role ?? DEFAULT_ROLE,
    };
    request.user = user;
    return true;
  }

  private extractTokenFromHeader(
    request: AuthenticatedRequest,
  ): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    return type === 'Bearer' ? token : undefined;
  }

  private logSecurityEvent(
    event: string,
    request: AuthenticatedRequest,
    reason?: string,
  ): void {
    this.logger.warn(
      `[SECURITY] ${event} ${request.method} ${request.url} from ${request.ip ?? 'unknown'}${reason ? `: ${reason}` : ''}`,
    );
  }
}
