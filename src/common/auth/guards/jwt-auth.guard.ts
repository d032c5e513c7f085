/**
 * Dental Clinic API - Bearer Authentication Guard
 *
 * Verifies the access token on every non-public route and attaches the
 * current user to the request. The user row is re-read so that role and
 * clinic changes take effect without waiting for token expiry.
 *
 * @module auth/guards/jwt-auth.guard
 */

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { DatabaseService } from '../../database/database.service';
import { TokenService } from '../services/token.service';
import { TenantContext } from '../../tenancy/tenant-context';
import { User } from '../../../modules/users/entities/user.entity';

export interface AuthenticatedUser extends TenantContext {
  email: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  return scheme === 'Bearer' && token ? token : null;
}

@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly db: DatabaseService,
    private readonly tokens: TokenService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedException({
        code: 'not_authenticated',
        message: 'Authentication credentials were not provided.',
      });
    }

    const claims = this.tokens.verify(token, 'access');
    const userId = this.tokens.userIdOf(claims);

    const user = await this.db.getRepository(User).findOne({ where: { id: userId, isDeleted: false } });
    if (!user) {
      this.logger.warn(`Token for unknown or deleted user ${userId}`);
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'User not found.' });
    }
    if (!user.isActive) {
      this.logger.warn(`Token for inactive user ${userId}`);
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'User is inactive.' });
    }

    request.user = {
      userId: user.id,
      email: user.email,
      role: user.role,
      clinicId: user.clinicId,
      isSuperuser: user.isSuperuser,
    };
    return true;
  }
}
