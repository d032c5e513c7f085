/**
 * Dental Clinic API - Current User Decorator
 *
 * Extracts the authenticated user from the request.
 */

import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { AuthenticatedUser } from '../guards/jwt-auth.guard';

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedUser => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!request.user) {
      throw new UnauthorizedException({
        code: 'not_authenticated',
        message: 'Authentication credentials were not provided.',
      });
    }
    return request.user;
  },
);
