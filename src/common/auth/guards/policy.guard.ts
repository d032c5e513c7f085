/**
 * Dental Clinic API - Policy Guard
 *
 * Role gate for routes carrying `@Policy(action)`. Runs after JwtAuthGuard.
 */

import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { POLICY_KEY } from '../decorators/policy.decorator';
import { denialMessage, isAllowed, PolicyAction } from '../policy/policy.table';

@Injectable()
export class PolicyGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const action = this.reflector.getAllAndOverride<PolicyAction | undefined>(POLICY_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!action) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<Request>();
    if (!user) {
      return false;
    }

    if (!isAllowed(action, user)) {
      throw new ForbiddenException({ code: 'permission_denied', message: denialMessage(action) });
    }
    return true;
  }
}
