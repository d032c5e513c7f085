import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';

/**
 * Path and query string of the current request, e.g. `/api/v1/patients?page=2`.
 */
export const RequestUrl = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  return request.originalUrl;
});
