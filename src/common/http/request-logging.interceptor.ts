/**
 * Dental Clinic API - Request Logging Interceptor
 * Logs method, path, acting user and duration of every handled request.
 */

import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const actor = request.user ? `user ${request.user.userId}` : 'anonymous';
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(`${request.method} ${request.originalUrl} by ${actor} in ${Date.now() - startTime}ms`);
        },
        error: (error: unknown) => {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn(`${request.method} ${request.originalUrl} by ${actor} failed: ${reason}`);
        },
      }),
    );
  }
}
