/**
 * Dental Clinic API - Exception Filter
 *
 * Renders every error as `{ success: false, error: { code, message, details? } }`.
 * Unexpected errors are logged with their stack and surfaced as a redacted 500.
 */

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiErrorBody } from './api-response';

const DEFAULT_CODES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'validation_error',
  [HttpStatus.UNAUTHORIZED]: 'not_authenticated',
  [HttpStatus.FORBIDDEN]: 'permission_denied',
  [HttpStatus.NOT_FOUND]: 'not_found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'method_not_allowed',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'payload_too_large',
  [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'unsupported_media_type',
  [HttpStatus.TOO_MANY_REQUESTS]: 'throttled',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps an HttpException onto the error envelope. Exceptions thrown with an
 * object body may set `code`, `message` and `details` explicitly.
 */
export function toErrorBody(exception: HttpException): ApiErrorBody {
  const status = exception.getStatus();
  const response = exception.getResponse();
  const fallbackCode = DEFAULT_CODES[status] ?? 'error';

  if (!isRecord(response)) {
    return { success: false, error: { code: fallbackCode, message: String(response) } };
  }

  const code = typeof response.code === 'string' ? response.code : fallbackCode;
  let message = exception.message;
  if (typeof response.message === 'string') {
    message = response.message;
  } else if (Array.isArray(response.message) && response.message.length > 0) {
    message = response.message.map(String).join(' ');
  }

  const body: ApiErrorBody = { success: false, error: { code, message } };
  if (response.details !== undefined) {
    body.error.details = response.details;
  }
  return body;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).json(toErrorBody(exception));
      return;
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error('Unhandled exception', stack);

    const body: ApiErrorBody = {
      success: false,
      error: { code: 'internal_error', message: 'An unexpected error occurred.' },
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
