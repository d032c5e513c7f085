/**
 * Dental Clinic API - Request Pipeline
 *
 * Body parsing and validation shared by the bootstrap and HTTP-level tests.
 */

import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { validationExceptionFactory } from './validation-exception.factory';

// A 5MB image grows by a third as a base64 data URI
export const JSON_BODY_LIMIT = '8mb';

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: validationExceptionFactory,
  });
}

export function configureRequestPipeline(app: NestExpressApplication): void {
  app.useBodyParser('json', { limit: JSON_BODY_LIMIT });
  app.useGlobalPipes(createValidationPipe());
}
