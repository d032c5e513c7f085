import { BadRequestException } from '@nestjs/common';

export type FieldErrors = Record<string, string[]>;

/**
 * 400 carrying per-field messages, rendered as `error.details`.
 */
export class ApiValidationException extends BadRequestException {
  constructor(
    public readonly details: FieldErrors,
    message = 'Validation failed.',
  ) {
    super({ code: 'validation_error', message, details });
  }
}
