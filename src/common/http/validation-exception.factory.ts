import { ValidationError } from 'class-validator';
import { ApiValidationException, FieldErrors } from './api-validation.exception';

/**
 * Flattens class-validator errors into `{ field: [messages] }`. Nested
 * properties are keyed by their dotted path.
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): FieldErrors {
  const details: FieldErrors = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      details[path] = Object.values(error.constraints);
    }
    if (error.children?.length) {
      Object.assign(details, flattenValidationErrors(error.children, path));
    }
  }

  return details;
}

export function validationExceptionFactory(errors: ValidationError[]): ApiValidationException {
  return new ApiValidationException(flattenValidationErrors(errors));
}
