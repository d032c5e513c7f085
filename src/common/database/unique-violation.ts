import { QueryFailedError } from 'typeorm';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

/**
 * Pre-insert uniqueness checks can race. A write that loses the race fails
 * on the unique index and is reported as `toError()` instead.
 */
export async function onUniqueViolation<T>(work: Promise<T>, toError: () => Error): Promise<T> {
  try {
    return await work;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw toError();
    }
    throw error;
  }
}
