import { ValidateIf } from 'class-validator';

/**
 * Skips validation only when the property is omitted. Unlike `@IsOptional()`,
 * an explicit `null` is still validated, for columns that cannot be cleared.
 */
export const IsOmittable = () => ValidateIf((_object: object, value: unknown) => value !== undefined);
