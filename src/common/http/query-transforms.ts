import { Transform } from 'class-transformer';

/**
 * Query-string boolean: `true`, `"true"` and `"1"` are true, anything else false.
 */
export const ToBoolean = () =>
  Transform(({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
    const raw = obj[key];
    return raw === true || raw === 'true' || raw === '1';
  });

/**
 * Trims strings and turns blank ones into `undefined`.
 */
export const TrimToUndefined = () =>
  Transform(({ value }: { value: unknown }) => {
    if (typeof value !== 'string') {
      return value;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  });
