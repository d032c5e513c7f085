import { applyDecorators } from '@nestjs/common';
import { Type } from 'class-transformer';
import { IsInt, IsPositive, Max, ValidationOptions } from 'class-validator';

// Primary keys are Postgres `int`
export const MAX_RECORD_ID = 2147483647;

export function isRecordId(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= MAX_RECORD_ID;
}

export const IsRecordId = (options?: ValidationOptions) =>
  applyDecorators(Type(() => Number), IsInt(options), IsPositive(options), Max(MAX_RECORD_ID, options));
