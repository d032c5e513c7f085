/**
 * Dental Clinic API - Environment Validation
 *
 * Validates environment variables at startup.
 */

import { plainToInstance } from 'class-transformer';
import { IsString, IsNumber, IsOptional, IsIn, validateSync } from 'class-validator';

class EnvironmentVariables {
  @IsString()
  NODE_ENV!: string;

  @IsNumber()
  @IsOptional()
  PORT?: number;

  @IsString()
  @IsOptional()
  CORS_ORIGINS?: string;

  @IsString()
  DATABASE_URL!: string;

  @IsIn(['true', 'false'])
  @IsOptional()
  DATABASE_SYNCHRONIZE?: string;

  @IsIn(['true', 'false'])
  @IsOptional()
  ENABLE_DB_LOGS?: string;

  @IsString()
  JWT_SECRET_KEY!: string;

  @IsNumber()
  @IsOptional()
  JWT_ACCESS_TOKEN_LIFETIME?: number;

  @IsNumber()
  @IsOptional()
  JWT_REFRESH_TOKEN_LIFETIME?: number;

  @IsNumber()
  @IsOptional()
  BCRYPT_ROUNDS?: number;

  @IsString()
  @IsOptional()
  AWS_REGION?: string;

  @IsString()
  @IsOptional()
  AWS_ACCESS_KEY_ID?: string;

  @IsString()
  @IsOptional()
  AWS_SECRET_ACCESS_KEY?: string;

  @IsString()
  @IsOptional()
  S3_BUCKET_NAME?: string;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}
