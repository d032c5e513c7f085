/**
 * Dental Clinic API - Root Application Module
 *
 * Imports all feature modules and configures global providers. Guards run
 * in registration order: rate limiting, authentication, then the role policy.
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';

// Configuration
import configuration from './config/configuration';
import { validate } from './config/env.validation';

// Common modules
import { DatabaseModule } from './common/database/database.module';
import { AuthModule } from './common/auth/auth.module';
import { StorageModule } from './common/storage/storage.module';
import { JwtAuthGuard } from './common/auth/guards/jwt-auth.guard';
import { PolicyGuard } from './common/auth/guards/policy.guard';
import { ApiExceptionFilter } from './common/http/api-exception.filter';
import { RequestLoggingInterceptor } from './common/http/request-logging.interceptor';

// Feature modules
import { ClinicsModule } from './modules/clinics/clinics.module';
import { UsersModule } from './modules/users/users.module';
import { AuthApiModule } from './modules/auth/auth-api.module';
import { PatientsModule } from './modules/patients/patients.module';
import { TreatmentsModule } from './modules/treatments/treatments.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate,
      envFilePath: ['.env.local', '.env'],
    }),

    // Rate limiting
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 1 minute
        limit: 100, // 100 requests per minute
      },
    ]),

    // Database
    DatabaseModule,

    // Authentication & Authorization
    AuthModule,

    // Media storage
    StorageModule,

    // Feature modules
    ClinicsModule,
    UsersModule,
    AuthApiModule,
    PatientsModule,
    TreatmentsModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    // Global authentication guard
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
    // Role policy, needs the user set by JwtAuthGuard
    {
      provide: APP_GUARD,
      useClass: PolicyGuard,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: ApiExceptionFilter,
    },
  ],
})
export class AppModule {}
