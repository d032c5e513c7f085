/**
 * Dental Clinic API - Database Module
 *
 * Global module providing the TypeORM connection and DatabaseService.
 */

import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseService } from './database.service';
import { Clinic } from '../../modules/clinics/entities/clinic.entity';
import { User } from '../../modules/users/entities/user.entity';
import { Patient } from '../../modules/patients/entities/patient.entity';
import { Treatment } from '../../modules/treatments/entities/treatment.entity';
import { RevokedToken } from '../auth/entities/revoked-token.entity';

export const ENTITIES = [Clinic, User, Patient, Treatment, RevokedToken];

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres' as const,
        url: config.get<string>('database.url'),
        entities: ENTITIES,
        synchronize: config.get<boolean>('database.synchronize', false),
        // Query logs stay off unless explicitly enabled
        logging: config.get<boolean>('database.logging', false) ? ['query', 'warn', 'error'] : ['warn', 'error'],
      }),
    }),
  ],
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
