/**
 * Dental Clinic API - Auth Module
 *
 * Password hashing, bearer token issuing and verification, plus the global
 * guards that authenticate the caller and apply the role policy.
 */

import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TokenService } from './services/token.service';
import { PasswordService } from './services/password.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { PolicyGuard } from './guards/policy.guard';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [TokenService, PasswordService, JwtAuthGuard, PolicyGuard],
  exports: [TokenService, PasswordService, JwtAuthGuard, PolicyGuard],
})
export class AuthModule {}
