/**
 * Dental Clinic API - Auth Service
 *
 * Registration, credential login, token refresh and logout, and the
 * current user's own profile and password.
 */

import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { LessThan } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { onUniqueViolation } from '../../common/database/unique-violation';
import { PasswordService } from '../../common/auth/services/password.service';
import { TokenClaims, TokenPair, TokenService } from '../../common/auth/services/token.service';
import { RevokedToken } from '../../common/auth/entities/revoked-token.entity';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { TenantContext } from '../../common/tenancy/tenant-context';
import { User } from '../users/entities/user.entity';
import { emailTakenError, UsersService } from '../users/users.service';
import { presentUser, UserView } from '../users/user.presenter';
import { ChangePasswordDto, LoginDto, RegisterDto, UpdateProfileDto } from './dto/auth.dto';

export interface LoginResult extends TokenPair {
  user: UserView;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly passwords: PasswordService,
    private readonly tokens: TokenService,
    private readonly usersService: UsersService,
  ) {}

  /**
   * Self-registration of a doctor or administrator into an existing clinic.
   */
  async register(dto: RegisterDto): Promise<UserView> {
    const registered = this.db.withTransaction(async (manager) => {
      await this.usersService.assertEmailAvailable(manager, dto.email, 'Registration failed');
      if (dto.passwordConfirm !== undefined && dto.passwordConfirm !== dto.password) {
        throw new ApiValidationException({ password: ['Passwords do not match.'] }, 'Registration failed');
      }
      await this.usersService.assertClinicExists(manager, dto.clinicId, 'clinicId', 'Registration failed');

      const repo = manager.getRepository(User);
      const saved = await repo.save(
        repo.create({
          email: dto.email,
          passwordHash: await this.passwords.hash(dto.password),
          firstName: dto.firstName ?? '',
          lastName: dto.lastName ?? '',
          role: dto.role,
          clinicId: dto.clinicId,
          contactNumber: dto.contactNumber ?? null,
          secondaryContactNumber: dto.secondaryContactNumber ?? null,
          address: dto.address ?? null,
          degree: dto.degree ?? null,
        }),
      );
      return repo.findOneOrFail({ where: { id: saved.id }, relations: { clinic: true } });
    });
    const user = await onUniqueViolation(registered, () => emailTakenError('Registration failed'));

    this.logger.log(`Registered ${user.role} user ${user.id} in clinic ${dto.clinicId}`);
    return presentUser(user);
  }

  async login(dto: LoginDto): Promise<LoginResult> {
    const user = await this.db.getRepository(User).findOne({
      where: { email: dto.email, isDeleted: false },
      relations: { clinic: true },
    });

    if (!user || !(await this.passwords.verify(dto.password, user.passwordHash))) {
      this.logger.warn(`Failed login attempt for ${dto.email}`);
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'Invalid credentials.' });
    }
    if (!user.isActive) {
      this.logger.warn(`Login attempt on inactive account ${user.id}`);
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'This account is inactive.' });
    }

    this.logger.log(`User ${user.id} logged in`);
    return { user: presentUser(user), ...this.tokens.issuePair(user) };
  }

  async refresh(refreshToken: string): Promise<{ access: string }> {
    const claims = this.tokens.verify(refreshToken, 'refresh');

    const revoked = await this.db.getRepository(RevokedToken).exists({ where: { jti: claims.jti } });
    if (revoked) {
      throw new UnauthorizedException({ code: 'token_not_valid', message: 'Token is blacklisted.' });
    }

    const user = await this.db.getRepository(User).findOne({
      where: { id: this.tokens.userIdOf(claims), isDeleted: false, isActive: true },
    });
    if (!user) {
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'User not found.' });
    }

    return { access: this.tokens.issue(user, 'access') };
  }

  /**
   * Revokes the given refresh token. An unusable token is logged and
   * otherwise ignored: the client is logging out either way.
   */
  async logout(ctx: TenantContext, refreshToken?: string): Promise<void> {
    if (!refreshToken) {
      return;
    }

    let claims: TokenClaims;
    try {
      claims = this.tokens.verify(refreshToken, 'refresh');
    } catch (error) {
      this.logger.warn(`Logout error for user ${ctx.userId}: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    if (this.tokens.userIdOf(claims) !== ctx.userId) {
      this.logger.warn(`User ${ctx.userId} tried to revoke a token of another user`);
      return;
    }

    const { jti, exp } = claims;
    await this.db.withTransaction(async (manager) => {
      const repo = manager.getRepository(RevokedToken);
      // Expired tokens fail verification on their own
      await repo.delete({ expiresAt: LessThan(new Date()) });
      if (await repo.exists({ where: { jti } })) {
        return;
      }
      await repo.save(repo.create({ jti, userId: ctx.userId, expiresAt: new Date(exp * 1000) }));
    });
    this.logger.log(`User ${ctx.userId} logged out`);
  }

  async me(ctx: TenantContext): Promise<UserView> {
    return presentUser(await this.getSelf(ctx.userId));
  }

  async updateProfile(ctx: TenantContext, dto: UpdateProfileDto): Promise<UserView> {
    const user = await this.db.withTransaction(async (manager) => {
      const self = await this.getSelf(ctx.userId);
      manager.getRepository(User).merge(self, { ...dto, updatedById: ctx.userId });
      return manager.getRepository(User).save(self);
    });
    this.logger.log(`User ${ctx.userId} updated their profile`);
    return presentUser(user);
  }

  async changePassword(ctx: TenantContext, dto: ChangePasswordDto): Promise<UserView> {
    const self = await this.getSelf(ctx.userId);

    if (!(await this.passwords.verify(dto.oldPassword, self.passwordHash))) {
      throw new ApiValidationException({ oldPassword: ['Incorrect password.'] }, 'Password change failed');
    }
    if (dto.newPassword !== dto.newPasswordConfirm) {
      throw new ApiValidationException({ newPassword: ['New passwords do not match.'] }, 'Password change failed');
    }
    if (dto.newPassword === dto.oldPassword) {
      throw new ApiValidationException(
        { newPassword: ['New password must be different from old password.'] },
        'Password change failed',
      );
    }

    self.passwordHash = await this.passwords.hash(dto.newPassword);
    const saved = await this.db.withTransaction((manager) => manager.getRepository(User).save(self));
    this.logger.log(`User ${ctx.userId} changed their password`);
    return presentUser(saved);
  }

  private async getSelf(userId: number): Promise<User> {
    const user = await this.db.getRepository(User).findOne({
      where: { id: userId, isDeleted: false },
      relations: { clinic: true },
    });
    if (!user) {
      throw new UnauthorizedException({ code: 'authentication_failed', message: 'User not found.' });
    }
    return user;
  }
}
