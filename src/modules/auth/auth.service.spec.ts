/**
 * Auth Service Unit Tests
 *
 * Registration, login, refresh, logout and password changes against a
 * mocked database and a real token service.
 */

import { Test, TestingModule } from '@nestjs/testing';
import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityTarget, LessThan, ObjectLiteral, QueryFailedError } from 'typeorm';
import { DatabaseService } from '../../common/database/database.service';
import { PasswordService } from '../../common/auth/services/password.service';
import { TokenService } from '../../common/auth/services/token.service';
import { RevokedToken } from '../../common/auth/entities/revoked-token.entity';
import { ApiValidationException } from '../../common/http/api-validation.exception';
import { TenantContext } from '../../common/tenancy/tenant-context';
import { UserRole } from '../../common/types/roles';
import { Clinic } from '../clinics/entities/clinic.entity';
import { UsersService } from '../users/users.service';
import { RegisterDto } from './dto/auth.dto';
import { AuthService } from './auth.service';

describe('AuthService', () => {
  let service: AuthService;
  let tokens: TokenService;

  const userRepo = {
    findOne: jest.fn(),
    findOneOrFail: jest.fn(),
    exists: jest.fn(),
    create: jest.fn((data: ObjectLiteral) => ({ ...data })),
    merge: jest.fn((target: ObjectLiteral, data: ObjectLiteral) => Object.assign(target, data)),
    save: jest.fn(async (entity: ObjectLiteral) => ({ id: 5, ...entity })),
  };
  const clinicRepo = { exists: jest.fn() };
  const revokedRepo = {
    exists: jest.fn(),
    delete: jest.fn(),
    create: jest.fn((data: ObjectLiteral) => ({ ...data })),
    save: jest.fn(async (entity: ObjectLiteral) => entity),
  };
  const repo = (entity: EntityTarget<ObjectLiteral>) => {
    if (entity === Clinic) return clinicRepo;
    if (entity === RevokedToken) return revokedRepo;
    return userRepo;
  };
  const mockManager = { getRepository: jest.fn(repo) };
  const mockDatabaseService = {
    getRepository: jest.fn(repo),
    withTransaction: jest.fn((work: (manager: typeof mockManager) => Promise<unknown>) => work(mockManager)),
  };
  const mockPasswordService = {
    hash: jest.fn(async (password: string) => `hashed:${password}`),
    verify: jest.fn(async (password: string, hash: string) => hash === `hashed:${password}`),
  };

  const userRow = {
    id: 5,
    email: 'doc@example.com',
    passwordHash: 'hashed:password123',
    firstName: 'Ada',
    lastName: 'Reyes',
    clinicId: 2,
    clinic: { id: 2, name: 'Smile Studio' },
    role: UserRole.DOCTOR,
    contactNumber: null,
    secondaryContactNumber: null,
    address: null,
    degree: null,
    isActive: true,
    isSuperuser: false,
    isDeleted: false,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
  };
  const ctx: TenantContext = { userId: 5, clinicId: 2, role: UserRole.DOCTOR, isSuperuser: false };

  const registerDto: RegisterDto = {
    email: 'doc@example.com',
    password: 'password123',
    passwordConfirm: 'password123',
    clinicId: 2,
    role: UserRole.DOCTOR,
    firstName: 'Ada',
    lastName: 'Reyes',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        UsersService,
        TokenService,
        { provide: DatabaseService, useValue: mockDatabaseService },
        { provide: PasswordService, useValue: mockPasswordService },
        { provide: ConfigService, useValue: new ConfigService({ jwt: { secret: 'test-secret' } }) },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    tokens = module.get<TokenService>(TokenService);
    jest.clearAllMocks();
    userRepo.exists.mockResolvedValue(false);
    clinicRepo.exists.mockResolvedValue(true);
    revokedRepo.exists.mockResolvedValue(false);
  });

  describe('register()', () => {
    it('should register a user into an existing clinic', async () => {
      userRepo.findOneOrFail.mockResolvedValue(userRow);

      const user = await service.register(registerDto);

      expect(userRepo.create).toHaveBeenCalledWith(
        expect.objectContaining({ email: 'doc@example.com', passwordHash: 'hashed:password123', clinicId: 2 }),
      );
      expect(user.email).toBe('doc@example.com');
    });

    it('should reject a duplicate email', async () => {
      userRepo.exists.mockResolvedValue(true);

      const attempt = service.register(registerDto);

      await expect(attempt).rejects.toThrow(ApiValidationException);
      await expect(attempt).rejects.toMatchObject({
        message: 'Registration failed',
        details: { email: ['Email already registered.'] },
      });
    });

    it('should report a concurrent duplicate email as a validation error', async () => {
      const duplicate = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
      userRepo.save.mockRejectedValueOnce(new QueryFailedError('INSERT INTO "users"', [], duplicate));

      const attempt = service.register(registerDto);

      await expect(attempt).rejects.toThrow(ApiValidationException);
      await expect(attempt).rejects.toMatchObject({
        message: 'Registration failed',
        details: { email: ['Email already registered.'] },
      });
    });

    it('should reject mismatched passwords', async () => {
      await expect(service.register({ ...registerDto, passwordConfirm: 'different1' })).rejects.toMatchObject({
        details: { password: ['Passwords do not match.'] },
      });
    });

    it('should reject an unknown clinic', async () => {
      clinicRepo.exists.mockResolvedValue(false);

      await expect(service.register(registerDto)).rejects.toMatchObject({
        details: { clinicId: ['Clinic not found. Please select a valid clinic.'] },
      });
    });
  });

  describe('login()', () => {
    it('should issue a token pair for valid credentials', async () => {
      userRepo.findOne.mockResolvedValue(userRow);

      const result = await service.login({ email: 'doc@example.com', password: 'password123' });

      expect(result.user.id).toBe(5);
      expect(tokens.verify(result.access, 'access').sub).toBe('5');
      expect(tokens.verify(result.refresh, 'refresh').clinicId).toBe(2);
    });

    it('should reject a wrong password', async () => {
      userRepo.findOne.mockResolvedValue(userRow);

      await expect(service.login({ email: 'doc@example.com', password: 'wrong-pass' })).rejects.toThrow(
        'Invalid credentials.',
      );
    });

    it('should reject an inactive account', async () => {
      userRepo.findOne.mockResolvedValue({ ...userRow, isActive: false });

      await expect(service.login({ email: 'doc@example.com', password: 'password123' })).rejects.toThrow(
        'This account is inactive.',
      );
    });
  });

  describe('refresh()', () => {
    it('should issue a new access token', async () => {
      userRepo.findOne.mockResolvedValue(userRow);
      const refresh = tokens.issue(userRow, 'refresh');

      const { access } = await service.refresh(refresh);

      expect(tokens.verify(access, 'access').sub).toBe('5');
    });

    it('should reject a revoked token', async () => {
      revokedRepo.exists.mockResolvedValue(true);
      const refresh = tokens.issue(userRow, 'refresh');

      await expect(service.refresh(refresh)).rejects.toThrow('Token is blacklisted.');
    });

    it('should reject an access token', async () => {
      const access = tokens.issue(userRow, 'access');

      await expect(service.refresh(access)).rejects.toThrow(UnauthorizedException);
    });
  });

  describe('logout()', () => {
    it('should revoke the refresh token', async () => {
      const refresh = tokens.issue(userRow, 'refresh');
      const { jti } = tokens.verify(refresh, 'refresh');

      await service.logout(ctx, refresh);

      expect(revokedRepo.save).toHaveBeenCalledWith(expect.objectContaining({ jti, userId: 5 }));
    });

    it('should purge expired revocations', async () => {
      const refresh = tokens.issue(userRow, 'refresh');

      await service.logout(ctx, refresh);

      expect(revokedRepo.delete).toHaveBeenCalledWith({ expiresAt: LessThan(expect.any(Date)) });
    });

    it('should ignore a token of another user', async () => {
      const refresh = tokens.issue({ id: 6, role: UserRole.DOCTOR, clinicId: 2 }, 'refresh');

      await service.logout(ctx, refresh);

      expect(revokedRepo.save).not.toHaveBeenCalled();
    });

    it('should ignore an invalid token', async () => {
      await expect(service.logout(ctx, 'not-a-token')).resolves.toBeUndefined();
      expect(mockDatabaseService.withTransaction).not.toHaveBeenCalled();
    });
  });

  describe('changePassword()', () => {
    it('should reject a wrong old password', async () => {
      userRepo.findOne.mockResolvedValue({ ...userRow });

      await expect(
        service.changePassword(ctx, {
          oldPassword: 'wrong-pass',
          newPassword: 'password456',
          newPasswordConfirm: 'password456',
        }),
      ).rejects.toMatchObject({ details: { oldPassword: ['Incorrect password.'] } });
    });

    it('should reject reusing the old password', async () => {
      userRepo.findOne.mockResolvedValue({ ...userRow });

      await expect(
        service.changePassword(ctx, {
          oldPassword: 'password123',
          newPassword: 'password123',
          newPasswordConfirm: 'password123',
        }),
      ).rejects.toMatchObject({ details: { newPassword: ['New password must be different from old password.'] } });
    });

    it('should store the new hash', async () => {
      userRepo.findOne.mockResolvedValue({ ...userRow });

      await service.changePassword(ctx, {
        oldPassword: 'password123',
        newPassword: 'password456',
        newPasswordConfirm: 'password456',
      });

      expect(userRepo.save).toHaveBeenCalledWith(expect.objectContaining({ passwordHash: 'hashed:password456' }));
    });
  });
});
